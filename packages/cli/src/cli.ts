#!/usr/bin/env node
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for facade analysis and detection matching
 *
 * Reads a model snapshot (and a detection batch), writes the JSON documents
 * into the output directory.
 */

import { Command } from 'commander';
import { createLogger } from '@facade-match/data';
import { runAnalyze, runMatch, type RunOptions } from './commands.js';

const program = new Command();

program
  .name('facade-match')
  .description('Classify facade elements by side and match 2D detections against them')
  .version('0.1.0');

interface CliOptions {
  config?: string;
  output: string;
  verbose: boolean;
}

function toRunOptions(options: CliOptions): RunOptions {
  if (options.verbose) {
    process.env.FACADE_DEBUG = 'true';
  }
  return { configPath: options.config, outputDir: options.output };
}

const log = createLogger('CLI');

function fail(error: unknown): never {
  log.error('Run failed', error);
  process.exit(1);
}

program
  .command('analyze')
  .description('Write side summary, model export, door output and side sequences')
  .argument('<model>', 'Path to the model snapshot JSON')
  .option('-c, --config <file>', 'Partial configuration JSON')
  .option('-o, --output <dir>', 'Output directory', './facade-output')
  .option('-v, --verbose', 'Verbose output', false)
  .action((modelPath: string, options: CliOptions) => {
    try {
      const start = Date.now();
      const { files, warnings } = runAnalyze(modelPath, toRunOptions(options));
      for (const file of files) console.log(`✅ ${file}`);
      console.log(`\n${warnings} warnings, completed in ${Date.now() - start}ms`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('match')
  .description('Analyze the model, classify the detection batch side and match it')
  .argument('<model>', 'Path to the model snapshot JSON')
  .argument('<detections>', 'Path to the detection list JSON')
  .option('-c, --config <file>', 'Partial configuration JSON')
  .option('-o, --output <dir>', 'Output directory', './facade-output')
  .option('-v, --verbose', 'Verbose output', false)
  .action((modelPath: string, detectionsPath: string, options: CliOptions) => {
    try {
      const start = Date.now();
      const { files, warnings, classifiedSide, matched, total } = runMatch(
        modelPath,
        detectionsPath,
        toRunOptions(options),
      );
      for (const file of files) console.log(`✅ ${file}`);
      console.log(`\nSide ${classifiedSide}: matched ${matched}/${total} detections`);
      console.log(`${warnings} warnings, completed in ${Date.now() - start}ms`);
    } catch (error) {
      fail(error);
    }
  });

program.parse();
