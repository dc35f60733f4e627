/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Fatal errors. Each one aborts the whole run and names the precondition
 * that failed; recoverable conditions go through {@link Diagnostics} instead.
 */

export type FacadeErrorCode =
  | 'NO_GEOMETRY'
  | 'INSUFFICIENT_DATA'
  | 'INSUFFICIENT_STUDS'
  | 'STUD_TOPOLOGY'
  | 'INVALID_CONFIG'
  | 'INVALID_INPUT';

export class FacadeError extends Error {
  constructor(
    message: string,
    public readonly code: FacadeErrorCode,
  ) {
    super(message);
    this.name = 'FacadeError';
  }
}

/** No panel carries a bounding box, so the footprint is undefined */
export class NoGeometryError extends FacadeError {
  constructor(message = 'No panel elements with a bounding box') {
    super(message, 'NO_GEOMETRY');
    this.name = 'NoGeometryError';
  }
}

/** Floor split has no Z values to work from */
export class InsufficientDataError extends FacadeError {
  constructor(message = 'No panel Z values available for the floor split') {
    super(message, 'INSUFFICIENT_DATA');
    this.name = 'InsufficientDataError';
  }
}

export class InsufficientStudsError extends FacadeError {
  constructor(public readonly studCount: number) {
    super(`Need at least 2 studs to form a door opening, found ${studCount}`, 'INSUFFICIENT_STUDS');
    this.name = 'InsufficientStudsError';
  }
}

/** Row pairing was configured for a stud count the model does not have */
export class StudTopologyError extends FacadeError {
  constructor(
    public readonly expected: number,
    public readonly found: number,
  ) {
    super(`Row pairing expects exactly ${expected} studs, found ${found}`, 'STUD_TOPOLOGY');
    this.name = 'StudTopologyError';
  }
}

export class ConfigError extends FacadeError {
  constructor(
    public readonly key: string,
    detail: string,
  ) {
    super(`Invalid configuration "${key}": ${detail}`, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/** External JSON does not have the documented shape */
export class InputParseError extends FacadeError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(`${message} at ${path}`, 'INVALID_INPUT');
    this.name = 'InputParseError';
  }
}
