/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */

export type ErrorKind =
  'PathError' |
  'NotFoundError' |
  'RangeError' |
  'ValidationError' |
  'FormatError' |
  'ConflictError';

/**
 * base class for every error the engine raises on purpose. anything
 * that isn't an EngineError is a bug (or an i/o failure) and goes
 * up to the caller as-is.
 */
export abstract class EngineError extends Error {

  public abstract readonly kind: ErrorKind;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }

  public toJSON(): { kind: ErrorKind; message: string; details?: Record<string, unknown> } {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }

}

/** path outside the permitted root, or otherwise not acceptable */
export class PathError extends EngineError {
  public override readonly kind = 'PathError';
}

/** missing sheet, table, chart, pivot or field */
export class NotFoundError extends EngineError {
  public override readonly kind = 'NotFoundError';
}

/**
 * malformed or out-of-extent address. the class is not called
 * RangeError so it doesn't shadow the builtin.
 */
export class AddressError extends EngineError {
  public override readonly kind = 'RangeError';
}

/** rule or formula-syntax violation, bad parameters */
export class ValidationError extends EngineError {
  public override readonly kind = 'ValidationError';
}

/** container parse/serialize failure or structural-invariant breach */
export class FormatError extends EngineError {
  public override readonly kind = 'FormatError';
}

/** name collision or overlapping range */
export class ConflictError extends EngineError {
  public override readonly kind = 'ConflictError';
}

/**
 * type guard
 */
export const IsEngineError = (test: unknown): test is EngineError => {
  return test instanceof EngineError;
};
