// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

/**
 * Loaded data (a certificate, a CA bundle, an audit policy, a config map entry) is not what it should be.
 */
export class DataValidationError extends AdapterError {
  /**
   * @param message - error message
   * @param expected - what the data should have held, kept in the metadata
   * @param found - what it held instead, kept in the metadata
   * @param cause - source error (if any)
   */
  public constructor(message: string, expected: unknown, found: unknown, cause?: unknown) {
    super(message, cause, {expected, found});
  }
}
