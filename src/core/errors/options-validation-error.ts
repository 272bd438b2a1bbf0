// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

/**
 * Reports every misconfiguration found while validating the server options in a single error.
 */
export class OptionsValidationError extends AdapterError {
  public constructor(public readonly errors: Error[]) {
    super(
      `invalid server options (${errors.length} ${errors.length === 1 ? 'error' : 'errors'}):\n` +
        errors.map(error => `  - ${error.message}`).join('\n'),
      undefined,
      {count: errors.length},
    );
  }
}
