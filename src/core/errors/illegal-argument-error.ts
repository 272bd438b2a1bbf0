// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

/**
 * A flag or option value that cannot be used; the rejected value is kept in the metadata.
 */
export class IllegalArgumentError extends AdapterError {
  public constructor(message: string, value: unknown = '', cause?: unknown) {
    super(message, cause, {value});
  }
}
