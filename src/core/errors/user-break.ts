// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

/**
 * Stops the entrypoint without a failure, e.g. after printing the version or the help text.
 */
export class UserBreak extends AdapterError {
  public constructor(message: string) {
    super(message);
  }
}
