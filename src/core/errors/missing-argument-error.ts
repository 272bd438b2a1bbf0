// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

/** An option that another option depends on was left empty */
export class MissingArgumentError extends AdapterError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
