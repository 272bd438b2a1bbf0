// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from '../../../core/errors/adapter-error.js';

export class KubeApiError extends AdapterError {
  /**
   * Instantiates a new error with a message, the status code of the failed call and an optional cause.
   *
   * @param message - the error message to be reported.
   * @param statusCode - the HTTP status code returned by the API server.
   * @param cause - optional underlying cause of the error.
   * @param meta - optional metadata to be reported.
   */
  public constructor(message: string, statusCode: number, cause?: unknown, meta: Record<string, unknown> = {}) {
    super(`${message} [statusCode: ${statusCode}]`, cause, {...meta, statusCode});
  }
}
