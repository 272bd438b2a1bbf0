// SPDX-License-Identifier: Apache-2.0

import {HttpError} from '@kubernetes/client-node';
import {StatusCodes} from 'http-status-codes';
import {KubeApiError} from './errors/kube-api-error.js';

export class KubeApiResponse {
  private constructor() {}

  /**
   * Wraps a failed API call into a KubeApiError carrying the status code the server answered with.
   *
   * @param error - the error raised by the generated API client.
   * @param operation - the operation being performed, e.g. `read configmap kube-system/foo`.
   */
  public static wrap(error: unknown, operation: string): KubeApiError {
    return new KubeApiError(`failed to ${operation}`, KubeApiResponse.statusCodeOf(error), error, {operation});
  }

  public static statusCodeOf(error: unknown): number {
    if (error instanceof HttpError) {
      return +(error.statusCode ?? error.response?.statusCode ?? StatusCodes.INTERNAL_SERVER_ERROR);
    }
    if (error instanceof KubeApiError && error.statusCode !== undefined) {
      return error.statusCode;
    }
    return StatusCodes.INTERNAL_SERVER_ERROR;
  }

  public static isNotFound(error: unknown): boolean {
    return KubeApiResponse.statusCodeOf(error) === StatusCodes.NOT_FOUND;
  }

  public static isForbidden(error: unknown): boolean {
    return KubeApiResponse.statusCodeOf(error) === StatusCodes.FORBIDDEN;
  }
}
