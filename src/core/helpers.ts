// SPDX-License-Identifier: Apache-2.0

import {type Duration} from './time/duration.js';

export function sleep(duration: Duration) {
  return new Promise<void>(resolve => {
    setTimeout(resolve, duration.toMillis());
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** the entries of `values` that are empty once trimmed */
export function blankEntries(values: string[]): string[] {
  return values.filter(value => value.trim().length === 0);
}
