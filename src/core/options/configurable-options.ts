// SPDX-License-Identifier: Apache-2.0

import {type FlagSet} from '../flags/flag-set.js';

/**
 * One independently configurable concern of the server.
 *
 * @typeParam A - the targets `applyTo` writes into
 */
export interface ConfigurableOptions<A extends unknown[]> {
  /** every problem with the current settings, empty when they are valid */
  validate(): Error[];

  addFlags(fs: FlagSet): void;

  applyTo(...targets: A): Promise<void>;
}
