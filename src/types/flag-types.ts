// SPDX-License-Identifier: Apache-2.0

import {type Duration} from '../core/time/duration.js';

/**
 * The value types a command flag can take once parsed.
 */
export interface FlagTypeMap {
  string: string;
  number: number;
  boolean: boolean;
  duration: Duration;
  array: string[];
  mapStringBool: Map<string, boolean>;
}

export type FlagType = keyof FlagTypeMap;

export interface CommandFlag<T extends FlagType = FlagType> {
  constName: string;
  name: string;
  definition: Definition<T>;
}

export interface Definition<T extends FlagType = FlagType> {
  describe: string;
  type: T;
  defaultValue?: boolean | string | number | string[];
  alias?: string;
  hidden?: boolean;
  dataMask?: string;
}
