// SPDX-License-Identifier: Apache-2.0

import {type Argv, type Options} from 'yargs';
import {type CommandFlag, type FlagType, type FlagTypeMap} from '../../types/flag-types.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {Duration} from '../time/duration.js';

type FlagConverters = {[K in FlagType]: (flag: CommandFlag<K>, raw: unknown) => FlagTypeMap[K]};

interface FlagBinding {
  flag: CommandFlag;
  bind: (raw: unknown) => void;
}

/** A flag repeated on the command line arrives as an array, the last occurrence wins */
function lastValue(raw: unknown): unknown {
  return Array.isArray(raw) ? raw.at(-1) : raw;
}

function invalidValue(flag: CommandFlag, raw: unknown, reason: string, cause?: unknown): IllegalArgumentError {
  return new IllegalArgumentError(`invalid argument "${String(raw)}" for "--${flag.name}" flag: ${reason}`, raw, cause);
}

function parseBoolean(flag: CommandFlag, raw: unknown): boolean {
  const value = lastValue(raw);
  if (value === true || value === 'true') {
    return true;
  }
  if (value === false || value === 'false') {
    return false;
  }
  throw invalidValue(flag, value, 'expected true or false');
}

const converters: FlagConverters = {
  string: (_flag, raw) => `${lastValue(raw)}`, // force convert to string
  number: (flag, raw) => {
    const value = Number(lastValue(raw));
    if (Number.isNaN(value)) {
      throw invalidValue(flag, lastValue(raw), 'expected a number');
    }
    return value;
  },
  boolean: parseBoolean,
  duration: (flag, raw) => {
    try {
      return Duration.parse(`${lastValue(raw)}`);
    } catch (error) {
      throw invalidValue(flag, lastValue(raw), 'expected a duration such as 10s or 1m30s', error);
    }
  },
  array: (_flag, raw) =>
    (Array.isArray(raw) ? raw : [raw])
      .flatMap(value => `${value}`.split(','))
      .map(value => value.trim())
      .filter(value => value.length > 0),
  mapStringBool: (flag, raw) => {
    const result = new Map<string, boolean>();
    const entries = (Array.isArray(raw) ? raw : [raw]).flatMap(value => `${value}`.split(','));
    for (const entry of entries.map(value => value.trim()).filter(value => value.length > 0)) {
      const separator = entry.indexOf('=');
      if (separator <= 0) {
        throw invalidValue(flag, entry, 'expected key=true|false pairs');
      }
      result.set(entry.slice(0, separator).trim(), parseBoolean(flag, entry.slice(separator + 1).trim()));
    }
    return result;
  },
};

/**
 * The registration target every option set adds its flags to.
 *
 * Each flag is registered together with a binding that stores the parsed value on the owning options object, so the
 * options keep their defaults for every flag the user does not supply.
 */
export class FlagSet {
  private readonly bindings = new Map<string, FlagBinding>();
  private readonly supplied = new Set<string>();

  public constructor(public readonly name: string) {}

  /**
   * Register a flag; a later registration under the same name replaces the earlier one
   * @param flag - the flag definition
   * @param bind - receives the converted value when the flag is supplied
   */
  public add<T extends FlagType>(flag: CommandFlag<T>, bind: (value: FlagTypeMap[T]) => void): void {
    const convert = converters[flag.definition.type];
    this.bindings.set(flag.name, {flag, bind: raw => bind(convert(flag, raw))});
  }

  public has(name: string): boolean {
    return this.bindings.has(name);
  }

  public names(): string[] {
    return [...this.bindings.keys()];
  }

  public flags(): CommandFlag[] {
    return [...this.bindings.values()].map(binding => binding.flag);
  }

  /**
   * Declare every registered flag as an option of the given yargs instance
   * @param y - instance of yargs
   */
  public applyTo(y: Argv): void {
    for (const {flag} of this.bindings.values()) {
      y.option(flag.name, FlagSet.toYargsOption(flag));
    }
  }

  /**
   * Convert and bind the value of every registered flag present in the parsed arguments
   * @param argv - the arguments parsed by yargs
   * @throws IllegalArgumentError if a value cannot be converted to the type of its flag
   */
  public parse(argv: Record<string, unknown>): void {
    for (const [name, binding] of this.bindings) {
      const raw = argv[name];
      if (raw === undefined) {
        continue;
      }
      binding.bind(raw);
      this.supplied.add(name);
    }
  }

  public wasSupplied(name: string): boolean {
    return this.supplied.has(name);
  }

  /**
   * Render the supplied flags for logging, masking the values of flags that carry a data mask
   * @param argv - the arguments parsed by yargs
   */
  public describeSupplied(argv: Record<string, unknown>): string {
    return [...this.supplied]
      .map(name => {
        const binding = this.bindings.get(name);
        const dataMask = binding?.flag.definition.dataMask;
        return `${name}=${dataMask ?? String(argv[name])}`;
      })
      .join(', ');
  }

  private static toYargsOption(flag: CommandFlag): Options {
    const {describe, alias, hidden, defaultValue, dataMask} = flag.definition;
    const option: Options = {describe, alias, hidden};

    switch (flag.definition.type) {
      case 'boolean': {
        option.type = 'boolean';
        break;
      }
      case 'number': {
        option.type = 'number';
        break;
      }
      default: {
        option.type = 'string';
      }
    }

    if (defaultValue !== undefined && defaultValue !== '') {
      option.defaultDescription = dataMask ?? (Array.isArray(defaultValue) ? defaultValue.join(',') : `${defaultValue}`);
    }

    return option;
  }
}
