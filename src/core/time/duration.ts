// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

const MILLIS_PER_UNIT: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|h|m|s)/;

/**
 * An amount of time with millisecond resolution, such as cache TTLs and informer resync periods.
 *
 * Durations are written the way Kubernetes components take them on the command line: a sequence of decimal numbers,
 * each with a unit suffix, such as "300ms", "10s" or "1h30m". A bare "0" is also accepted.
 *
 * This is a value-based class; compare instances with {@link Duration.equals}.
 */
export class Duration {
  /**
   * A constant for a duration of zero.
   */
  public static readonly ZERO = new Duration(0);

  private constructor(private readonly millis: number) {}

  public static ofMillis(millis: number): Duration {
    return millis === 0 ? Duration.ZERO : new Duration(Math.trunc(millis));
  }

  public static ofSeconds(seconds: number): Duration {
    return Duration.ofMillis(seconds * MILLIS_PER_UNIT.s);
  }

  public static ofMinutes(minutes: number): Duration {
    return Duration.ofMillis(minutes * MILLIS_PER_UNIT.m);
  }

  public static ofHours(hours: number): Duration {
    return Duration.ofMillis(hours * MILLIS_PER_UNIT.h);
  }

  /**
   * Parses a duration string such as "10s", "-1m" or "1h2m3.5s".
   *
   * @param text - the duration text
   * @throws IllegalArgumentError if the text is not a valid duration
   */
  public static parse(text: string): Duration {
    let rest = text.trim();
    let sign = 1;
    if (rest.startsWith('-') || rest.startsWith('+')) {
      sign = rest.startsWith('-') ? -1 : 1;
      rest = rest.slice(1);
    }

    if (rest === '0') {
      return Duration.ZERO;
    }
    if (rest === '') {
      throw new IllegalArgumentError(`invalid duration "${text}"`, text);
    }

    let total = 0;
    while (rest.length > 0) {
      const match = DURATION_PATTERN.exec(rest);
      if (!match) {
        throw new IllegalArgumentError(`invalid duration "${text}"`, text);
      }
      total += Number.parseFloat(match[1]) * MILLIS_PER_UNIT[match[2]];
      rest = rest.slice(match[0].length);
    }

    return Duration.ofMillis(sign * total);
  }

  public isZero(): boolean {
    return this.millis === 0;
  }

  public isNegative(): boolean {
    return this.millis < 0;
  }

  public toMillis(): number {
    return this.millis;
  }

  public toSeconds(): number {
    return this.millis / MILLIS_PER_UNIT.s;
  }

  public equals(other: Duration): boolean {
    return this.millis === other.millis;
  }

  /**
   * Formats the duration the way it is parsed, using the largest units first, for example "1h30m0s" or "250ms".
   */
  public toString(): string {
    if (this.millis === 0) {
      return '0s';
    }

    const sign = this.millis < 0 ? '-' : '';
    let remaining = Math.abs(this.millis);
    if (remaining < MILLIS_PER_UNIT.s) {
      return `${sign}${remaining}ms`;
    }

    let text = '';
    const hours = Math.floor(remaining / MILLIS_PER_UNIT.h);
    remaining -= hours * MILLIS_PER_UNIT.h;
    const minutes = Math.floor(remaining / MILLIS_PER_UNIT.m);
    remaining -= minutes * MILLIS_PER_UNIT.m;
    const seconds = remaining / MILLIS_PER_UNIT.s;

    if (hours > 0) {
      text += `${hours}h`;
    }
    if (hours > 0 || minutes > 0) {
      text += `${minutes}m`;
    }
    text += `${seconds}s`;

    return sign + text;
  }
}
