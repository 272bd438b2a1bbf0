// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export enum PreRelease {
  ALPHA = 'ALPHA',
  BETA = 'BETA',
  GA = '',
  DEPRECATED = 'DEPRECATED',
}

export interface FeatureSpec {
  default: boolean;
  preRelease: PreRelease;
  /** the feature can no longer be toggled */
  lockToDefault?: boolean;
}

export const API_PRIORITY_AND_FAIRNESS = 'APIPriorityAndFairness';
export const API_RESPONSE_COMPRESSION = 'APIResponseCompression';
export const API_LIST_CHUNKING = 'APIListChunking';
export const OPENAPI_ENUMS = 'OpenAPIEnums';
export const STRUCTURED_AUTHORIZATION_CONFIGURATION = 'StructuredAuthorizationConfiguration';

export const KNOWN_FEATURES: Readonly<Record<string, FeatureSpec>> = {
  [API_PRIORITY_AND_FAIRNESS]: {default: true, preRelease: PreRelease.GA},
  [API_RESPONSE_COMPRESSION]: {default: true, preRelease: PreRelease.BETA},
  [API_LIST_CHUNKING]: {default: true, preRelease: PreRelease.GA, lockToDefault: true},
  [OPENAPI_ENUMS]: {default: true, preRelease: PreRelease.BETA},
  [STRUCTURED_AUTHORIZATION_CONFIGURATION]: {default: false, preRelease: PreRelease.ALPHA},
};

/**
 * Named boolean toggles: every known feature has a default, which explicit settings override.
 */
export class FeatureGate {
  private readonly known: Map<string, FeatureSpec>;

  /**
   * @param settings - explicit feature settings
   * @param known - the features this gate knows of
   * @throws IllegalArgumentError if a setting names an unknown feature or changes a locked one
   */
  public constructor(
    private readonly settings: ReadonlyMap<string, boolean> = new Map(),
    known: Readonly<Record<string, FeatureSpec>> = KNOWN_FEATURES,
  ) {
    this.known = new Map(Object.entries(known));
    const [error] = FeatureGate.check(settings, this.known);
    if (error) {
      throw error;
    }
  }

  /**
   * Check explicit settings against the known features
   * @returns one error per setting that names an unknown feature or changes a locked one
   */
  public static validate(
    settings: ReadonlyMap<string, boolean>,
    known: Readonly<Record<string, FeatureSpec>> = KNOWN_FEATURES,
  ): IllegalArgumentError[] {
    return FeatureGate.check(settings, new Map(Object.entries(known)));
  }

  public enabled(feature: string): boolean {
    const spec = this.known.get(feature);
    if (!spec) {
      throw new IllegalArgumentError(`feature "${feature}" is not registered in the feature gate`, feature);
    }
    return this.settings.get(feature) ?? spec.default;
  }

  public knownFeatures(): string[] {
    return [...this.known.entries()].map(([name, spec]) => {
      const stage = spec.preRelease === PreRelease.GA ? '' : `${spec.preRelease} - `;
      return `${name}=true|false (${stage}default=${spec.default})`;
    });
  }

  /** the explicit settings, sorted by name, as `A=true,B=false` */
  public toString(): string {
    return [...this.settings.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, value]) => `${name}=${value}`)
      .join(',');
  }

  private static check(settings: ReadonlyMap<string, boolean>, known: Map<string, FeatureSpec>): IllegalArgumentError[] {
    const errors: IllegalArgumentError[] = [];
    for (const [name, value] of settings) {
      const spec = known.get(name);
      if (!spec) {
        errors.push(new IllegalArgumentError(`unrecognized feature gate: ${name}`, name));
      } else if (spec.lockToDefault && value !== spec.default) {
        errors.push(
          new IllegalArgumentError(`cannot set feature gate ${name} to ${value}, feature is locked to ${spec.default}`, name),
        );
      }
    }
    return errors;
  }
}
