// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {type AuthorizationAttributes, isResourceRequest} from './authorization-attributes.js';
import {type AuthorizationResult, type Authorizer, Decision} from './authorizer.js';

/**
 * Allows non-resource requests to a fixed set of paths. A path ending in `*` allows every path it prefixes.
 */
export class PathAuthorizer implements Authorizer {
  private readonly paths = new Set<string>();
  private readonly prefixes: string[] = [];

  /**
   * @param alwaysAllowPaths - the allowed paths
   * @throws IllegalArgumentError if a path has a `*` anywhere but at its end
   */
  public constructor(alwaysAllowPaths: string[]) {
    for (const path of alwaysAllowPaths.map(p => p.replace(/^\//, ''))) {
      if (path.length === 0) {
        this.paths.add(path);
        continue;
      }
      if (path.slice(0, -1).includes('*')) {
        throw new IllegalArgumentError(`only trailing * allowed in "${path}"`, path);
      }
      if (path.endsWith('*')) {
        this.prefixes.push(path.slice(0, -1));
      } else {
        this.paths.add(path);
      }
    }
  }

  public async authorize(attributes: AuthorizationAttributes): Promise<AuthorizationResult> {
    if (isResourceRequest(attributes)) {
      return {decision: Decision.NO_OPINION, reason: ''};
    }

    const path = attributes.path.replace(/^\//, '');
    if (this.paths.has(path) || this.prefixes.some(prefix => path.startsWith(prefix))) {
      return {decision: Decision.ALLOW, reason: ''};
    }
    return {decision: Decision.NO_OPINION, reason: ''};
  }
}
