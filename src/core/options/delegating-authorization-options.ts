// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';
import {Flags as flags} from '../../commands/flags.js';
import {type FlagSet} from '../flags/flag-set.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {type Duration} from '../time/duration.js';
import {type Authorizer} from '../auth/authorizer.js';
import {PathAuthorizer} from '../auth/path-authorizer.js';
import {PrivilegedGroupsAuthorizer} from '../auth/privileged-groups-authorizer.js';
import {SubjectAccessReviewAuthorizer} from '../auth/subject-access-review-authorizer.js';
import {UnionAuthorizer} from '../auth/union-authorizer.js';
import {defaultWebhookRetryBackoff, type WebhookRetryBackoff} from '../auth/webhook-retry-backoff.js';
import {type DelegatedClientSource, newDelegatedClient} from '../auth/delegated-client.js';
import {type AuthorizationInfo} from '../server/server-config.js';
import {type ClientsetFactory} from '../../integration/kube/clientset-factory.js';
import {type ConfigurableOptions} from './configurable-options.js';

/**
 * Authorization delegated to the core API server through SubjectAccessReviews, short-circuited for privileged
 * groups and always-allowed paths.
 */
export class DelegatingAuthorizationOptions implements ConfigurableOptions<[AuthorizationInfo]>, DelegatedClientSource {
  public remoteKubeConfigFile = '';
  public remoteKubeConfigFileOptional = false;
  public allowCacheTtl: Duration = constants.DEFAULT_WEBHOOK_CACHE_TTL;
  public denyCacheTtl: Duration = constants.DEFAULT_WEBHOOK_CACHE_TTL;
  public alwaysAllowPaths: string[] = [...constants.DEFAULT_ALWAYS_ALLOW_PATHS];
  public alwaysAllowGroups: string[] = [...constants.DEFAULT_ALWAYS_ALLOW_GROUPS];
  public webhookRetryBackoff: WebhookRetryBackoff = defaultWebhookRetryBackoff();

  private readonly clientsetFactory: ClientsetFactory;
  private readonly logger: AdapterLogger;

  public constructor(clientsetFactory?: ClientsetFactory, logger?: AdapterLogger) {
    this.clientsetFactory = patchInject(clientsetFactory, InjectTokens.ClientsetFactory, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public validate(): Error[] {
    const errors: Error[] = [];

    if (this.webhookRetryBackoff.steps <= 0) {
      errors.push(
        new IllegalArgumentError(
          `number of webhook retry attempts must be greater than 0, but is: ${this.webhookRetryBackoff.steps}`,
          this.webhookRetryBackoff.steps,
        ),
      );
    }
    if (this.allowCacheTtl.isNegative()) {
      errors.push(
        new IllegalArgumentError(
          `--${flags.authorizationWebhookCacheAuthorizedTtl.name} must not be negative`,
          this.allowCacheTtl,
        ),
      );
    }
    if (this.denyCacheTtl.isNegative()) {
      errors.push(
        new IllegalArgumentError(
          `--${flags.authorizationWebhookCacheUnauthorizedTtl.name} must not be negative`,
          this.denyCacheTtl,
        ),
      );
    }

    return errors;
  }

  public addFlags(fs: FlagSet): void {
    fs.add(flags.authorizationKubeconfig, value => (this.remoteKubeConfigFile = value));
    fs.add(flags.authorizationWebhookCacheAuthorizedTtl, value => (this.allowCacheTtl = value));
    fs.add(flags.authorizationWebhookCacheUnauthorizedTtl, value => (this.denyCacheTtl = value));
    fs.add(flags.authorizationAlwaysAllowPaths, value => (this.alwaysAllowPaths = value));
  }

  public async applyTo(authorizationInfo: AuthorizationInfo): Promise<void> {
    const client = newDelegatedClient(this, this.clientsetFactory, this.logger, 'authorization');

    const authorizers: Authorizer[] = [];
    if (this.alwaysAllowGroups.length > 0) {
      authorizers.push(new PrivilegedGroupsAuthorizer(this.alwaysAllowGroups));
    }
    if (this.alwaysAllowPaths.length > 0) {
      authorizers.push(new PathAuthorizer(this.alwaysAllowPaths));
    }
    if (client) {
      authorizers.push(
        new SubjectAccessReviewAuthorizer(
          client.subjectAccessReviews(),
          this.allowCacheTtl,
          this.denyCacheTtl,
          this.webhookRetryBackoff,
        ),
      );
    } else {
      this.logger.warn('No authorization-kubeconfig provided, so SubjectAccessReview authorization won\'t work.');
    }

    authorizationInfo.authorizer = new UnionAuthorizer(authorizers);
  }
}
