// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';
import {Flags as flags} from '../../commands/flags.js';
import {type FlagSet} from '../flags/flag-set.js';
import {AdapterError} from '../errors/adapter-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {blankEntries, errorMessage} from '../helpers.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {type Duration} from '../time/duration.js';
import {CaBundle} from '../certificates/ca-bundle.js';
import {type Authenticator} from '../auth/authenticator.js';
import {ClientCertAuthenticator} from '../auth/client-cert-authenticator.js';
import {DelegatingAuthenticator} from '../auth/delegating-authenticator.js';
import {type RequestHeaderConfig, RequestHeaderAuthenticator} from '../auth/request-header-authenticator.js';
import {TokenReviewAuthenticator} from '../auth/token-review-authenticator.js';
import {defaultWebhookRetryBackoff, type WebhookRetryBackoff} from '../auth/webhook-retry-backoff.js';
import {type DelegatedClientSource, newDelegatedClient} from '../auth/delegated-client.js';
import {type AuthenticationInfo, type SecureServingInfo} from '../server/server-config.js';
import {type Clientset} from '../../integration/kube/clientset.js';
import {type ClientsetFactory} from '../../integration/kube/clientset-factory.js';
import {KubeApiResponse} from '../../integration/kube/kube-api-response.js';
import {type ConfigurableOptions} from './configurable-options.js';

// keys of the authentication config map published by the core API server
const CLIENT_CA_KEY = 'client-ca-file';
const REQUEST_HEADER_CA_KEY = 'requestheader-client-ca-file';
const REQUEST_HEADER_USERNAME_HEADERS_KEY = 'requestheader-username-headers';
const REQUEST_HEADER_GROUP_HEADERS_KEY = 'requestheader-group-headers';
const REQUEST_HEADER_EXTRA_HEADER_PREFIXES_KEY = 'requestheader-extra-headers-prefix';
const REQUEST_HEADER_ALLOWED_NAMES_KEY = 'requestheader-allowed-names';

export interface RequestHeaderOptions {
  usernameHeaders: string[];
  groupHeaders: string[];
  extraHeaderPrefixes: string[];
  clientCaFile: string;
  allowedNames: string[];
}

export type AudiencesGetter = () => string[];

/**
 * Authentication delegated to the core API server: client certificates, an authenticating front proxy, and bearer
 * tokens checked with TokenReviews. Settings missing on the command line are looked up in the
 * `kube-system/extension-apiserver-authentication` config map.
 */
export class DelegatingAuthenticationOptions
  implements ConfigurableOptions<[AuthenticationInfo, SecureServingInfo | undefined, AudiencesGetter | undefined]>,
    DelegatedClientSource
{
  public remoteKubeConfigFile = '';
  public remoteKubeConfigFileOptional = false;
  public skipInClusterLookup = false;
  public tolerateInClusterLookupFailure = false;
  public cacheTtl: Duration = constants.DEFAULT_WEBHOOK_CACHE_TTL;
  public webhookRetryBackoff: WebhookRetryBackoff = defaultWebhookRetryBackoff();
  public anonymous = true;
  public clientCaFile = '';
  public requestHeader: RequestHeaderOptions = {
    usernameHeaders: ['x-remote-user'],
    groupHeaders: ['x-remote-group'],
    extraHeaderPrefixes: ['x-remote-extra-'],
    clientCaFile: '',
    allowedNames: [],
  };

  private readonly clientsetFactory: ClientsetFactory;
  private readonly logger: AdapterLogger;

  public constructor(clientsetFactory?: ClientsetFactory, logger?: AdapterLogger) {
    this.clientsetFactory = patchInject(clientsetFactory, InjectTokens.ClientsetFactory, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public validate(): Error[] {
    const errors: Error[] = [];

    const headerLists: [string, string[]][] = [
      [flags.requestHeaderUsernameHeaders.name, this.requestHeader.usernameHeaders],
      [flags.requestHeaderGroupHeaders.name, this.requestHeader.groupHeaders],
      [flags.requestHeaderExtraHeadersPrefix.name, this.requestHeader.extraHeaderPrefixes],
      [flags.requestHeaderAllowedNames.name, this.requestHeader.allowedNames],
    ];
    for (const [name, values] of headerLists) {
      if (blankEntries(values).length > 0) {
        errors.push(new IllegalArgumentError(`empty value in "${name}"`, values));
      }
    }

    if (this.cacheTtl.isNegative()) {
      errors.push(
        new IllegalArgumentError(`--${flags.authenticationTokenWebhookCacheTtl.name} must not be negative`, this.cacheTtl),
      );
    }

    if (this.webhookRetryBackoff.steps <= 0) {
      errors.push(
        new IllegalArgumentError(
          `number of webhook retry attempts must be greater than 0, but is: ${this.webhookRetryBackoff.steps}`,
          this.webhookRetryBackoff.steps,
        ),
      );
    }

    return errors;
  }

  public addFlags(fs: FlagSet): void {
    fs.add(flags.authenticationKubeconfig, value => (this.remoteKubeConfigFile = value));
    fs.add(flags.authenticationSkipLookup, value => (this.skipInClusterLookup = value));
    fs.add(flags.authenticationTokenWebhookCacheTtl, value => (this.cacheTtl = value));
    fs.add(flags.authenticationTolerateLookupFailure, value => (this.tolerateInClusterLookupFailure = value));
    fs.add(flags.clientCaFile, value => (this.clientCaFile = value));
    fs.add(flags.requestHeaderUsernameHeaders, value => (this.requestHeader.usernameHeaders = value));
    fs.add(flags.requestHeaderGroupHeaders, value => (this.requestHeader.groupHeaders = value));
    fs.add(flags.requestHeaderExtraHeadersPrefix, value => (this.requestHeader.extraHeaderPrefixes = value));
    fs.add(flags.requestHeaderClientCaFile, value => (this.requestHeader.clientCaFile = value));
    fs.add(flags.requestHeaderAllowedNames, value => (this.requestHeader.allowedNames = value));
  }

  /**
   * Install the delegating authenticator
   * @param authenticationInfo - receives the authenticator and the request header configuration
   * @param servingInfo - receives the client CA, when serving is enabled
   * @param audiences - the audiences bearer tokens must be issued for, none when omitted
   */
  public async applyTo(
    authenticationInfo: AuthenticationInfo,
    servingInfo: SecureServingInfo | undefined,
    audiences: AudiencesGetter | undefined,
  ): Promise<void> {
    const client = newDelegatedClient(this, this.clientsetFactory, this.logger, 'authentication');

    let clientCA = this.clientCaFile ? CaBundle.fromFile(this.clientCaFile) : undefined;
    let requestHeaderCA = this.requestHeader.clientCaFile
      ? CaBundle.fromFile(this.requestHeader.clientCaFile)
      : undefined;

    if (!this.skipInClusterLookup) {
      try {
        const lookedUp = await this.lookupMissingConfigInCluster(client, clientCA, requestHeaderCA);
        clientCA = clientCA ?? lookedUp.clientCA;
        requestHeaderCA = requestHeaderCA ?? lookedUp.requestHeaderCA;
      } catch (error) {
        if (!this.tolerateInClusterLookupFailure) {
          throw new AdapterError(
            `unable to load configmap based request-header-client-ca-file: ${errorMessage(error)}`,
            error,
          );
        }
        this.logger.warn(`Error looking up in-cluster authentication configuration: ${errorMessage(error)}`);
        this.logger.warn('Continuing without authentication configuration. This may treat all requests as anonymous.');
        this.logger.warn(
          `To require authentication configuration lookup to succeed, set --${flags.authenticationTolerateLookupFailure.name}=false`,
        );
      }
    }

    if (clientCA && servingInfo) {
      servingInfo.clientCA = servingInfo.clientCA ? servingInfo.clientCA.merge(clientCA) : clientCA;
    }

    const authenticators: Authenticator[] = [];
    if (requestHeaderCA) {
      const requestHeaderConfig: RequestHeaderConfig = {
        usernameHeaders: [...this.requestHeader.usernameHeaders],
        groupHeaders: [...this.requestHeader.groupHeaders],
        extraHeaderPrefixes: [...this.requestHeader.extraHeaderPrefixes],
        clientCA: requestHeaderCA,
        allowedClientNames: [...this.requestHeader.allowedNames],
      };
      authenticationInfo.requestHeaderConfig = requestHeaderConfig;
      authenticators.push(new RequestHeaderAuthenticator(requestHeaderConfig));
    }
    if (clientCA) {
      authenticators.push(new ClientCertAuthenticator(clientCA));
    }
    if (client) {
      authenticators.push(
        new TokenReviewAuthenticator(client.tokenReviews(), this.cacheTtl, this.webhookRetryBackoff, audiences),
      );
    }

    authenticationInfo.apiAudiences = audiences ? audiences() : [];
    authenticationInfo.authenticator = new DelegatingAuthenticator(authenticators, this.anonymous);
  }

  private async lookupMissingConfigInCluster(
    client: Clientset | undefined,
    clientCA: CaBundle | undefined,
    requestHeaderCA: CaBundle | undefined,
  ): Promise<{clientCA?: CaBundle; requestHeaderCA?: CaBundle}> {
    if (clientCA && requestHeaderCA) {
      return {};
    }

    const configMap = `configmap/${constants.AUTHENTICATION_CONFIGMAP_NAME} in ${constants.AUTHENTICATION_CONFIGMAP_NAMESPACE}`;
    if (!client) {
      if (!clientCA) {
        this.logger.warn(
          `No authentication-kubeconfig provided in order to lookup ${CLIENT_CA_KEY} in ${configMap}, so client certificate authentication won't work.`,
        );
      }
      if (!requestHeaderCA) {
        this.logger.warn(
          `No authentication-kubeconfig provided in order to lookup ${REQUEST_HEADER_CA_KEY} in ${configMap}, so request-header client certificate authentication won't work.`,
        );
      }
      return {};
    }

    let data: Record<string, string> | undefined;
    try {
      data = await client
        .configMaps()
        .read(constants.AUTHENTICATION_CONFIGMAP_NAMESPACE, constants.AUTHENTICATION_CONFIGMAP_NAME);
    } catch (error) {
      if (KubeApiResponse.isForbidden(error)) {
        this.logger.warn(
          `Unable to get ${configMap}. Usually fixed by 'kubectl create rolebinding -n ${constants.AUTHENTICATION_CONFIGMAP_NAMESPACE} ROLEBINDING_NAME --role=${constants.AUTHENTICATION_READER_ROLE_NAME} --serviceaccount=YOUR_NS:YOUR_SA'`,
        );
      }
      throw error;
    }
    if (!data) {
      this.logger.debug(`${configMap} not found, leaving authentication configuration as given`);
      return {};
    }

    const result: {clientCA?: CaBundle; requestHeaderCA?: CaBundle} = {};
    if (!clientCA && data[CLIENT_CA_KEY]) {
      result.clientCA = CaBundle.fromPem(`${configMap}::${CLIENT_CA_KEY}`, data[CLIENT_CA_KEY]);
    }
    if (!requestHeaderCA && data[REQUEST_HEADER_CA_KEY]) {
      result.requestHeaderCA = CaBundle.fromPem(`${configMap}::${REQUEST_HEADER_CA_KEY}`, data[REQUEST_HEADER_CA_KEY]);
      this.requestHeader.usernameHeaders = DelegatingAuthenticationOptions.stringList(
        data,
        REQUEST_HEADER_USERNAME_HEADERS_KEY,
      );
      this.requestHeader.groupHeaders = DelegatingAuthenticationOptions.stringList(data, REQUEST_HEADER_GROUP_HEADERS_KEY);
      this.requestHeader.extraHeaderPrefixes = DelegatingAuthenticationOptions.stringList(
        data,
        REQUEST_HEADER_EXTRA_HEADER_PREFIXES_KEY,
      );
      this.requestHeader.allowedNames = DelegatingAuthenticationOptions.stringList(data, REQUEST_HEADER_ALLOWED_NAMES_KEY);
    }
    return result;
  }

  /** Config map lists are JSON encoded string arrays */
  private static stringList(data: Record<string, string>, key: string): string[] {
    const raw = data[key];
    if (!raw) {
      return [];
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new IllegalArgumentError(`invalid value for ${key}: ${errorMessage(error)}`, raw, error);
    }
    if (!Array.isArray(parsed) || !parsed.every((value): value is string => typeof value === 'string')) {
      throw new IllegalArgumentError(`invalid value for ${key}: expected a list of strings`, raw);
    }
    return parsed;
  }
}
