// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type AdapterLogger} from '../../../core/logging/adapter-logger.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {type Duration} from '../../../core/time/duration.js';
import {type Clientset} from '../clientset.js';
import {type ClientsetFactory} from '../clientset-factory.js';
import {type SharedInformerFactory} from '../informers/shared-informer-factory.js';
import {K8SharedInformerFactory} from '../informers/k8-shared-informer-factory.js';
import {type RestClientConfig, RestClientConfigs} from '../rest-client-config.js';
import {K8Clientset} from './k8-clientset.js';

@injectable()
export class K8ClientsetFactory implements ClientsetFactory {
  private readonly logger: AdapterLogger;

  public constructor(@inject(InjectTokens.AdapterLogger) logger?: AdapterLogger) {
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public newForConfig(config: RestClientConfig): Clientset {
    const host = K8ClientsetFactory.validate(config);
    return new K8Clientset(RestClientConfigs.toKubeConfig({...config, host}), config.userAgent);
  }

  public newSharedInformerFactory(clientset: Clientset, resyncPeriod: Duration): SharedInformerFactory {
    return new K8SharedInformerFactory(clientset, resyncPeriod, this.logger);
  }

  /**
   * Reject configurations no client could be built from
   * @param config - the client configuration
   * @returns the host, with the https scheme added when it has none
   * @throws IllegalArgumentError describing the first problem found
   */
  public static validate(config: RestClientConfig): string {
    if (!config.host) {
      throw new IllegalArgumentError('host must be set', config.host);
    }

    const host = config.host.includes('://') ? config.host : `https://${config.host}`;
    let url: URL;
    try {
      url = new URL(host);
    } catch (error) {
      throw new IllegalArgumentError(`host must be a URL or a host:port pair, got "${config.host}"`, config.host, error);
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new IllegalArgumentError(`host scheme must be http or https, got "${url.protocol}"`, config.host);
    }

    const hasToken = !!config.bearerToken || !!config.bearerTokenFile;
    const hasBasicAuth = !!config.username || !!config.password;
    if (hasToken && hasBasicAuth) {
      throw new IllegalArgumentError('username/password or bearer token may be set, but not both', config.host);
    }
    if (config.exec && config.authProvider) {
      throw new IllegalArgumentError('exec credential plugin or auth provider may be set, but not both', config.host);
    }

    if (config.qps < 0) {
      throw new IllegalArgumentError(`qps must not be negative, got ${config.qps}`, config.qps);
    }
    if (config.burst < 0) {
      throw new IllegalArgumentError(`burst must not be negative, got ${config.burst}`, config.burst);
    }

    const hasCertificate = !!config.tls.certData || !!config.tls.certFile;
    const hasKey = !!config.tls.keyData || !!config.tls.keyFile;
    if (hasCertificate !== hasKey) {
      throw new IllegalArgumentError('client certificate and key must be set together', config.host);
    }

    return host;
  }
}
