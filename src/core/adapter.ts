// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../commands/flags.js';
import {type FlagSet} from './flags/flag-set.js';
import {AdapterError} from './errors/adapter-error.js';
import {OptionsValidationError} from './errors/options-validation-error.js';
import {errorMessage} from './helpers.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type AdapterLogger} from './logging/adapter-logger.js';
import {type CertificateGenerator} from './certificates/certificate-generator.js';
import {ServerConfig} from './server/server-config.js';
import {type ClientsetFactory} from '../integration/kube/clientset-factory.js';
import {type RestClientConfig, RestClientConfigs} from '../integration/kube/rest-client-config.js';
import {AdapterServerOptions} from './options/adapter-server-options.js';

/**
 * Builds the server configuration of the metrics adapter once from its options and hands out the cached result.
 */
@injectable()
export class Adapter {
  public readonly options: AdapterServerOptions;
  /** kubeconfig of the cluster the adapter reads from, the in-cluster configuration is used when empty */
  public remoteKubeConfigFile = '';

  private readonly logger: AdapterLogger;
  private serverConfig?: Promise<ServerConfig>;

  public constructor(
    @inject(InjectTokens.ClientsetFactory) clientsetFactory?: ClientsetFactory,
    @inject(InjectTokens.CertificateGenerator) certificateGenerator?: CertificateGenerator,
    @inject(InjectTokens.AdapterLogger) logger?: AdapterLogger,
  ) {
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
    this.options = new AdapterServerOptions(
      patchInject(clientsetFactory, InjectTokens.ClientsetFactory, this.constructor.name),
      patchInject(certificateGenerator, InjectTokens.CertificateGenerator, this.constructor.name),
      this.logger,
    );
  }

  public addFlags(fs: FlagSet): void {
    this.options.addFlags(fs);
    fs.add(flags.listerKubeconfig, value => (this.remoteKubeConfigFile = value));
  }

  /**
   * The configuration of the cluster the adapter reads metrics from
   * @throws AdapterError if neither a kubeconfig file nor an in-cluster configuration is available
   */
  public clientConfig(): RestClientConfig {
    try {
      return this.remoteKubeConfigFile
        ? RestClientConfigs.fromKubeConfigFile(this.remoteKubeConfigFile)
        : RestClientConfigs.inCluster();
    } catch (error) {
      throw new AdapterError(
        `unable to construct lister client config to initialize provider: ${errorMessage(error)}`,
        error,
      );
    }
  }

  /**
   * Validate the options and apply them onto a new server configuration; later calls return the same result
   * @throws OptionsValidationError listing every invalid option
   * @throws OptionsApplyError naming the step that failed
   */
  public async config(): Promise<ServerConfig> {
    if (!this.serverConfig) {
      this.serverConfig = this.buildConfig();
    }
    return this.serverConfig;
  }

  private async buildConfig(): Promise<ServerConfig> {
    const errors = this.options.validate();
    if (errors.length > 0) {
      throw new OptionsValidationError(errors);
    }

    const clientConfig = this.clientConfig();
    const config = new ServerConfig();
    await this.options.applyTo(config, clientConfig);
    this.logger.debug('server configuration applied');
    return config;
  }
}
