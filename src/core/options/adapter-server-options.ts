// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';
import {type FlagSet} from '../flags/flag-set.js';
import {OptionsApplyError} from '../errors/options-apply-error.js';
import {errorMessage} from '../helpers.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {type CertificateGenerator} from '../certificates/certificate-generator.js';
import {type OpenApiConfig, type OpenApiV3Config} from '../server/openapi-config.js';
import {type ServerConfig} from '../server/server-config.js';
import {type Clientset} from '../../integration/kube/clientset.js';
import {type ClientsetFactory} from '../../integration/kube/clientset-factory.js';
import {type SharedInformerFactory} from '../../integration/kube/informers/shared-informer-factory.js';
import {type RestClientConfig, RestClientConfigs} from '../../integration/kube/rest-client-config.js';
import {ApplyStep} from './apply-step.js';
import {AuditOptions} from './audit-options.js';
import {DelegatingAuthenticationOptions} from './delegating-authentication-options.js';
import {DelegatingAuthorizationOptions} from './delegating-authorization-options.js';
import {FeatureOptions} from './feature-options.js';
import {SecureServingOptions, type SecureServingOptionsWithLoopback} from './secure-serving-options.js';

interface PipelineStep {
  step: ApplyStep;
  /** prefixed to the cause's message, the cause's message alone when omitted */
  failure?: string;
  run: () => Promise<void>;
}

/**
 * The options of the metrics API server: secure serving with a loopback client, delegated authentication and
 * authorization, auditing and server features, plus the OpenAPI documents to publish.
 */
export class AdapterServerOptions {
  public readonly secureServing: SecureServingOptionsWithLoopback;
  public readonly authentication: DelegatingAuthenticationOptions;
  public readonly authorization: DelegatingAuthorizationOptions;
  public readonly audit: AuditOptions;
  public readonly features: FeatureOptions;

  public openApiConfig?: OpenApiConfig;
  public openApiV3Config?: OpenApiV3Config;
  public enableMetrics = true;

  private readonly clientsetFactory: ClientsetFactory;
  private readonly logger: AdapterLogger;

  public constructor(
    clientsetFactory?: ClientsetFactory,
    certificateGenerator?: CertificateGenerator,
    logger?: AdapterLogger,
  ) {
    this.clientsetFactory = patchInject(clientsetFactory, InjectTokens.ClientsetFactory, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
    const generator = patchInject(certificateGenerator, InjectTokens.CertificateGenerator, this.constructor.name);

    this.secureServing = new SecureServingOptions(generator, this.logger).withLoopback();
    this.authentication = new DelegatingAuthenticationOptions(this.clientsetFactory, this.logger);
    this.authorization = new DelegatingAuthorizationOptions(this.clientsetFactory, this.logger);
    this.audit = new AuditOptions(this.logger);
    this.features = new FeatureOptions(this.logger);
  }

  public validate(): Error[] {
    return [
      ...this.secureServing.validate(),
      ...this.authentication.validate(),
      ...this.authorization.validate(),
      ...this.audit.validate(),
      ...this.features.validate(),
    ];
  }

  public addFlags(fs: FlagSet): void {
    this.secureServing.addFlags(fs);
    this.authentication.addFlags(fs);
    this.authorization.addFlags(fs);
    this.audit.addFlags(fs);
    this.features.addFlags(fs);
  }

  /**
   * Apply every option onto the server configuration. Steps run one after the other and the first failure stops
   * the pipeline; whatever earlier steps wrote stays in `config`.
   * @param config - the server configuration to fill in
   * @param clientConfig - how to reach the cluster the adapter reads from
   * @throws OptionsApplyError naming the step that failed
   */
  public async applyTo(config: ServerConfig, clientConfig: RestClientConfig): Promise<void> {
    let clientset: Clientset | undefined;
    let informerFactory: SharedInformerFactory | undefined;

    const steps: PipelineStep[] = [
      {
        step: ApplyStep.CERTIFICATE_GENERATION,
        failure: 'error creating self-signed certificates',
        // TODO use an advertised address once the server has one
        run: () =>
          this.secureServing.maybeDefaultWithSelfSignedCerts(
            constants.SELF_SIGNED_CERT_PUBLIC_ADDRESS,
            [],
            [...constants.SELF_SIGNED_CERT_ALTERNATE_IPS],
          ),
      },
      {step: ApplyStep.SECURE_SERVING, run: () => this.secureServing.applyTo(config)},
      {
        step: ApplyStep.AUTHENTICATION,
        run: () => this.authentication.applyTo(config.authentication, config.secureServing, undefined),
      },
      {step: ApplyStep.AUTHORIZATION, run: () => this.authorization.applyTo(config.authorization)},
      {step: ApplyStep.AUDIT, run: () => this.audit.applyTo(config)},
      {
        step: ApplyStep.CLIENT_CONSTRUCTION,
        failure: 'failed to create real external clientset',
        run: async () => {
          this.logger.debug('serverConfig.clientConfig:', RestClientConfigs.redacted(clientConfig));
          clientset = this.clientsetFactory.newForConfig(clientConfig);
          informerFactory = this.clientsetFactory.newSharedInformerFactory(clientset, constants.INFORMER_RESYNC_PERIOD);
        },
      },
      {
        step: ApplyStep.FEATURES,
        run: async () => {
          if (clientset && informerFactory) {
            await this.features.applyTo(config, clientset, informerFactory);
          }
        },
      },
    ];

    for (const {step, failure, run} of steps) {
      try {
        await run();
      } catch (error) {
        const message = failure ? `${failure}: ${errorMessage(error)}` : errorMessage(error);
        throw new OptionsApplyError(step, message, error);
      }
    }

    if (this.openApiConfig) {
      config.openApiConfig = this.openApiConfig;
    }
    if (this.openApiV3Config) {
      config.openApiV3Config = this.openApiV3Config;
    }

    config.enableMetrics = this.enableMetrics;
  }
}
