// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../../commands/flags.js';
import {type FlagSet} from '../flags/flag-set.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {API_PRIORITY_AND_FAIRNESS, FeatureGate} from '../features/feature-gate.js';
import {FlowControl} from '../flowcontrol/flow-control.js';
import {type ServerConfig} from '../server/server-config.js';
import {type Clientset} from '../../integration/kube/clientset.js';
import {type SharedInformerFactory} from '../../integration/kube/informers/shared-informer-factory.js';
import {type ConfigurableOptions} from './configurable-options.js';

export class FeatureOptions implements ConfigurableOptions<[ServerConfig, Clientset, SharedInformerFactory]> {
  public enableProfiling = true;
  public enableContentionProfiling = false;
  public debugSocketPath = '';
  public enablePriorityAndFairness = true;
  public featureGates = new Map<string, boolean>();

  private readonly logger: AdapterLogger;

  public constructor(logger?: AdapterLogger) {
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public validate(): Error[] {
    const errors: Error[] = [...FeatureGate.validate(this.featureGates)];
    if (this.enableContentionProfiling && !this.enableProfiling) {
      errors.push(
        new IllegalArgumentError(
          `--${flags.contentionProfiling.name} requires --${flags.profiling.name} to be enabled`,
          this.enableContentionProfiling,
        ),
      );
    }
    return errors;
  }

  public addFlags(fs: FlagSet): void {
    fs.add(flags.profiling, value => (this.enableProfiling = value));
    fs.add(flags.contentionProfiling, value => (this.enableContentionProfiling = value));
    fs.add(flags.debugSocketPath, value => (this.debugSocketPath = value));
    fs.add(flags.enablePriorityAndFairness, value => (this.enablePriorityAndFairness = value));
    fs.add(flags.featureGates, value => (this.featureGates = value));
  }

  /**
   * @param config - receives the profiling settings, the feature gate and flow control
   * @param clientset - the client flow control watches its configuration objects through
   * @param informerFactory - flow control registers its informers here, it is not started
   * @throws IllegalArgumentError if priority and fairness is enabled without any request concurrency
   */
  public async applyTo(config: ServerConfig, clientset: Clientset, informerFactory: SharedInformerFactory): Promise<void> {
    config.enableProfiling = this.enableProfiling;
    config.enableContentionProfiling = this.enableContentionProfiling;
    config.debugSocketPath = this.debugSocketPath || undefined;
    config.featureGate = new FeatureGate(this.featureGates);

    if (!this.enablePriorityAndFairness || !config.featureGate.enabled(API_PRIORITY_AND_FAIRNESS)) {
      return;
    }

    const concurrencyLimit = config.maxRequestsInFlight + config.maxMutatingRequestsInFlight;
    if (concurrencyLimit <= 0) {
      throw new IllegalArgumentError(
        `invalid configuration: MaxRequestsInFlight=${config.maxRequestsInFlight} and ` +
          `MaxMutatingRequestsInFlight=${config.maxMutatingRequestsInFlight}; their sum must be positive`,
        concurrencyLimit,
      );
    }
    config.flowControl = new FlowControl(informerFactory, clientset, concurrencyLimit, this.logger);
  }
}
