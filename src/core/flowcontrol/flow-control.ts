// SPDX-License-Identifier: Apache-2.0

import {
  type KubernetesObject,
  type V1FlowSchema,
  type V1PriorityLevelConfiguration,
} from '@kubernetes/client-node';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {type Clientset} from '../../integration/kube/clientset.js';
import {type SharedInformer} from '../../integration/kube/informers/shared-informer.js';
import {type SharedInformerFactory} from '../../integration/kube/informers/shared-informer-factory.js';

const DEFAULT_NOMINAL_CONCURRENCY_SHARES = 30;
const LIMITED = 'Limited';

export interface PriorityLevelState {
  name: string;
  type: string;
  nominalConcurrencyShares: number;
  /** seats of the server concurrency limit given to the level, 0 for exempt levels */
  concurrencyLimit: number;
}

export interface FlowSchemaState {
  name: string;
  priorityLevel: string;
  matchingPrecedence: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isPriorityLevelConfiguration(object: KubernetesObject): object is V1PriorityLevelConfiguration {
  return 'spec' in object && isRecord(object.spec) && typeof object.spec.type === 'string';
}

function isFlowSchema(object: KubernetesObject): object is V1FlowSchema {
  return 'spec' in object && isRecord(object.spec) && isRecord(object.spec.priorityLevelConfiguration);
}

/**
 * API priority and fairness bookkeeping: watches FlowSchemas and PriorityLevelConfigurations through the shared
 * informers and splits the server concurrency limit between the limited priority levels by their shares.
 */
export class FlowControl {
  private readonly flowSchemaInformer: SharedInformer;
  private readonly priorityLevelInformer: SharedInformer;
  private levels: PriorityLevelState[] = [];
  private schemas: FlowSchemaState[] = [];

  public constructor(
    informerFactory: SharedInformerFactory,
    clientset: Clientset,
    public readonly serverConcurrencyLimit: number,
    private readonly logger: AdapterLogger,
  ) {
    this.flowSchemaInformer = informerFactory.informerFor(clientset.flowSchemas());
    this.priorityLevelInformer = informerFactory.informerFor(clientset.priorityLevelConfigurations());
    this.flowSchemaInformer.addEventHandler(() => this.recompute());
    this.priorityLevelInformer.addEventHandler(() => this.recompute());
  }

  public priorityLevels(): PriorityLevelState[] {
    return this.levels;
  }

  /** the flow schemas, in the order requests are matched against them */
  public flowSchemas(): FlowSchemaState[] {
    return this.schemas;
  }

  public recompute(): void {
    const configurations = this.priorityLevelInformer.list().filter(isPriorityLevelConfiguration);
    const sharesOf = (configuration: V1PriorityLevelConfiguration): number =>
      configuration.spec?.limited?.nominalConcurrencyShares ?? DEFAULT_NOMINAL_CONCURRENCY_SHARES;

    const limited = configurations.filter(configuration => configuration.spec?.type === LIMITED);
    const totalShares = limited.reduce((sum, configuration) => sum + sharesOf(configuration), 0);

    this.levels = configurations
      .map(configuration => {
        const shares = sharesOf(configuration);
        const isLimited = configuration.spec?.type === LIMITED;
        return {
          name: configuration.metadata?.name ?? '',
          type: configuration.spec?.type ?? '',
          nominalConcurrencyShares: shares,
          concurrencyLimit:
            isLimited && totalShares > 0 ? Math.ceil((this.serverConcurrencyLimit * shares) / totalShares) : 0,
        };
      })
      .sort((a, b) => a.name.localeCompare(b.name));

    this.schemas = this.flowSchemaInformer
      .list()
      .filter(isFlowSchema)
      .map(schema => ({
        name: schema.metadata?.name ?? '',
        priorityLevel: schema.spec?.priorityLevelConfiguration.name ?? '',
        matchingPrecedence: schema.spec?.matchingPrecedence ?? 0,
      }))
      .sort((a, b) => a.matchingPrecedence - b.matchingPrecedence || a.name.localeCompare(b.name));

    this.logger.debug(
      `flow control recomputed: ${this.levels.length} priority level(s), ${this.schemas.length} flow schema(s)`,
    );
  }
}
