// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {AdapterWinstonLogger} from '../logging/adapter-winston-logger.js';
import {InjectTokens} from './inject-tokens.js';
import {ErrorHandler} from '../error-handler.js';
import {K8ClientsetFactory} from '../../integration/kube/k8-client/k8-clientset-factory.js';
import {SelfSignedCertificateGenerator} from '../certificates/self-signed-certificate-generator.js';
import {Adapter} from '../adapter.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(logLevel: string = 'debug', developmentMode: boolean = false, testLogger?: AdapterLogger): void {
    if (Container.isInitialized) {
      container.resolve<AdapterLogger>(InjectTokens.AdapterLogger).debug('Container already initialized');
      return;
    }

    // AdapterLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    if (testLogger) {
      container.registerInstance(InjectTokens.AdapterLogger, testLogger);
      container.resolve<AdapterLogger>(InjectTokens.AdapterLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.AdapterLogger, {useClass: AdapterWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<AdapterLogger>(InjectTokens.AdapterLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});

    // Kubernetes clients
    container.register(
      InjectTokens.ClientsetFactory,
      {useClass: K8ClientsetFactory},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(
      InjectTokens.CertificateGenerator,
      {useClass: SelfSignedCertificateGenerator},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(InjectTokens.Adapter, {useClass: Adapter}, {lifecycle: Lifecycle.Singleton});

    container.resolve<AdapterLogger>(InjectTokens.AdapterLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(logLevel?: string, developmentMode?: boolean, testLogger?: AdapterLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<AdapterLogger>(InjectTokens.AdapterLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, testLogger);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
