// SPDX-License-Identifier: Apache-2.0

import net from 'node:net';
import {KubeConfig} from '@kubernetes/client-node';
import * as Base64 from 'js-base64';
import * as constants from '../../core/constants.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {NotInClusterError} from '../../core/errors/not-in-cluster-error.js';
import {PathEx} from '../../business/utils/path-ex.js';

export interface RestClientTlsConfig {
  insecure?: boolean;
  serverName?: string;
  caFile?: string;
  /** PEM encoded certificate authorities, takes precedence over `caFile` */
  caData?: string;
  certFile?: string;
  certData?: string;
  keyFile?: string;
  keyData?: string;
}

/** A kubeconfig `exec` credential plugin, run by the client to obtain its credentials */
export interface ExecCredentialConfig {
  command: string;
  [setting: string]: unknown;
}

/** A kubeconfig `auth-provider` entry, such as oidc or the service account `tokenFile` provider */
export interface AuthProviderConfig {
  name: string;
  config: Record<string, unknown>;
}

/**
 * Everything needed to talk to a Kubernetes style API server.
 */
export interface RestClientConfig {
  host: string;
  bearerToken?: string;
  bearerTokenFile?: string;
  username?: string;
  password?: string;
  exec?: ExecCredentialConfig;
  authProvider?: AuthProviderConfig;
  tls: RestClientTlsConfig;
  qps: number;
  burst: number;
  userAgent?: string;
}

const CLUSTER_NAME = 'adapter-cluster';
const USER_NAME = 'adapter-user';
const CONTEXT_NAME = 'adapter-context';
const TOKEN_FILE_AUTH_PROVIDER = 'tokenFile';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class RestClientConfigs {
  private constructor() {}

  /**
   * Read the current context of a kubeconfig file
   * @param kubeConfigFile - path of the kubeconfig file
   * @throws IllegalArgumentError if the file has no current cluster, or its user has a malformed credential plugin
   */
  public static fromKubeConfigFile(kubeConfigFile: string): RestClientConfig {
    const kubeConfig = new KubeConfig();
    kubeConfig.loadFromFile(kubeConfigFile);

    const cluster = kubeConfig.getCurrentCluster();
    if (!cluster) {
      throw new IllegalArgumentError(`no current cluster found in kubeconfig ${kubeConfigFile}`, kubeConfigFile);
    }
    const user = kubeConfig.getCurrentUser();

    return {
      host: cluster.server,
      bearerToken: user?.token,
      username: user?.username,
      password: user?.password,
      exec: RestClientConfigs.execConfig(user?.exec, kubeConfigFile),
      authProvider: RestClientConfigs.authProviderConfig(user?.authProvider, kubeConfigFile),
      tls: {
        insecure: cluster.skipTLSVerify,
        serverName: cluster.tlsServerName,
        caFile: cluster.caFile,
        caData: RestClientConfigs.decode(cluster.caData),
        certFile: user?.certFile,
        certData: RestClientConfigs.decode(user?.certData),
        keyFile: user?.keyFile,
        keyData: RestClientConfigs.decode(user?.keyData),
      },
      qps: constants.DEFAULT_CLIENT_QPS,
      burst: constants.DEFAULT_CLIENT_BURST,
    };
  }

  /**
   * Build the configuration of a client running inside a pod, from the service environment variables and the
   * mounted service account
   * @param environment - the process environment
   * @throws NotInClusterError if the service environment variables are missing
   */
  public static inCluster(environment: NodeJS.ProcessEnv = process.env): RestClientConfig {
    const host = environment.KUBERNETES_SERVICE_HOST;
    const port = environment.KUBERNETES_SERVICE_PORT;
    if (!host || !port) {
      throw new NotInClusterError();
    }

    return {
      host: `https://${net.isIPv6(host) ? `[${host}]` : host}:${port}`,
      bearerTokenFile: constants.SERVICE_ACCOUNT_TOKEN_FILE,
      tls: {caFile: constants.SERVICE_ACCOUNT_CA_FILE},
      qps: constants.DEFAULT_CLIENT_QPS,
      burst: constants.DEFAULT_CLIENT_BURST,
    };
  }

  /**
   * Build a KubeConfig holding a single context for the given configuration. A token file is handed to the
   * `tokenFile` auth provider, which reads it again once the cached token is a minute old.
   * @param config - the client configuration
   */
  public static toKubeConfig(config: RestClientConfig): KubeConfig {
    const tokenFileProvider: AuthProviderConfig | undefined =
      !config.bearerToken && config.bearerTokenFile
        ? {name: TOKEN_FILE_AUTH_PROVIDER, config: {tokenFile: PathEx.resolve(config.bearerTokenFile)}}
        : undefined;

    const kubeConfig = new KubeConfig();
    kubeConfig.loadFromOptions({
      clusters: [
        {
          name: CLUSTER_NAME,
          server: config.host,
          skipTLSVerify: config.tls.insecure ?? false,
          tlsServerName: config.tls.serverName,
          caData: RestClientConfigs.encode(config.tls.caData),
          caFile: config.tls.caData ? undefined : config.tls.caFile,
        },
      ],
      users: [
        {
          name: USER_NAME,
          token: config.bearerToken,
          exec: config.exec,
          authProvider: config.authProvider ?? tokenFileProvider,
          username: config.username,
          password: config.password,
          certData: RestClientConfigs.encode(config.tls.certData),
          certFile: config.tls.certData ? undefined : config.tls.certFile,
          keyData: RestClientConfigs.encode(config.tls.keyData),
          keyFile: config.tls.keyData ? undefined : config.tls.keyFile,
        },
      ],
      contexts: [{name: CONTEXT_NAME, cluster: CLUSTER_NAME, user: USER_NAME}],
      currentContext: CONTEXT_NAME,
    });

    return kubeConfig;
  }

  /**
   * A copy of the configuration that is safe to log
   * @param config - the client configuration
   */
  public static redacted(config: RestClientConfig): Record<string, unknown> {
    const mask = (value?: string): string | undefined => (value ? constants.STANDARD_DATAMASK : undefined);
    return {
      host: config.host,
      bearerToken: mask(config.bearerToken),
      bearerTokenFile: config.bearerTokenFile,
      username: config.username,
      password: mask(config.password),
      exec: config.exec ? {command: config.exec.command} : undefined,
      authProvider: config.authProvider ? {name: config.authProvider.name} : undefined,
      tls: {
        insecure: config.tls.insecure,
        serverName: config.tls.serverName,
        caFile: config.tls.caFile,
        caData: config.tls.caData ? `${config.tls.caData.length} bytes` : undefined,
        certFile: config.tls.certFile,
        certData: config.tls.certData ? `${config.tls.certData.length} bytes` : undefined,
        keyFile: config.tls.keyFile,
        keyData: mask(config.tls.keyData),
      },
      qps: config.qps,
      burst: config.burst,
      userAgent: config.userAgent,
    };
  }

  private static execConfig(exec: unknown, source: string): ExecCredentialConfig | undefined {
    if (exec === undefined || exec === null) {
      return undefined;
    }
    const command = isRecord(exec) ? exec.command : undefined;
    if (!isRecord(exec) || typeof command !== 'string' || !command) {
      throw new IllegalArgumentError(`exec credential plugin in ${source} must name a command`, source);
    }
    return {...exec, command};
  }

  private static authProviderConfig(authProvider: unknown, source: string): AuthProviderConfig | undefined {
    if (authProvider === undefined || authProvider === null) {
      return undefined;
    }
    const name = isRecord(authProvider) ? authProvider.name : undefined;
    if (!isRecord(authProvider) || typeof name !== 'string' || !name) {
      throw new IllegalArgumentError(`auth provider in ${source} must have a name`, source);
    }
    return {name, config: isRecord(authProvider.config) ? authProvider.config : {}};
  }

  private static encode(pem?: string): string | undefined {
    return pem ? Base64.encode(pem) : undefined;
  }

  private static decode(data?: string): string | undefined {
    return data ? Base64.decode(data) : undefined;
  }
}
