// SPDX-License-Identifier: Apache-2.0

import * as constants from '../core/constants.js';
import {type CommandFlag} from '../types/flag-types.js';

export class Flags {
  // ---------------------------------------------------------------------------------------------------------------
  // global flags
  public static readonly devMode: CommandFlag<'boolean'> = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly listerKubeconfig: CommandFlag<'string'> = {
    constName: 'listerKubeconfig',
    name: 'lister-kubeconfig',
    definition: {
      describe:
        'kubeconfig file pointing at the cluster the adapter reads from. ' +
        'The in-cluster configuration is used when it is not set.',
      type: 'string',
    },
  };

  // ---------------------------------------------------------------------------------------------------------------
  // secure serving
  public static readonly bindAddress: CommandFlag<'string'> = {
    constName: 'bindAddress',
    name: 'bind-address',
    definition: {
      describe:
        'The IP address on which to listen for the --secure-port port. If blank or an unspecified address ' +
        '(0.0.0.0 or ::), all interfaces will be used.',
      defaultValue: constants.DEFAULT_BIND_ADDRESS,
      type: 'string',
    },
  };

  public static readonly securePort: CommandFlag<'number'> = {
    constName: 'securePort',
    name: 'secure-port',
    definition: {
      describe: 'The port on which to serve HTTPS with authentication and authorization. It cannot be switched off with 0.',
      defaultValue: constants.DEFAULT_SECURE_PORT,
      type: 'number',
    },
  };

  public static readonly certDirectory: CommandFlag<'string'> = {
    constName: 'certDirectory',
    name: 'cert-dir',
    definition: {
      describe:
        'The directory where the TLS certs are located. ' +
        'If --tls-cert-file and --tls-private-key-file are provided, this flag will be ignored.',
      defaultValue: constants.DEFAULT_CERT_DIRECTORY,
      type: 'string',
    },
  };

  public static readonly tlsCertFile: CommandFlag<'string'> = {
    constName: 'tlsCertFile',
    name: 'tls-cert-file',
    definition: {
      describe:
        'File containing the default x509 Certificate for HTTPS. (CA cert, if any, concatenated after server cert). ' +
        'If HTTPS serving is enabled, and --tls-cert-file and --tls-private-key-file are not provided, a self-signed ' +
        'certificate and key are generated for the public address and saved to the directory specified by --cert-dir.',
      type: 'string',
    },
  };

  public static readonly tlsPrivateKeyFile: CommandFlag<'string'> = {
    constName: 'tlsPrivateKeyFile',
    name: 'tls-private-key-file',
    definition: {
      describe: 'File containing the default x509 private key matching --tls-cert-file.',
      type: 'string',
    },
  };

  public static readonly tlsMinVersion: CommandFlag<'string'> = {
    constName: 'tlsMinVersion',
    name: 'tls-min-version',
    definition: {
      describe: `Minimum TLS version supported. Possible values: ${constants.TLS_VERSIONS.join(', ')}`,
      type: 'string',
    },
  };

  public static readonly tlsCipherSuites: CommandFlag<'array'> = {
    constName: 'tlsCipherSuites',
    name: 'tls-cipher-suites',
    definition: {
      describe:
        'Comma-separated list of cipher suites for the server. If omitted, the default Node.js cipher suites will be used.',
      type: 'array',
    },
  };

  // ---------------------------------------------------------------------------------------------------------------
  // delegated authentication
  public static readonly authenticationKubeconfig: CommandFlag<'string'> = {
    constName: 'authenticationKubeconfig',
    name: 'authentication-kubeconfig',
    definition: {
      describe:
        'kubeconfig file pointing at the \'core\' kubernetes server with enough rights to create ' +
        'tokenreviews.authentication.k8s.io.',
      type: 'string',
    },
  };

  public static readonly authenticationSkipLookup: CommandFlag<'boolean'> = {
    constName: 'authenticationSkipLookup',
    name: 'authentication-skip-lookup',
    definition: {
      describe:
        'If false, the authentication-kubeconfig will be used to lookup missing authentication configuration ' +
        'from the cluster.',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly authenticationTokenWebhookCacheTtl: CommandFlag<'duration'> = {
    constName: 'authenticationTokenWebhookCacheTtl',
    name: 'authentication-token-webhook-cache-ttl',
    definition: {
      describe: 'The duration to cache responses from the webhook token authenticator.',
      defaultValue: constants.DEFAULT_WEBHOOK_CACHE_TTL.toString(),
      type: 'duration',
    },
  };

  public static readonly authenticationTolerateLookupFailure: CommandFlag<'boolean'> = {
    constName: 'authenticationTolerateLookupFailure',
    name: 'authentication-tolerate-lookup-failure',
    definition: {
      describe:
        'If true, failures to look up missing authentication configuration from the cluster are not considered ' +
        'fatal. Note that this can result in authentication that treats all requests as anonymous.',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly clientCaFile: CommandFlag<'string'> = {
    constName: 'clientCaFile',
    name: 'client-ca-file',
    definition: {
      describe:
        'If set, any request presenting a client certificate signed by one of the authorities in the client-ca-file ' +
        'is authenticated with an identity corresponding to the CommonName of the client certificate.',
      type: 'string',
    },
  };

  public static readonly requestHeaderUsernameHeaders: CommandFlag<'array'> = {
    constName: 'requestHeaderUsernameHeaders',
    name: 'requestheader-username-headers',
    definition: {
      describe: 'List of request headers to inspect for usernames. X-Remote-User is common.',
      defaultValue: ['x-remote-user'],
      type: 'array',
    },
  };

  public static readonly requestHeaderGroupHeaders: CommandFlag<'array'> = {
    constName: 'requestHeaderGroupHeaders',
    name: 'requestheader-group-headers',
    definition: {
      describe: 'List of request headers to inspect for groups. X-Remote-Group is suggested.',
      defaultValue: ['x-remote-group'],
      type: 'array',
    },
  };

  public static readonly requestHeaderExtraHeadersPrefix: CommandFlag<'array'> = {
    constName: 'requestHeaderExtraHeadersPrefix',
    name: 'requestheader-extra-headers-prefix',
    definition: {
      describe: 'List of request header prefixes to inspect. X-Remote-Extra- is suggested.',
      defaultValue: ['x-remote-extra-'],
      type: 'array',
    },
  };

  public static readonly requestHeaderClientCaFile: CommandFlag<'string'> = {
    constName: 'requestHeaderClientCaFile',
    name: 'requestheader-client-ca-file',
    definition: {
      describe:
        'Root certificate bundle to use to verify client certificates on incoming requests before trusting ' +
        'usernames in headers specified by --requestheader-username-headers.',
      type: 'string',
    },
  };

  public static readonly requestHeaderAllowedNames: CommandFlag<'array'> = {
    constName: 'requestHeaderAllowedNames',
    name: 'requestheader-allowed-names',
    definition: {
      describe:
        'List of client certificate common names to allow to provide usernames in headers specified by ' +
        '--requestheader-username-headers. If empty, any client certificate validated by the authorities in ' +
        '--requestheader-client-ca-file is allowed.',
      type: 'array',
    },
  };

  // ---------------------------------------------------------------------------------------------------------------
  // delegated authorization
  public static readonly authorizationKubeconfig: CommandFlag<'string'> = {
    constName: 'authorizationKubeconfig',
    name: 'authorization-kubeconfig',
    definition: {
      describe:
        'kubeconfig file pointing at the \'core\' kubernetes server with enough rights to create ' +
        'subjectaccessreviews.authorization.k8s.io.',
      type: 'string',
    },
  };

  public static readonly authorizationWebhookCacheAuthorizedTtl: CommandFlag<'duration'> = {
    constName: 'authorizationWebhookCacheAuthorizedTtl',
    name: 'authorization-webhook-cache-authorized-ttl',
    definition: {
      describe: 'The duration to cache \'authorized\' responses from the webhook authorizer.',
      defaultValue: constants.DEFAULT_WEBHOOK_CACHE_TTL.toString(),
      type: 'duration',
    },
  };

  public static readonly authorizationWebhookCacheUnauthorizedTtl: CommandFlag<'duration'> = {
    constName: 'authorizationWebhookCacheUnauthorizedTtl',
    name: 'authorization-webhook-cache-unauthorized-ttl',
    definition: {
      describe: 'The duration to cache \'unauthorized\' responses from the webhook authorizer.',
      defaultValue: constants.DEFAULT_WEBHOOK_CACHE_TTL.toString(),
      type: 'duration',
    },
  };

  public static readonly authorizationAlwaysAllowPaths: CommandFlag<'array'> = {
    constName: 'authorizationAlwaysAllowPaths',
    name: 'authorization-always-allow-paths',
    definition: {
      describe:
        'A list of HTTP paths to skip during authorization, i.e. these are authorized without contacting the ' +
        '\'core\' kubernetes server.',
      defaultValue: constants.DEFAULT_ALWAYS_ALLOW_PATHS,
      type: 'array',
    },
  };

  // ---------------------------------------------------------------------------------------------------------------
  // audit
  public static readonly auditPolicyFile: CommandFlag<'string'> = {
    constName: 'auditPolicyFile',
    name: 'audit-policy-file',
    definition: {
      describe: 'Path to the file that defines the audit policy configuration.',
      type: 'string',
    },
  };

  public static readonly auditLogPath: CommandFlag<'string'> = {
    constName: 'auditLogPath',
    name: 'audit-log-path',
    definition: {
      describe:
        'If set, all requests coming to the apiserver will be logged to this file. \'-\' means standard out.',
      type: 'string',
    },
  };

  public static readonly auditLogMaxBackup: CommandFlag<'number'> = {
    constName: 'auditLogMaxBackup',
    name: 'audit-log-maxbackup',
    definition: {
      describe: 'The maximum number of old audit log files to retain. Setting a value of 0 will mean there\'s no restriction on the number of files.',
      defaultValue: 0,
      type: 'number',
    },
  };

  public static readonly auditLogMaxSize: CommandFlag<'number'> = {
    constName: 'auditLogMaxSize',
    name: 'audit-log-maxsize',
    definition: {
      describe: 'The maximum size in megabytes of the audit log file before it gets rotated.',
      defaultValue: 0,
      type: 'number',
    },
  };

  public static readonly auditLogFormat: CommandFlag<'string'> = {
    constName: 'auditLogFormat',
    name: 'audit-log-format',
    definition: {
      describe: `Format of saved audits. Known formats are ${constants.AUDIT_LOG_FORMATS.join(',')}.`,
      defaultValue: constants.AUDIT_LOG_FORMAT_JSON,
      type: 'string',
    },
  };

  // ---------------------------------------------------------------------------------------------------------------
  // features
  public static readonly profiling: CommandFlag<'boolean'> = {
    constName: 'profiling',
    name: 'profiling',
    definition: {
      describe: 'Enable profiling via web interface host:port/debug/pprof/',
      defaultValue: true,
      type: 'boolean',
    },
  };

  public static readonly contentionProfiling: CommandFlag<'boolean'> = {
    constName: 'contentionProfiling',
    name: 'contention-profiling',
    definition: {
      describe: 'Enable block profiling, if profiling is enabled',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly debugSocketPath: CommandFlag<'string'> = {
    constName: 'debugSocketPath',
    name: 'debug-socket-path',
    definition: {
      describe: 'Use an unprotected (no authn/authz) unix-domain socket for profiling with the given path',
      type: 'string',
    },
  };

  public static readonly enablePriorityAndFairness: CommandFlag<'boolean'> = {
    constName: 'enablePriorityAndFairness',
    name: 'enable-priority-and-fairness',
    definition: {
      describe: 'If true, replace the max-in-flight handler with an enhanced one that queues and dispatches with priority and fairness',
      defaultValue: true,
      type: 'boolean',
    },
  };

  public static readonly featureGates: CommandFlag<'mapStringBool'> = {
    constName: 'featureGates',
    name: 'feature-gates',
    definition: {
      describe: 'A set of key=value pairs that describe feature gates for alpha/experimental features.',
      type: 'mapStringBool',
    },
  };
}
