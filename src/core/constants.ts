// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';
import {Duration} from './time/duration.js';

// -------------------- adapter related constants --------------------------------------------------------------------
export const ADAPTER_HOME_DIR = process.env.ADAPTER_HOME || PathEx.join(os.homedir(), '.metrics-adapter');
export const ADAPTER_LOGS_DIR = PathEx.join(ADAPTER_HOME_DIR, 'logs');
export const ADAPTER_LOG_FILE = 'metrics-adapter.log';
export const ADAPTER_USER_AGENT = 'metrics-adapter';
export const STANDARD_DATAMASK = '***';

// -------------------- secure serving -------------------------------------------------------------------------------
export const DEFAULT_BIND_ADDRESS = '0.0.0.0';
export const DEFAULT_SECURE_PORT = 443;
export const DEFAULT_CERT_DIRECTORY = 'apiserver.local.config/certificates';
export const DEFAULT_CERT_PAIR_NAME = 'apiserver';
export const SELF_SIGNED_CERT_PUBLIC_ADDRESS = 'localhost';
export const SELF_SIGNED_CERT_ALTERNATE_IPS = ['127.0.0.1'];
export const SELF_SIGNED_CERT_VALIDITY_DAYS = 365;
export const SELF_SIGNED_CERT_KEY_SIZE = 2048;
export const LOOPBACK_CLIENT_SERVER_NAME_OVERRIDE = 'apiserver-loopback-client';
export const LOOPBACK_CLIENT_QPS = 50;
export const LOOPBACK_CLIENT_BURST = 100;
export const TLS_VERSIONS = ['VersionTLS10', 'VersionTLS11', 'VersionTLS12', 'VersionTLS13'];

// -------------------- delegated authentication and authorization ---------------------------------------------------
export const DELEGATED_CLIENT_QPS = 200;
export const DELEGATED_CLIENT_BURST = 400;
export const DEFAULT_WEBHOOK_CACHE_TTL = Duration.ofSeconds(10);
export const WEBHOOK_CACHE_CAPACITY = 8192;
export const DEFAULT_WEBHOOK_RETRY_STEPS = 5;
export const DEFAULT_WEBHOOK_RETRY_INITIAL_DELAY = Duration.ofMillis(500);
export const DEFAULT_WEBHOOK_RETRY_FACTOR = 1.5;
export const AUTHENTICATION_CONFIGMAP_NAMESPACE = 'kube-system';
export const AUTHENTICATION_CONFIGMAP_NAME = 'extension-apiserver-authentication';
export const AUTHENTICATION_READER_ROLE_NAME = 'extension-apiserver-authentication-reader';
export const DEFAULT_ALWAYS_ALLOW_PATHS = ['/healthz', '/readyz', '/livez'];
export const DEFAULT_ALWAYS_ALLOW_GROUPS = ['system:masters'];
export const ANONYMOUS_USER = 'system:anonymous';
export const UNAUTHENTICATED_GROUP = 'system:unauthenticated';
export const AUTHENTICATED_GROUP = 'system:authenticated';

// -------------------- external clients -----------------------------------------------------------------------------
export const DEFAULT_CLIENT_QPS = 5;
export const DEFAULT_CLIENT_BURST = 10;

// -------------------- in-cluster configuration ---------------------------------------------------------------------
export const SERVICE_ACCOUNT_DIR = '/var/run/secrets/kubernetes.io/serviceaccount';
export const SERVICE_ACCOUNT_TOKEN_FILE = PathEx.join(SERVICE_ACCOUNT_DIR, 'token');
export const SERVICE_ACCOUNT_CA_FILE = PathEx.join(SERVICE_ACCOUNT_DIR, 'ca.crt');

// -------------------- audit ----------------------------------------------------------------------------------------
export const AUDIT_LOG_FORMAT_JSON = 'json';
export const AUDIT_LOG_FORMAT_LEGACY = 'legacy';
export const AUDIT_LOG_FORMATS = [AUDIT_LOG_FORMAT_JSON, AUDIT_LOG_FORMAT_LEGACY];
export const AUDIT_POLICY_API_VERSIONS = ['audit.k8s.io/v1'];

// -------------------- informers ------------------------------------------------------------------------------------
export const INFORMER_RESYNC_PERIOD = Duration.ofMinutes(10);
export const INFORMER_WATCH_RESTART_DELAY = Duration.ofSeconds(5);
export const FLOW_SCHEMAS_PATH = '/apis/flowcontrol.apiserver.k8s.io/v1/flowschemas';
export const PRIORITY_LEVEL_CONFIGURATIONS_PATH = '/apis/flowcontrol.apiserver.k8s.io/v1/prioritylevelconfigurations';

// -------------------- server defaults ------------------------------------------------------------------------------
export const DEFAULT_MAX_REQUESTS_IN_FLIGHT = 400;
export const DEFAULT_MAX_MUTATING_REQUESTS_IN_FLIGHT = 200;
