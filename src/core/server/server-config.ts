// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';
import {type CertKeyPair} from '../certificates/cert-key-pair.js';
import {type CaBundle} from '../certificates/ca-bundle.js';
import {type Authenticator} from '../auth/authenticator.js';
import {type Authorizer} from '../auth/authorizer.js';
import {type RequestHeaderConfig} from '../auth/request-header-authenticator.js';
import {type AuditBackend} from '../audit/audit-backend.js';
import {type AuditPolicyRuleEvaluator} from '../audit/audit-policy.js';
import {FeatureGate} from '../features/feature-gate.js';
import {type FlowControl} from '../flowcontrol/flow-control.js';
import {type RestClientConfig} from '../../integration/kube/rest-client-config.js';
import {type OpenApiConfig, type OpenApiV3Config} from './openapi-config.js';

export interface SecureServingInfo {
  /** host:port the server listens on */
  listenAddress: string;
  certificate?: CertKeyPair;
  /** served instead of `certificate` to clients asking for one of their names */
  sniCertificates: CertKeyPair[];
  /** authorities client certificates are verified against */
  clientCA?: CaBundle;
  minTlsVersion?: string;
  cipherSuites: string[];
}

export interface AuthenticationInfo {
  authenticator?: Authenticator;
  apiAudiences: string[];
  requestHeaderConfig?: RequestHeaderConfig;
}

export interface AuthorizationInfo {
  authorizer?: Authorizer;
}

/**
 * The runtime configuration of the server to be started. The options pipeline fills it in; the caller owns it.
 */
export class ServerConfig {
  public secureServing?: SecureServingInfo;
  public loopbackClientConfig?: RestClientConfig;
  public authentication: AuthenticationInfo = {apiAudiences: []};
  public authorization: AuthorizationInfo = {};
  public auditBackend?: AuditBackend;
  public auditPolicyRuleEvaluator?: AuditPolicyRuleEvaluator;
  public openApiConfig?: OpenApiConfig;
  public openApiV3Config?: OpenApiV3Config;
  public enableMetrics = true;
  public enableProfiling = true;
  public enableContentionProfiling = false;
  public debugSocketPath?: string;
  public featureGate: FeatureGate = new FeatureGate();
  public flowControl?: FlowControl;
  public maxRequestsInFlight = constants.DEFAULT_MAX_REQUESTS_IN_FLIGHT;
  public maxMutatingRequestsInFlight = constants.DEFAULT_MAX_MUTATING_REQUESTS_IN_FLIGHT;

  /** What was configured, without key material or credentials */
  public summary(): Record<string, unknown> {
    return {
      secureServing: this.secureServing
        ? {
            listenAddress: this.secureServing.listenAddress,
            certificate: this.secureServing.certificate?.describe(),
            sniCertificates: this.secureServing.sniCertificates.map(certificate => certificate.describe()),
            clientCA: this.secureServing.clientCA?.name,
            minTlsVersion: this.secureServing.minTlsVersion,
            cipherSuites: this.secureServing.cipherSuites,
          }
        : undefined,
      loopbackClient: this.loopbackClientConfig?.host,
      authentication: {
        enabled: this.authentication.authenticator !== undefined,
        requestHeaders: this.authentication.requestHeaderConfig?.usernameHeaders,
        apiAudiences: this.authentication.apiAudiences,
      },
      authorization: {enabled: this.authorization.authorizer !== undefined},
      audit: this.auditBackend?.name(),
      openApi: this.openApiConfig?.info.title,
      openApiV3: this.openApiV3Config?.info.title,
      enableMetrics: this.enableMetrics,
      enableProfiling: this.enableProfiling,
      enableContentionProfiling: this.enableContentionProfiling,
      debugSocketPath: this.debugSocketPath,
      featureGates: this.featureGate.toString(),
      flowControl: this.flowControl !== undefined,
      maxRequestsInFlight: this.maxRequestsInFlight,
      maxMutatingRequestsInFlight: this.maxMutatingRequestsInFlight,
    };
  }
}
