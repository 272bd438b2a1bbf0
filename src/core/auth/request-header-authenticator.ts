// SPDX-License-Identifier: Apache-2.0

import {type IncomingHttpHeaders} from 'node:http';
import {AdapterError} from '../errors/adapter-error.js';
import {type CaBundle} from '../certificates/ca-bundle.js';
import {type AuthenticationRequest, type AuthenticationResponse, type Authenticator} from './authenticator.js';
import {commonNameOf, verifyClientCertificate} from './client-cert-authenticator.js';

export interface RequestHeaderConfig {
  usernameHeaders: string[];
  groupHeaders: string[];
  extraHeaderPrefixes: string[];
  /** authorities the authenticating proxy's client certificate must be signed by */
  clientCA: CaBundle;
  /** common names the proxy may use, any when empty */
  allowedClientNames: string[];
}

/**
 * Trusts the user identity an authenticating front proxy puts in request headers, once the proxy has proven who it
 * is with a client certificate.
 */
export class RequestHeaderAuthenticator implements Authenticator {
  public constructor(private readonly config: RequestHeaderConfig) {}

  public async authenticate(request: AuthenticationRequest): Promise<AuthenticationResponse | undefined> {
    const certificate = await verifyClientCertificate(request, this.config.clientCA);
    if (!certificate) {
      return undefined;
    }

    const proxyName = commonNameOf(certificate);
    if (this.config.allowedClientNames.length > 0 && !this.config.allowedClientNames.includes(proxyName)) {
      throw new AdapterError(`client certificate with common name "${proxyName}" is not allowed to set request headers`);
    }

    const name = this.config.usernameHeaders
      .flatMap(header => RequestHeaderAuthenticator.values(request.headers, header))
      .find(value => value.length > 0);
    if (!name) {
      return undefined;
    }

    const groups = this.config.groupHeaders.flatMap(header => RequestHeaderAuthenticator.values(request.headers, header));

    const extra: Record<string, string[]> = {};
    for (const [header, value] of Object.entries(request.headers)) {
      const prefix = this.config.extraHeaderPrefixes.find(p => header.toLowerCase().startsWith(p.toLowerCase()));
      if (!prefix || value === undefined) {
        continue;
      }
      const key = decodeURIComponent(header.slice(prefix.length)).toLowerCase();
      extra[key] = [...(extra[key] ?? []), ...(Array.isArray(value) ? value : [value])];
    }

    return {user: {name, groups, extra}};
  }

  private static values(headers: IncomingHttpHeaders, header: string): string[] {
    const value = headers[header.toLowerCase()];
    if (value === undefined) {
      return [];
    }
    return (Array.isArray(value) ? value : [value]).map(v => v.trim());
  }
}
