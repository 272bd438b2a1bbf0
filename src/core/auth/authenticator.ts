// SPDX-License-Identifier: Apache-2.0

import {type IncomingHttpHeaders} from 'node:http';
import {type UserInfo} from './user-info.js';

export interface AuthenticationRequest {
  headers: IncomingHttpHeaders;
  /** the PEM encoded certificate the client presented during the TLS handshake */
  clientCertificate?: string;
}

export interface AuthenticationResponse {
  user: UserInfo;
  audiences?: string[];
}

export interface Authenticator {
  /**
   * @returns the user, or undefined when the request carries no credentials this authenticator understands
   * @throws AdapterError when the request carries credentials that are invalid
   */
  authenticate(request: AuthenticationRequest): Promise<AuthenticationResponse | undefined>;
}
