// SPDX-License-Identifier: Apache-2.0

import * as x509 from '@peculiar/x509';
import {AdapterError} from '../errors/adapter-error.js';
import {type CaBundle} from '../certificates/ca-bundle.js';
import {type AuthenticationRequest, type AuthenticationResponse, type Authenticator} from './authenticator.js';

/**
 * Verify the client certificate of a request
 * @param request - the request
 * @param clientCA - the authorities the certificate must be signed by
 * @returns the verified certificate, or undefined when the client presented none
 * @throws AdapterError when the certificate cannot be verified
 */
export async function verifyClientCertificate(
  request: AuthenticationRequest,
  clientCA: CaBundle,
): Promise<x509.X509Certificate | undefined> {
  if (!request.clientCertificate) {
    return undefined;
  }

  let certificate: x509.X509Certificate;
  try {
    certificate = new x509.X509Certificate(request.clientCertificate);
  } catch (error) {
    throw new AdapterError('unable to parse client certificate', error);
  }

  if (!(await clientCA.verify(certificate))) {
    throw new AdapterError(`verifying certificate ${certificate.subject} failed: not signed by ${clientCA.name}`);
  }
  return certificate;
}

export function commonNameOf(certificate: x509.X509Certificate): string {
  return certificate.subjectName.getField('CN')[0] ?? '';
}

/**
 * Authenticates requests by their client certificate: the common name is the user, the organizations its groups.
 */
export class ClientCertAuthenticator implements Authenticator {
  public constructor(private readonly clientCA: CaBundle) {}

  public async authenticate(request: AuthenticationRequest): Promise<AuthenticationResponse | undefined> {
    const certificate = await verifyClientCertificate(request, this.clientCA);
    if (!certificate) {
      return undefined;
    }

    const name = commonNameOf(certificate);
    if (!name) {
      return undefined;
    }
    return {user: {name, groups: certificate.subjectName.getField('O'), extra: {}}};
  }
}
