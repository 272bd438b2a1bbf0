// SPDX-License-Identifier: Apache-2.0

import crypto from 'node:crypto';
import fs from 'node:fs';
import * as x509 from '@peculiar/x509';
import {DataValidationError} from '../errors/data-validation-error.js';

x509.cryptoProvider.set(crypto);

/**
 * A set of certificate authorities client certificates are verified against.
 */
export class CaBundle {
  private constructor(
    public readonly name: string,
    public readonly certificates: x509.X509Certificate[],
  ) {}

  /**
   * @param name - where the bundle came from
   * @param pem - one or more PEM encoded certificates
   * @throws DataValidationError if the bundle holds no certificate
   */
  public static fromPem(name: string, pem: string): CaBundle {
    const certificates = x509.PemConverter.decode(pem).map(raw => new x509.X509Certificate(raw));
    if (certificates.length === 0) {
      throw new DataValidationError(`no certificate authority found in ${name}`, 'PEM encoded certificates', 0);
    }
    return new CaBundle(name, certificates);
  }

  public static fromFile(file: string): CaBundle {
    return CaBundle.fromPem(file, fs.readFileSync(file, 'utf8'));
  }

  public merge(other: CaBundle): CaBundle {
    const known = new Set(this.certificates.map(certificate => certificate.toString('base64')));
    const added = other.certificates.filter(certificate => !known.has(certificate.toString('base64')));
    return new CaBundle(`${this.name},${other.name}`, [...this.certificates, ...added]);
  }

  public toPem(): string {
    return this.certificates.map(certificate => certificate.toString('pem')).join('\n');
  }

  /**
   * Find the authority that signed a certificate
   * @param certificate - the certificate to verify
   * @param date - the date the certificate must be valid at
   * @returns the signing authority, or undefined when none of them signed it or it is not valid at `date`
   */
  public async verify(certificate: x509.X509Certificate, date: Date = new Date()): Promise<x509.X509Certificate | undefined> {
    if (date < certificate.notBefore || date > certificate.notAfter) {
      return undefined;
    }

    for (const authority of this.certificates) {
      if (authority.subject !== certificate.issuer) {
        continue;
      }
      if (await certificate.verify({publicKey: authority, date, signatureOnly: true})) {
        return authority;
      }
    }
    return undefined;
  }
}
