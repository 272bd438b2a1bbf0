// SPDX-License-Identifier: Apache-2.0

import crypto from 'node:crypto';
import fs from 'node:fs';
import * as x509 from '@peculiar/x509';
import {DataValidationError} from '../errors/data-validation-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * A serving certificate (possibly followed by its chain) together with its private key.
 */
export class CertKeyPair {
  public readonly certificate: x509.X509Certificate;

  private constructor(
    public readonly certificatePem: string,
    public readonly privateKeyPem: string,
    public readonly source: string,
  ) {
    const [leaf] = x509.PemConverter.decode(certificatePem);
    if (!leaf) {
      throw new DataValidationError(`no certificate found in ${source}`, 'PEM encoded certificate', certificatePem.length);
    }
    this.certificate = new x509.X509Certificate(leaf);
    this.verifyKeyMatches();
  }

  /**
   * @param certificatePem - the PEM encoded certificate, leaf first
   * @param privateKeyPem - the PEM encoded private key of the leaf
   * @param source - where the pair came from, used in errors and logs
   */
  public static fromPem(certificatePem: string, privateKeyPem: string, source: string = 'memory'): CertKeyPair {
    return new CertKeyPair(certificatePem, privateKeyPem, source);
  }

  public static fromFiles(certFile: string, keyFile: string): CertKeyPair {
    return new CertKeyPair(fs.readFileSync(certFile, 'utf8'), fs.readFileSync(keyFile, 'utf8'), `${certFile}::${keyFile}`);
  }

  public get subject(): string {
    return this.certificate.subject;
  }

  public get notBefore(): Date {
    return this.certificate.notBefore;
  }

  public get notAfter(): Date {
    return this.certificate.notAfter;
  }

  public dnsNames(): string[] {
    return this.subjectAltNames('dns');
  }

  public ipAddresses(): string[] {
    return this.subjectAltNames('ip');
  }

  public isValidAt(date: Date = new Date()): boolean {
    return date >= this.notBefore && date <= this.notAfter;
  }

  /** a log friendly description that never includes the key */
  public describe(): string {
    const names = [...this.dnsNames(), ...this.ipAddresses()].join(',');
    return `"${this.source}" [${this.subject}] validServingFor=[${names}] issuer="${this.certificate.issuer}" (${this.notBefore.toISOString()} to ${this.notAfter.toISOString()})`;
  }

  private subjectAltNames(type: x509.GeneralNameType): string[] {
    const extension = this.certificate.getExtension(x509.SubjectAlternativeNameExtension);
    if (!extension) {
      return [];
    }
    return extension.names.items.filter(name => name.type === type).map(name => name.value);
  }

  private verifyKeyMatches(): void {
    let publicKey: Buffer;
    try {
      publicKey = crypto.createPublicKey(crypto.createPrivateKey(this.privateKeyPem)).export({type: 'spki', format: 'der'});
    } catch (error) {
      throw new IllegalArgumentError(`unable to read private key of ${this.source}`, this.source, error);
    }

    if (!publicKey.equals(Buffer.from(this.certificate.publicKey.rawData))) {
      throw new DataValidationError(
        `private key does not match public key of certificate ${this.source}`,
        this.certificate.subject,
        'mismatched private key',
      );
    }
  }
}
