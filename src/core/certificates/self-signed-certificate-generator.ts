// SPDX-License-Identifier: Apache-2.0

import net from 'node:net';
import * as selfsigned from 'selfsigned';
import {inject, injectable} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {AdapterError} from '../errors/adapter-error.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {type CertificateGenerator, type GeneratedCertificate} from './certificate-generator.js';

const SUBJECT_ALT_NAME_DNS = 2;
const SUBJECT_ALT_NAME_IP = 7;

type AltName = {type: typeof SUBJECT_ALT_NAME_DNS; value: string} | {type: typeof SUBJECT_ALT_NAME_IP; ip: string};

@injectable()
export class SelfSignedCertificateGenerator implements CertificateGenerator {
  private readonly logger: AdapterLogger;

  public constructor(@inject(InjectTokens.AdapterLogger) logger?: AdapterLogger) {
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public async generate(host: string, alternateIPs: string[], alternateDNS: string[]): Promise<GeneratedCertificate> {
    const commonName = `${host}@${Math.floor(Date.now() / 1000)}`;
    const altNames = SelfSignedCertificateGenerator.altNamesOf(host, alternateIPs, alternateDNS);
    this.logger.debug(`generating self-signed certificate ${commonName}`, {altNames});

    const attributes = [{name: 'commonName', value: commonName}];
    const extensions = [
      {name: 'basicConstraints', cA: true},
      {name: 'keyUsage', digitalSignature: true, keyEncipherment: true, keyCertSign: true},
      {name: 'extKeyUsage', serverAuth: true},
      {name: 'subjectAltName', altNames},
    ];

    return new Promise<GeneratedCertificate>((resolve, reject) => {
      const options = {
        days: constants.SELF_SIGNED_CERT_VALIDITY_DAYS,
        keySize: constants.SELF_SIGNED_CERT_KEY_SIZE,
        algorithm: 'sha256',
        extensions,
      };
      selfsigned.generate(attributes, options, (error, pems) => {
        if (error) {
          reject(new AdapterError(`error generating self-signed certificate for ${host}: ${error.message}`, error));
          return;
        }
        resolve({certificatePem: pems.cert, privateKeyPem: pems.private});
      });
    });
  }

  /** the host first, then every alternate that is not already present */
  private static altNamesOf(host: string, alternateIPs: string[], alternateDNS: string[]): AltName[] {
    const ips = new Set<string>();
    const dnsNames = new Set<string>();
    (net.isIP(host) ? ips : dnsNames).add(host);
    for (const ip of alternateIPs) ips.add(ip);
    for (const dns of alternateDNS) dnsNames.add(dns);

    return [
      ...[...dnsNames].map((value): AltName => ({type: SUBJECT_ALT_NAME_DNS, value})),
      ...[...ips].map((ip): AltName => ({type: SUBJECT_ALT_NAME_IP, ip})),
    ];
  }
}
