// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import net from 'node:net';
import {v4 as uuidv4} from 'uuid';
import * as constants from '../constants.js';
import {Flags as flags} from '../../commands/flags.js';
import {type FlagSet} from '../flags/flag-set.js';
import {AdapterError} from '../errors/adapter-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {MissingArgumentError} from '../errors/missing-argument-error.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {type CertificateGenerator} from '../certificates/certificate-generator.js';
import {CertKeyPair} from '../certificates/cert-key-pair.js';
import {type SecureServingInfo, type ServerConfig} from '../server/server-config.js';
import {type RestClientConfig} from '../../integration/kube/rest-client-config.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ConfigurableOptions} from './configurable-options.js';

export interface CertKey {
  certFile: string;
  keyFile: string;
}

export interface GeneratableKeyCert {
  /** explicit certificate and key files, take precedence over everything else */
  certKey: CertKey;
  /** where generated certificates are written and looked for; when empty they are kept in memory */
  certDirectory: string;
  /** base name of the files in `certDirectory` */
  pairName: string;
  generatedCert?: CertKeyPair;
}

export type ServingTarget = Pick<ServerConfig, 'secureServing'>;

export type LoopbackServingTarget = Pick<ServerConfig, 'secureServing' | 'loopbackClientConfig'>;

function isUnspecified(address: string): boolean {
  return address === '' || address === '0.0.0.0' || address === '::';
}

function joinHostPort(host: string, port: number): string {
  return net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}

export class SecureServingOptions implements ConfigurableOptions<[ServingTarget]> {
  public bindAddress: string = constants.DEFAULT_BIND_ADDRESS;
  public bindPort: number = constants.DEFAULT_SECURE_PORT;
  /** when true the port can not be switched off with 0 */
  public required = true;
  public serverCert: GeneratableKeyCert = {
    certKey: {certFile: '', keyFile: ''},
    certDirectory: constants.DEFAULT_CERT_DIRECTORY,
    pairName: constants.DEFAULT_CERT_PAIR_NAME,
  };
  public minTlsVersion = '';
  public cipherSuites: string[] = [];

  private readonly certificateGenerator: CertificateGenerator;
  private readonly logger: AdapterLogger;

  public constructor(certificateGenerator?: CertificateGenerator, logger?: AdapterLogger) {
    this.certificateGenerator = patchInject(certificateGenerator, InjectTokens.CertificateGenerator, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public withLoopback(): SecureServingOptionsWithLoopback {
    return new SecureServingOptionsWithLoopback(this, this.certificateGenerator);
  }

  public validate(): Error[] {
    const errors: Error[] = [];

    if (this.required && (this.bindPort < 1 || this.bindPort > 65_535)) {
      errors.push(
        new IllegalArgumentError(
          `--secure-port ${this.bindPort} must be between 1 and 65535, inclusive. It cannot be turned off with 0`,
          this.bindPort,
        ),
      );
    } else if (this.bindPort < 0 || this.bindPort > 65_535) {
      errors.push(
        new IllegalArgumentError(
          `--secure-port ${this.bindPort} must be between 0 and 65535, inclusive. 0 for turning off secure port`,
          this.bindPort,
        ),
      );
    }

    if (this.bindAddress !== '' && net.isIP(this.bindAddress) === 0) {
      errors.push(new IllegalArgumentError(`--bind-address "${this.bindAddress}" is not an IP address`, this.bindAddress));
    }

    if (this.minTlsVersion !== '' && !constants.TLS_VERSIONS.includes(this.minTlsVersion)) {
      errors.push(
        new IllegalArgumentError(
          `--tls-min-version "${this.minTlsVersion}" is not one of ${constants.TLS_VERSIONS.join(', ')}`,
          this.minTlsVersion,
        ),
      );
    }

    const {certFile, keyFile} = this.serverCert.certKey;
    if ((certFile === '') !== (keyFile === '')) {
      errors.push(
        new IllegalArgumentError('--tls-cert-file and --tls-private-key-file must be set together', certFile || keyFile),
      );
    }

    return errors;
  }

  public addFlags(fs: FlagSet): void {
    fs.add(flags.bindAddress, value => (this.bindAddress = value));
    fs.add(flags.securePort, value => (this.bindPort = value));
    fs.add(flags.certDirectory, value => (this.serverCert.certDirectory = value));
    fs.add(flags.tlsCertFile, value => (this.serverCert.certKey.certFile = value));
    fs.add(flags.tlsPrivateKeyFile, value => (this.serverCert.certKey.keyFile = value));
    fs.add(flags.tlsMinVersion, value => (this.minTlsVersion = value));
    fs.add(flags.tlsCipherSuites, value => (this.cipherSuites = value));
  }

  public async applyTo(target: ServingTarget): Promise<void> {
    if (this.bindPort <= 0) {
      return;
    }

    const info: SecureServingInfo = {
      listenAddress: joinHostPort(this.bindAddress || constants.DEFAULT_BIND_ADDRESS, this.bindPort),
      certificate: this.loadServingCertificate(),
      sniCertificates: [],
      minTlsVersion: this.minTlsVersion || undefined,
      cipherSuites: [...this.cipherSuites],
    };
    if (info.certificate) {
      this.logger.info(`serving certificate: ${info.certificate.describe()}`);
    }
    target.secureServing = info;
  }

  /**
   * Generate a self-signed serving certificate unless the server already has one
   * @param publicAddress - the address clients reach the server at
   * @param alternateDNS - additional DNS names the certificate is valid for
   * @param alternateIPs - additional IP addresses the certificate is valid for
   * @throws MissingArgumentError if a certificate directory is set without a pair name
   */
  public async maybeDefaultWithSelfSignedCerts(
    publicAddress: string,
    alternateDNS: string[],
    alternateIPs: string[],
  ): Promise<void> {
    if (this.bindPort === 0) {
      return;
    }

    const {certKey, certDirectory, pairName} = this.serverCert;
    if (certKey.certFile !== '' || certKey.keyFile !== '') {
      return;
    }

    let canReadCertAndKey = false;
    if (certDirectory !== '') {
      if (pairName === '') {
        throw new MissingArgumentError('pairName is required if certDirectory is set');
      }
      certKey.certFile = PathEx.join(certDirectory, `${pairName}.crt`);
      certKey.keyFile = PathEx.join(certDirectory, `${pairName}.key`);
      canReadCertAndKey = PathEx.isReadable(certKey.certFile) && PathEx.isReadable(certKey.keyFile);
    }
    if (canReadCertAndKey) {
      return;
    }

    const dnsNames = [...alternateDNS];
    const ipAddresses = [...alternateIPs];
    if (isUnspecified(this.bindAddress)) {
      dnsNames.push('localhost');
    } else {
      ipAddresses.push(this.bindAddress);
    }

    const generated = await this.certificateGenerator.generate(publicAddress, ipAddresses, dnsNames);
    if (certDirectory === '') {
      this.serverCert.generatedCert = CertKeyPair.fromPem(generated.certificatePem, generated.privateKeyPem, 'self-signed');
      this.logger.info('Generated self-signed cert in-memory');
      return;
    }

    fs.mkdirSync(certDirectory, {recursive: true});
    fs.writeFileSync(certKey.certFile, generated.certificatePem);
    fs.writeFileSync(certKey.keyFile, generated.privateKeyPem, {mode: 0o600});
    this.logger.info(`Generated self-signed cert (${certKey.certFile}, ${certKey.keyFile})`);
  }

  private loadServingCertificate(): CertKeyPair | undefined {
    const {certFile, keyFile} = this.serverCert.certKey;
    if (certFile !== '' && keyFile !== '') {
      try {
        return CertKeyPair.fromFiles(certFile, keyFile);
      } catch (error) {
        throw new AdapterError(`failed to load serving certificate from ${certFile} and ${keyFile}`, error);
      }
    }
    return this.serverCert.generatedCert;
  }
}

/**
 * Secure serving plus the configuration the server uses to call itself: a loopback certificate served for a fixed
 * server name, and a client configuration that trusts it.
 */
export class SecureServingOptionsWithLoopback implements ConfigurableOptions<[LoopbackServingTarget]> {
  public constructor(
    public readonly secureServing: SecureServingOptions,
    private readonly certificateGenerator: CertificateGenerator,
  ) {}

  public validate(): Error[] {
    return this.secureServing.validate();
  }

  public addFlags(fs: FlagSet): void {
    this.secureServing.addFlags(fs);
  }

  public async maybeDefaultWithSelfSignedCerts(
    publicAddress: string,
    alternateDNS: string[],
    alternateIPs: string[],
  ): Promise<void> {
    await this.secureServing.maybeDefaultWithSelfSignedCerts(publicAddress, alternateDNS, alternateIPs);
  }

  public async applyTo(target: LoopbackServingTarget): Promise<void> {
    await this.secureServing.applyTo(target);
    if (!target.secureServing) {
      return;
    }

    let loopbackCert: CertKeyPair;
    try {
      const generated = await this.certificateGenerator.generate(constants.LOOPBACK_CLIENT_SERVER_NAME_OVERRIDE, [], []);
      loopbackCert = CertKeyPair.fromPem(generated.certificatePem, generated.privateKeyPem, 'loopback');
    } catch (error) {
      throw new AdapterError('failed to generate self-signed certificate for loopback connection', error);
    }

    target.secureServing.sniCertificates = [loopbackCert, ...target.secureServing.sniCertificates];
    target.loopbackClientConfig = SecureServingOptionsWithLoopback.newLoopbackClientConfig(
      this.secureServing.bindAddress,
      this.secureServing.bindPort,
      loopbackCert,
    );
  }

  /**
   * @param bindAddress - the address the server listens on, unspecified addresses are reached through loopback
   * @param port - the secure port
   * @param loopbackCert - the certificate the server presents for the loopback server name
   */
  public static newLoopbackClientConfig(bindAddress: string, port: number, loopbackCert: CertKeyPair): RestClientConfig {
    let host = bindAddress;
    if (isUnspecified(bindAddress)) {
      host = net.isIPv6(bindAddress) ? '::1' : '127.0.0.1';
    }

    return {
      host: `https://${joinHostPort(host, port)}`,
      bearerToken: uuidv4(),
      tls: {
        serverName: constants.LOOPBACK_CLIENT_SERVER_NAME_OVERRIDE,
        caData: loopbackCert.certificatePem,
      },
      qps: constants.LOOPBACK_CLIENT_QPS,
      burst: constants.LOOPBACK_CLIENT_BURST,
      userAgent: constants.ADAPTER_USER_AGENT,
    };
  }
}
