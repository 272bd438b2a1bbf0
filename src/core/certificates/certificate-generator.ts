// SPDX-License-Identifier: Apache-2.0

export interface GeneratedCertificate {
  certificatePem: string;
  privateKeyPem: string;
}

export interface CertificateGenerator {
  /**
   * Generate a self-signed serving certificate and its private key
   * @param host - the common name, also added as a DNS or IP subject alternative name
   * @param alternateIPs - additional IP subject alternative names
   * @param alternateDNS - additional DNS subject alternative names
   */
  generate(host: string, alternateIPs: string[], alternateDNS: string[]): Promise<GeneratedCertificate>;
}
