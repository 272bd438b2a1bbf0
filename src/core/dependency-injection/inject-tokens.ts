// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  AdapterLogger: Symbol.for('AdapterLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ClientsetFactory: Symbol.for('ClientsetFactory'),
  CertificateGenerator: Symbol.for('CertificateGenerator'),
  Adapter: Symbol.for('Adapter'),
};
