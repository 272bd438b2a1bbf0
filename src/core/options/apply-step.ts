// SPDX-License-Identifier: Apache-2.0

/**
 * The steps of the options pipeline that can fail, in the order they run.
 */
export enum ApplyStep {
  CERTIFICATE_GENERATION = 'certificate-generation',
  SECURE_SERVING = 'secure-serving',
  AUTHENTICATION = 'authentication',
  AUTHORIZATION = 'authorization',
  AUDIT = 'audit',
  CLIENT_CONSTRUCTION = 'client-construction',
  FEATURES = 'features',
}
