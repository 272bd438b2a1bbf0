// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * This file should only contain the function to get the adapter version.
 */
export function getAdapterVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // the compiled file sits one level below the package root
  const packageJsonPath = [PathEx.resolve(__dirname, 'package.json'), PathEx.resolve(__dirname, '..', 'package.json')].find(
    file => fs.existsSync(file),
  );
  if (!packageJsonPath) {
    return 'unknown';
  }
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return 'unknown';
}
