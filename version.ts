// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';

/**
 * This file should only contain the function to get the Strongbox version.
 */
export function getStrongboxVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // beside the sources, or one level up when running from dist/
  const packageJsonPath: string | undefined = [
    path.resolve(__dirname, 'package.json'),
    path.resolve(__dirname, '..', 'package.json'),
  ].find((candidate): boolean => fs.existsSync(candidate));
  if (!packageJsonPath) {
    return 'unknown';
  }
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  return typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
    ? packageJson.version
    : 'unknown';
}
