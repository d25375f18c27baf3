/**
 * csafkit Version - Single source of truth
 */

import { createRequire } from 'node:module';
const require = createRequire(import.meta.url);

interface PackageJson {
  name: string;
  version: string;
}

const pkg = require('../package.json') as PackageJson;

export const NAME = pkg.name;
export const VERSION = pkg.version;
