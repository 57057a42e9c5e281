import { createRequire } from 'module';

const require = createRequire(import.meta.url);
const pkg: { version?: string } = require('../package.json');

export const FORMSMITH_VERSION: string = pkg.version ?? '0.0.0';
