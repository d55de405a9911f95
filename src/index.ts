import { readFileSync } from 'node:fs';

import { parse, type PackageInfo } from '@/parser';

const readPackageInfo = (): PackageInfo => {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  const version = raw !== null && typeof raw === 'object' ? Reflect.get(raw, 'version') : undefined;
  const description = raw !== null && typeof raw === 'object' ? Reflect.get(raw, 'description') : undefined;

  return {
    version: typeof version === 'string' ? version : '0.0.0',
    description: typeof description === 'string' ? description : '',
  };
};

await parse({ argv: process.argv, pkg: readPackageInfo() })();
