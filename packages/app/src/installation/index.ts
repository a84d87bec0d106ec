import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageManifestSchema = z.object({ version: z.string() });

function readVersion(): string {
  const manifest = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  return PackageManifestSchema.parse(JSON.parse(manifest)).version;
}

export namespace Installation {
  export const VERSION: string = readVersion();
}
