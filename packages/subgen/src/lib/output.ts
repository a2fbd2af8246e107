// subgen/src/lib/output.ts

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'yaml';

export function toYaml(config: Record<string, unknown>): string {
    return stringify(config, { lineWidth: 0 });
}

/** Write `<dir>/<name>.yaml`, creating `dir`; returns the path written. */
export async function writeProfile(dir: string, name: string, config: Record<string, unknown>): Promise<string> {
    await mkdir(dir, { recursive: true });
    const file = path.join(dir, `${name}.yaml`);
    await writeFile(file, toYaml(config), 'utf8');
    return file;
}
