// packages/vocab/src/keys-loader.ts
import fs from 'node:fs';
import path from 'node:path';
import { ZodError } from 'zod';
import type { KeysFile } from '@lexirule/core';
import { ConfigurationError, KeysFileSchema, log } from '@lexirule/core';

function findUp(filename: string, startDir = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function resolveKeysPath(explicit?: string): string {
  if (explicit) return path.resolve(explicit);
  const p = findUp('keys.json');
  if (!p) throw new ConfigurationError('keys.json not found. Set KEYS_PATH or add keys.json to the project root.');
  return p;
}

export function parseKeysFile(raw: unknown, source = 'keys.json'): KeysFile {
  try {
    return KeysFileSchema.parse(raw);
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message }));
      throw new ConfigurationError(`Invalid key vocabulary in ${source}`, { issues });
    }
    throw e;
  }
}

/**
 * Reads and validates the key vocabulary file. Embeddings are optional in the
 * file; entries without one are embedded by the caller before the registry is
 * built.
 */
export function loadKeysFile(explicit?: string): KeysFile {
  const p = resolveKeysPath(explicit);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Failed to read ${p}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const file = parseKeysFile(raw, p);
  log.info({ path: p, keys: file.keys.length }, 'keys-loaded');
  return file;
}

/** "bureau.score" → "bureau score"; "vintage_in_years" → "vintage in years" */
export function humanizeIdentifier(identifier: string): string {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[._]+/g)
    .filter(Boolean)
    .join(' ')
    .toLowerCase();
}
