import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

export const DEFAULT_CONFIG_PATH = '.routine.yaml';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.routine.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');
  return fileConfigSchema.parse(parseDocument(configPath, raw));
}

/**
 * Resolve the effective config. An explicitly requested file must exist;
 * the default file is optional and falls back to schema defaults.
 */
export async function resolveConfig(explicitPath?: string): Promise<FileConfig> {
  const configPath = explicitPath ?? process.env['ROUTINE_CONFIG'];
  if (configPath !== undefined) {
    return loadConfigFile(configPath);
  }

  try {
    return await loadConfigFile(DEFAULT_CONFIG_PATH);
  } catch (err) {
    if (isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    throw err;
  }
}

/** Parse a YAML or JSON document, chosen by file extension. */
export function parseDocument(filePath: string, raw: string): unknown {
  return filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
