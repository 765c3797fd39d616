import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { serverConfigSchema } from '../schema/config.js';
import type { ServerConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.web-searcher.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<ServerConfig> {
  const raw = await readFile(configPath, 'utf-8');

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  return serverConfigSchema.parse(parsed ?? {});
}

/**
 * Like `loadConfigFile`, but a missing file yields the defaults.
 * Invalid contents still throw.
 */
export async function loadOptionalConfigFile(
  configPath: string,
): Promise<ServerConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) {
      return serverConfigSchema.parse({});
    }
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
