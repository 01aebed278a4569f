import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { stringify as stringifyYaml } from 'yaml';
import { ZodError } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';

import { ConfigError, formatZodError, parseConfigText } from '../config/loader.js';
import { PATHS } from '../config/defaults.js';
import { delayPolicySchema, identityPoolSchema } from '../schema/index.js';
import type { DelayPolicy, IdentityPool } from '../schema/index.js';

// ── Collaborator contract ────────────────────────────────────

export interface ConfigStore {
  /** Saved pool, or null when nothing has been saved yet. */
  loadIdentityPool(): Promise<IdentityPool | null>;
  saveIdentityPool(pool: IdentityPool): Promise<void>;
  /** Saved policy, or null when nothing has been saved yet. */
  loadDelayPolicy(): Promise<DelayPolicy | null>;
  saveDelayPolicy(policy: DelayPolicy): Promise<void>;
}

// ── File-backed store ────────────────────────────────────────

/**
 * Keeps the identity pool and delay policy as YAML files in one
 * directory (`.stealthflow/` by default). The directory is created
 * on first save.
 */
export function createFileConfigStore(dir: string = PATHS.STORE_DIR): ConfigStore {
  const identityPath = path.join(dir, PATHS.IDENTITY_FILE);
  const delayPath = path.join(dir, PATHS.DELAY_FILE);

  return {
    loadIdentityPool: () => readValidated(identityPath, identityPoolSchema),
    saveIdentityPool: (pool) => writeYaml(dir, identityPath, pool),
    loadDelayPolicy: () => readValidated(delayPath, delayPolicySchema),
    saveDelayPolicy: (policy) => writeYaml(dir, delayPath, policy),
  };
}

async function readValidated<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  try {
    return schema.parse(parseConfigText(filePath, raw));
  } catch (err) {
    const reason =
      err instanceof ZodError
        ? formatZodError(err)
        : err instanceof Error
          ? err.message
          : String(err);
    throw new ConfigError(filePath, reason, { cause: err });
  }
}

async function writeYaml(dir: string, filePath: string, data: unknown): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(filePath, stringifyYaml(data), 'utf-8');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
