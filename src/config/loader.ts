import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Error ───────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = 'ConfigError';
    this.path = path;
  }
}

// ── Helpers ─────────────────────────────────────────────────

/** Parse YAML or JSON text, picking the format by file extension. */
export function parseConfigText(filePath: string, raw: string): unknown {
  return filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
}

export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.stealthflow.yaml` (or JSON) config file.
 * Throws a ConfigError naming the file if it is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, `cannot read config file (${reason})`, {
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseConfigText(configPath, raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, `malformed config file (${reason})`, {
      cause: err,
    });
  }

  try {
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(configPath, formatZodError(err), { cause: err });
    }
    throw err;
  }
}
