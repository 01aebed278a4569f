import { PATHS } from '../config/defaults.js';

// ── Shared CLI helpers ───────────────────────────────────────

/** CLI flag, then STEALTHFLOW_CONFIG, then the default file name. */
export function resolveConfigPath(flag: string | undefined): string {
  return flag ?? process.env['STEALTHFLOW_CONFIG'] ?? PATHS.CONFIG_FILE;
}

export function reportFailure(prefix: string, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${prefix}: ${message}\n`);
  process.exitCode = 4;
}
