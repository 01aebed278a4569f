/**
 * Run logger for stealthflow.
 *
 * Writes to stderr only: stdout carries the `--json` document and
 * command output meant for pipes. Set STEALTHFLOW_DEBUG=1 to see
 * selector lookups.
 */

// ── Core write ──────────────────────────────────────────────

function write(icon: string, message: string): void {
  process.stderr.write(`${icon} ${message}\n`);
}

function debugEnabled(): boolean {
  const flag = process.env['STEALTHFLOW_DEBUG'];
  return flag !== undefined && flag !== '' && flag !== '0';
}

function counter(index: number, total: number): string {
  return `[${String(index + 1)}/${String(total)}]`;
}

// ── General ─────────────────────────────────────────────────

export function info(message: string): void {
  write('ℹ️ ', message);
}

export function detail(message: string): void {
  write('  ', message);
}

export function debug(message: string): void {
  if (debugEnabled()) write('🐛', message);
}

export function warn(message: string): void {
  write('⚠️ ', message);
}

export function error(message: string): void {
  write('💥', message);
}

export function section(title: string): void {
  const rule = '─'.repeat(50);
  process.stderr.write(`\n${rule}\n▶  ${title}\n${rule}\n`);
}

// ── Workflow progress ───────────────────────────────────────

export function step(index: number, total: number, action: string): void {
  write('📋', `${counter(index, total)} ${action}`);
}

export function stepResult(index: number, total: number, ok: boolean, action: string): void {
  write(ok ? '✅' : '❌', `${counter(index, total)} ${action}`);
}

// ── Anti-crawler ────────────────────────────────────────────

export function gate(delaySeconds: number): void {
  write('⏳', `Pacing: waiting ${delaySeconds.toFixed(2)}s before next request`);
}

export function identity(userAgent: string, proxyServer: string | null): void {
  write('🎭', `Identity: ${userAgent}${proxyServer !== null ? ` via ${proxyServer}` : ''}`);
}
