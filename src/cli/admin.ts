import type { Command } from 'commander';

import { checkProxy } from '../browser/playwright.js';
import { PATHS, PROXY_DEFAULTS } from '../config/defaults.js';
import { parseDelayPolicy } from '../schema/index.js';
import { AntiCrawlerPolicy } from '../stealth/policy.js';
import type { PersistResult } from '../stealth/policy.js';
import { createFileConfigStore } from '../stealth/store.js';
import * as log from '../utils/logger.js';
import { reportFailure } from './context.js';

// ── Helpers ──────────────────────────────────────────────────

async function openPolicy(storeDir: string): Promise<AntiCrawlerPolicy> {
  return AntiCrawlerPolicy.load(createFileConfigStore(storeDir));
}

/** The change is applied either way; a failed save is still an error exit. */
function reportPersist(result: PersistResult, done: string): void {
  if (result.persisted) {
    log.info(done);
    return;
  }
  process.stderr.write(`Applied but not saved: ${result.error.message}\n`);
  process.exitCode = 4;
}

function parseSeconds(raw: string): number {
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Not a number: "${raw}"`);
  }
  return value;
}

// ── Identity commands ────────────────────────────────────────

export function registerIdentityCommand(program: Command): void {
  const identity = program
    .command('identity')
    .description('Inspect and edit the user-agent and proxy pool')
    .option('--store <dir>', 'Settings directory', PATHS.STORE_DIR);

  const storeDir = (): string => identity.opts<{ store: string }>().store;

  identity
    .command('show')
    .description('Print the identity pool and delay policy')
    .action(async () => {
      try {
        const { pool, delay } = (await openPolicy(storeDir())).snapshot();
        process.stdout.write('User-agents:\n');
        for (const ua of pool.userAgents) process.stdout.write(`  ${ua}\n`);
        process.stdout.write('Proxies:\n');
        if (pool.proxies.length === 0) process.stdout.write('  (none)\n');
        for (const p of pool.proxies) {
          process.stdout.write(`  ${p.server}${p.bypass !== null ? ` (bypass ${p.bypass})` : ''}\n`);
        }
        process.stdout.write(
          `Delay: ${String(delay.minDelaySeconds)}s–${String(delay.maxDelaySeconds)}s` +
            `${delay.randomize ? ' randomized' : ' fixed'}\n`,
        );
      } catch (err) {
        reportFailure('Error', err);
      }
    });

  identity
    .command('add-agent')
    .argument('<userAgent>', 'User-agent string')
    .action(async (userAgent: string) => {
      try {
        const policy = await openPolicy(storeDir());
        reportPersist(await policy.addUserAgent(userAgent), 'User-agent added');
      } catch (err) {
        reportFailure('Error', err);
      }
    });

  identity
    .command('remove-agent')
    .argument('<userAgent>', 'User-agent string')
    .action(async (userAgent: string) => {
      try {
        const policy = await openPolicy(storeDir());
        reportPersist(await policy.removeUserAgent(userAgent), 'User-agent removed');
      } catch (err) {
        reportFailure('Error', err);
      }
    });

  identity
    .command('add-proxy')
    .argument('<server>', 'Proxy server, e.g. http://proxy.local:8080')
    .option('--bypass <hosts>', 'Comma-separated hosts to bypass', PROXY_DEFAULTS.BYPASS)
    .option('--check', 'Only add the proxy if it can load a page')
    .action(async (server: string, opts: { bypass: string; check?: true }) => {
      try {
        if (opts.check && !(await checkProxy({ server, bypass: opts.bypass }))) {
          process.stderr.write(`Proxy ${server} failed the check; not added\n`);
          process.exitCode = 1;
          return;
        }
        const policy = await openPolicy(storeDir());
        reportPersist(await policy.addProxy(server, opts.bypass), 'Proxy added');
      } catch (err) {
        reportFailure('Error', err);
      }
    });

  identity
    .command('remove-proxy')
    .argument('<server>', 'Proxy server')
    .action(async (server: string) => {
      try {
        const policy = await openPolicy(storeDir());
        reportPersist(await policy.removeProxy(server), 'Proxy removed');
      } catch (err) {
        reportFailure('Error', err);
      }
    });
}

// ── Delay commands ───────────────────────────────────────────

export function registerDelayCommand(program: Command): void {
  program
    .command('delay')
    .description('Set the request pacing policy')
    .requiredOption('--min <seconds>', 'Minimum delay in seconds')
    .requiredOption('--max <seconds>', 'Maximum delay in seconds')
    .option('--fixed', 'Always wait the minimum instead of a random delay')
    .option('--store <dir>', 'Settings directory', PATHS.STORE_DIR)
    .action(async (opts: { min: string; max: string; fixed?: true; store: string }) => {
      try {
        const next = parseDelayPolicy({
          minDelaySeconds: parseSeconds(opts.min),
          maxDelaySeconds: parseSeconds(opts.max),
          randomize: !opts.fixed,
        });
        const policy = await openPolicy(opts.store);
        reportPersist(await policy.updateDelayPolicy(next), 'Delay policy updated');
      } catch (err) {
        reportFailure('Error', err);
      }
    });
}

// ── Proxy check ──────────────────────────────────────────────

export function registerProxyCommand(program: Command): void {
  program
    .command('proxy-check')
    .description('Check that a proxy can load a page')
    .argument('<server>', 'Proxy server, e.g. http://proxy.local:8080')
    .option('--url <url>', 'Probe URL', PROXY_DEFAULTS.CHECK_URL)
    .action(async (server: string, opts: { url: string }) => {
      try {
        const ok = await checkProxy({ server, bypass: null }, { url: opts.url });
        process.stdout.write(`${server}\t${ok ? 'ok' : 'failed'}\n`);
        process.exitCode = ok ? 0 : 1;
      } catch (err) {
        reportFailure('Error', err);
      }
    });
}
