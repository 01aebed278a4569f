import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ConfigError } from '../config/loader.js';
import { createFileConfigStore } from './store.js';

describe('stealth/store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'stealthflow-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null when nothing has been saved', async () => {
    const store = createFileConfigStore(path.join(dir, 'missing'));

    await expect(store.loadIdentityPool()).resolves.toBeNull();
    await expect(store.loadDelayPolicy()).resolves.toBeNull();
  });

  it('round-trips the identity pool through YAML', async () => {
    const settingsDir = path.join(dir, 'settings');
    const store = createFileConfigStore(settingsDir);
    const pool = {
      userAgents: ['agent-a'],
      proxies: [{ server: 'http://proxy.test:8080', bypass: null }],
    };

    await store.saveIdentityPool(pool);

    await expect(store.loadIdentityPool()).resolves.toEqual(pool);
    const raw = await readFile(path.join(settingsDir, 'identity.yaml'), 'utf-8');
    expect(raw).toContain('- agent-a');
  });

  it('fills in the default bypass list for hand-written proxies', async () => {
    await writeFile(
      path.join(dir, 'identity.yaml'),
      'userAgents:\n  - agent-a\nproxies:\n  - server: http://proxy.test:8080\n',
      'utf-8',
    );

    await expect(createFileConfigStore(dir).loadIdentityPool()).resolves.toEqual({
      userAgents: ['agent-a'],
      proxies: [{ server: 'http://proxy.test:8080', bypass: 'localhost,127.0.0.1' }],
    });
  });

  it('round-trips the delay policy', async () => {
    const store = createFileConfigStore(dir);
    const policy = { minDelaySeconds: 0.5, maxDelaySeconds: 1.5, randomize: true };

    await store.saveDelayPolicy(policy);

    await expect(store.loadDelayPolicy()).resolves.toEqual(policy);
  });

  it('reports an invalid saved file as a ConfigError naming the file', async () => {
    await writeFile(path.join(dir, 'identity.yaml'), 'userAgents: []\n', 'utf-8');

    const load = createFileConfigStore(dir).loadIdentityPool();

    await expect(load).rejects.toBeInstanceOf(ConfigError);
    await expect(load).rejects.toThrow(`${path.join(dir, 'identity.yaml')}: userAgents:`);
  });
});
