import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { loadConfig } from '../../src/config/config.js';
import { toOverrides } from '../../src/commands/serve.js';
import { createTempDir } from '../helpers/test-fixtures.js';

describe('loadConfig', () => {
  let home: string;
  let workspace: string;

  beforeEach(() => {
    home = createTempDir();
    workspace = createTempDir();
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
    rmSync(workspace, { recursive: true, force: true });
  });

  function writeUserConfig(value: unknown): void {
    mkdirSync(join(home, '.rowpager'), { recursive: true });
    writeFileSync(join(home, '.rowpager', 'config.json'), JSON.stringify(value));
  }

  function writeWorkspaceConfig(value: unknown): void {
    writeFileSync(join(workspace, 'rowpager.json'), JSON.stringify(value));
  }

  it('returns defaults when no file or variable is present', async () => {
    const config = await loadConfig({}, { homeDir: home, workspaceDir: workspace, env: {} });
    expect(config.server.port).toBe(1995);
    expect(config.database.path).toBeUndefined();
    expect(config.log.level).toBe('info');
  });

  it('layers user file, workspace file, environment and overrides', async () => {
    writeUserConfig({ server: { host: '10.0.0.1', port: 2000 }, database: { path: 'user.db', busyTimeoutMs: 100 } });
    writeWorkspaceConfig({ server: { port: 3000 }, database: { path: 'workspace.db' } });
    const env = { ROWPAGER_PORT: '4000', ROWPAGER_LOG_LEVEL: 'warn' };

    const config = await loadConfig(
      { database: { readonly: true } },
      { homeDir: home, workspaceDir: workspace, env },
    );

    expect(config.server.host).toBe('10.0.0.1');
    expect(config.server.port).toBe(4000);
    expect(config.database).toEqual({ path: 'workspace.db', readonly: true, busyTimeoutMs: 100 });
    expect(config.log.level).toBe('warn');
  });

  it('lets CLI overrides beat the environment', async () => {
    const config = await loadConfig(
      toOverrides({ database: 'cli.db', port: '5000', debug: true }),
      { homeDir: home, workspaceDir: workspace, env: { ROWPAGER_DATABASE: 'env.db', ROWPAGER_PORT: '4000' } },
    );

    expect(config.database.path).toBe('cli.db');
    expect(config.server.port).toBe(5000);
    expect(config.log.level).toBe('debug');
  });

  it('rejects a config file that is not an object', async () => {
    writeWorkspaceConfig([1, 2]);
    await expect(loadConfig({}, { homeDir: home, workspaceDir: workspace, env: {} })).rejects.toThrow(
      'must contain a JSON object',
    );
  });

  it('rejects invalid values after merging', async () => {
    await expect(
      loadConfig({}, { homeDir: home, workspaceDir: workspace, env: { ROWPAGER_PORT: 'abc' } }),
    ).rejects.toThrow();
  });
});

describe('toOverrides', () => {
  it('includes only the flags that were given', () => {
    expect(toOverrides({})).toEqual({});
    expect(toOverrides({ host: '::1', readonly: true })).toEqual({
      server: { host: '::1' },
      database: { readonly: true },
    });
  });

  it('groups the TLS flags', () => {
    expect(toOverrides({ tlsKey: 'k.pem', tlsCert: 'c.pem', tlsPassphrase: 'test-secret' })).toEqual({
      server: { tls: { key: 'k.pem', cert: 'c.pem', passphrase: 'test-secret' } },
    });
  });
});
