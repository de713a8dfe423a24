/**
 * Shared bootstrap: creates all dependencies, wires them together.
 * Used by the serve command and by the integration tests.
 */

import { readFile } from 'node:fs/promises';
import type { RowpagerConfig } from './config/schema.js';
import type { Connection, Driver } from './driver/types.js';
import { SqliteDriver } from './driver/sqlite-driver.js';
import { Session } from './session/session.js';
import { registerSessionMethods } from './session/methods.js';
import { MethodRegistry } from './rpc/registry.js';
import { SerialExecutor } from './rpc/serial-executor.js';
import { Dispatcher } from './rpc/dispatcher.js';
import { RpcHttpServer, type TlsMaterial } from './server/http-server.js';
import * as log from './utils/logger.js';

export interface AppDeps {
  config: RowpagerConfig;
  connection: Connection;
  session: Session;
  registry: MethodRegistry;
  executor: SerialExecutor;
  dispatcher: Dispatcher;
  server: RpcHttpServer;
  /** Aborted by the quit method. */
  shutdown: AbortController;
  /** Stop serving, finish any active query and close the connection. */
  close(): Promise<void>;
}

export async function createApp(config: RowpagerConfig, driver?: Driver): Promise<AppDeps> {
  const target = config.database.path;
  if (!target) {
    throw new Error('No database configured. Pass --database or set ROWPAGER_DATABASE.');
  }

  // 1. Database
  const activeDriver = driver ?? new SqliteDriver({
    readonly: config.database.readonly,
    busyTimeoutMs: config.database.busyTimeoutMs,
  });
  const connection = await activeDriver.connect(target);

  // 2. Session + RPC surface
  const shutdown = new AbortController();
  const session = new Session(connection, shutdown);
  const registry = new MethodRegistry();
  registerSessionMethods(registry, session);

  const executor = new SerialExecutor();
  const dispatcher = new Dispatcher(registry, executor);

  // 3. Transport
  const server = new RpcHttpServer(dispatcher, {
    host: config.server.host,
    port: config.server.port,
    maxBodyBytes: config.server.maxBodyBytes,
    tls: config.server.tls ? await loadTls(config.server.tls) : undefined,
    shutdown: shutdown.signal,
  });

  const close = async (): Promise<void> => {
    await server.stop();
    await executor.stop();
    if (session.state === 'active') {
      log.warn('Finishing the active query before closing');
      await session.finish();
    }
    if (session.state === 'idle') {
      await session.quit();
    }
  };

  return { config, connection, session, registry, executor, dispatcher, server, shutdown, close };
}

async function loadTls(tls: NonNullable<RowpagerConfig['server']['tls']>): Promise<TlsMaterial> {
  const [key, cert] = await Promise.all([readFile(tls.key), readFile(tls.cert)]);
  return { key, cert, passphrase: tls.passphrase };
}
