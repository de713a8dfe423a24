/**
 * Serve command: opens the database and answers JSON-RPC over HTTP until
 * a client calls quit or the process is signalled.
 */

import { loadConfig } from '../config/config.js';
import { createApp } from '../bootstrap.js';
import * as log from '../utils/logger.js';

export interface ServeOptions {
  database?: string;
  port?: string;
  host?: string;
  readonly?: boolean;
  tlsKey?: string;
  tlsCert?: string;
  tlsPassphrase?: string;
  debug?: boolean;
}

export async function runServe(opts: ServeOptions): Promise<void> {
  const config = await loadConfig(toOverrides(opts));
  log.setLogLevel(opts.debug ? 'debug' : config.log.level);

  const app = await createApp(config);

  const onSignal = () => {
    console.log('\nShutting down...');
    app.close().catch(err => {
      log.error(`Shutdown failed: ${log.describeError(err)}`);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  await app.server.start();
  console.log(`rowpager serving ${config.database.path}. Press Ctrl+C to stop.`);

  await app.server.closed;
  await app.executor.stop();
  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);
  log.info('Server stopped');
}

/** CLI flags → config override object (only the flags that were given). */
export function toOverrides(opts: ServeOptions): Record<string, unknown> {
  const server: Record<string, unknown> = {};
  if (opts.host !== undefined) server.host = opts.host;
  if (opts.port !== undefined) server.port = opts.port;
  if (opts.tlsKey !== undefined || opts.tlsCert !== undefined) {
    server.tls = { key: opts.tlsKey, cert: opts.tlsCert, passphrase: opts.tlsPassphrase };
  }

  const database: Record<string, unknown> = {};
  if (opts.database !== undefined) database.path = opts.database;
  if (opts.readonly) database.readonly = true;

  const overrides: Record<string, unknown> = {};
  if (Object.keys(server).length > 0) overrides.server = server;
  if (Object.keys(database).length > 0) overrides.database = database;
  if (opts.debug) overrides.log = { level: 'debug' };
  return overrides;
}
