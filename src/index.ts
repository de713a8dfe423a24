#!/usr/bin/env node
/**
 * rowpager: page through SQL results over JSON-RPC.
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { Command, InvalidArgumentError } from 'commander';
import { runServe, type ServeOptions } from './commands/serve.js';

const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('rowpager')
  .description('JSON-RPC server that pages through SQL query results, one cursor at a time')
  .version(version);

program
  .command('serve')
  .description('Open a database and serve JSON-RPC over HTTP (POST /)')
  .option('-D, --database <path>', 'SQLite database file, or :memory:')
  .option('-p, --port <port>', 'Port to listen on (default 1995)', parsePort)
  .option('-H, --host <host>', 'Address to bind (default localhost)')
  .option('--readonly', 'Open the database read-only')
  .option('--tls-key <path>', 'TLS private key (PEM)')
  .option('--tls-cert <path>', 'TLS certificate (PEM)')
  .option('--tls-passphrase <text>', 'Passphrase for the TLS private key')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (opts: ServeOptions) => {
    await runServe(opts);
  });

function parsePort(value: string): string {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return value;
}

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
