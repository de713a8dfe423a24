/**
 * HTTP front end: POST / with a JSON body goes to the dispatcher.
 *
 * Transport problems (path, method, content type, body size) are answered
 * with a plain status and never with a JSON-RPC envelope.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createServer as createTlsServer, type Server as TlsServer } from 'node:https';
import type { AddressInfo, Server as NetServer } from 'node:net';
import { encodeOutput, type Dispatcher } from '../rpc/dispatcher.js';
import { ExecutorStoppedError } from '../rpc/serial-executor.js';
import * as log from '../utils/logger.js';

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Max-Age': '86400',
};

/** Force-close lingering keep-alive sockets this long after stop(). */
const CLOSE_GRACE_MS = 5_000;

export interface TlsMaterial {
  key: string | Buffer;
  cert: string | Buffer;
  passphrase?: string;
}

export interface HttpServerOptions {
  host: string;
  port: number;
  maxBodyBytes: number;
  tls?: TlsMaterial;
  /** Aborted when the session quits; the server then stops on its own. */
  shutdown?: AbortSignal;
}

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export class RpcHttpServer {
  readonly closed: Promise<void>;
  private readonly server: NetServer;
  private readonly sockets: Pick<Server, 'closeIdleConnections' | 'closeAllConnections'>;
  private stopping = false;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly options: HttpServerOptions,
  ) {
    const handler = (req: IncomingMessage, res: ServerResponse) => this.handle(req, res);
    const server: Server | TlsServer = options.tls
      ? createTlsServer({ key: options.tls.key, cert: options.tls.cert, passphrase: options.tls.passphrase }, handler)
      : createServer(handler);
    this.server = server;
    this.sockets = server;

    this.closed = new Promise(resolve => this.server.once('close', () => resolve()));

    // Never stop from inside the request that asked for it: the handler has
    // to return and write its reply first.
    options.shutdown?.addEventListener('abort', () => {
      setImmediate(() => {
        this.stop().catch(err => log.error(`Server stop failed: ${log.describeError(err)}`));
      });
    }, { once: true });
  }

  get url(): string | null {
    const address = this.server.address();
    if (address === null || typeof address === 'string') return null;
    const scheme = this.options.tls ? 'https' : 'http';
    const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
    return `${scheme}://${host}:${address.port}`;
  }

  start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not bound to a TCP port'));
          return;
        }
        log.info(`Listening on ${this.url}`);
        resolve(address);
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.stopping && this.server.listening) {
      this.stopping = true;
      log.info('Stopping server...');
      this.server.close();
      this.sockets.closeIdleConnections();
      setTimeout(() => this.sockets.closeAllConnections(), CLOSE_GRACE_MS).unref();
    }
    if (this.stopping) await this.closed;
  }

  private handle(req: IncomingMessage, res: ServerResponse): void {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    if (req.url !== '/') {
      this.reject(req, res, 404, 'Request must have path of /');
      return;
    }

    if (req.method === 'OPTIONS') {
      res.writeHead(200);
      res.end();
      return;
    }

    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST, OPTIONS');
      this.reject(req, res, 405, 'Method must be POST');
      return;
    }

    if (!isJsonContentType(req.headers['content-type'])) {
      this.reject(req, res, 400, 'Content-Type must be application/json');
      return;
    }

    readBody(req, this.options.maxBodyBytes)
      .then(body => this.dispatcher.handleBody(body))
      .then(output => this.reply(res, encodeOutput(output)))
      .catch(err => {
        if (err instanceof PayloadTooLargeError) {
          this.reject(req, res, 413, err.message);
        } else if (err instanceof ExecutorStoppedError) {
          this.reject(req, res, 503, 'Server is shutting down');
        } else {
          log.error(`Request failed: ${log.describeError(err)}`);
          this.reject(req, res, 500, 'Internal server error');
        }
      });
  }

  private reply(res: ServerResponse, body: string | null): void {
    if (this.options.shutdown?.aborted) {
      res.setHeader('Connection', 'close');
    }
    if (body === null) {
      res.writeHead(200);
      res.end();
      return;
    }
    res.writeHead(200, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }

  private reject(req: IncomingMessage, res: ServerResponse, status: number, message: string): void {
    log.warn(`${req.method ?? '?'} ${req.url ?? ''} rejected (${status}): ${message}`);
    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end(message);
  }
}

/** application/json, with or without parameters such as charset. */
export function isJsonContentType(header: string | undefined): boolean {
  if (!header) return false;
  return header.split(';')[0].trim().toLowerCase() === 'application/json';
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        req.removeAllListeners('data');
        req.resume();
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}
