/**
 * JSON-RPC 2.0 dispatcher: raw body in, response envelope(s) out.
 *
 * Notification policy: failures found before the request can be trusted
 * (parse error, invalid envelope, invalid top level) are always answered
 * with a null id. Failures of a well-formed notification are only logged.
 */

import {
  InvalidRequestError,
  MethodNotFoundError,
  ParseError,
  RpcError,
  toErrorObject,
} from './errors.js';
import type { MethodRegistry } from './registry.js';
import { SerialExecutor } from './serial-executor.js';
import {
  isNotification,
  type DispatchOutput,
  type JsonRpcFailure,
  type JsonRpcId,
  type JsonRpcParams,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './types.js';
import * as log from '../utils/logger.js';

export class Dispatcher {
  constructor(
    private readonly registry: MethodRegistry,
    private readonly executor: SerialExecutor = new SerialExecutor(),
  ) {}

  /**
   * Decode and run one request body. A whole body, batch or not, runs as a
   * single job on the executor, so batch entries never interleave with other
   * bodies. Resolves to null when nothing should be sent back.
   */
  async handleBody(raw: string): Promise<DispatchOutput> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      return failure(null, new ParseError(log.describeError(err), { cause: err }));
    }

    if (Array.isArray(decoded)) {
      if (decoded.length === 0) {
        return failure(null, new InvalidRequestError('Batch must not be empty'));
      }
      const batch: unknown[] = decoded;
      return this.executor.submit(async () => {
        const responses: JsonRpcResponse[] = [];
        for (const item of batch) {
          const response = await this.handleOne(item);
          if (response) responses.push(response);
        }
        return responses.length > 0 ? responses : null;
      });
    }

    if (!isRecord(decoded)) {
      return failure(null, new InvalidRequestError('Request must be an object or a non-empty array'));
    }
    const single = decoded;
    return this.executor.submit(() => this.handleOne(single));
  }

  private async handleOne(candidate: unknown): Promise<JsonRpcResponse | null> {
    let request: JsonRpcRequest;
    try {
      request = validateRequest(candidate);
    } catch (err) {
      log.warn(`Rejected request: ${log.describeError(err)}`);
      return failure(null, err);
    }

    const notification = isNotification(request);
    const id = request.id ?? null;
    const reqLog = log.scoped(requestTag(request.method, id));

    try {
      const method = this.registry.get(request.method);
      if (!method) throw new MethodNotFoundError(request.method);

      reqLog.debug('Dispatching');
      const result = await method.invoke(request.params);
      return notification ? null : { jsonrpc: '2.0', id, result: result ?? null };
    } catch (err) {
      if (!(err instanceof RpcError)) {
        reqLog.error(`Failed: ${log.describeError(err)}`);
      }
      if (notification) {
        reqLog.warn(`Dropped notification error: ${log.describeError(err)}`);
        return null;
      }
      return failure(id, err);
    }
  }
}

/**
 * Check the envelope shape. Throws InvalidRequestError on the first problem.
 */
export function validateRequest(value: unknown): JsonRpcRequest {
  if (!isRecord(value)) {
    throw new InvalidRequestError('Request must be an object');
  }
  if (value.jsonrpc !== '2.0') {
    throw new InvalidRequestError('Invalid jsonrpc: must be "2.0"');
  }

  const id = value.id;
  if (!(id === undefined || isJsonRpcId(id))) {
    throw new InvalidRequestError('Invalid id: must be null, string or number');
  }

  const method = value.method;
  if (typeof method !== 'string') {
    throw new InvalidRequestError('Invalid method: must be string');
  }

  let params: JsonRpcParams | undefined;
  if ('params' in value) {
    const raw = value.params;
    if (Array.isArray(raw) || isRecord(raw)) {
      params = raw;
    } else {
      throw new InvalidRequestError('Invalid params: must be array or object');
    }
  }

  return { jsonrpc: '2.0', id, method, params };
}

/** Serialize dispatcher output for the wire; null means "no body". */
export function encodeOutput(output: DispatchOutput): string | null {
  return output === null ? null : JSON.stringify(output);
}

/** `page#3`, or `page#-` for a notification. */
export function requestTag(method: string, id: JsonRpcId): string {
  return `${method}#${id ?? '-'}`;
}

function failure(id: JsonRpcId, err: unknown): JsonRpcFailure {
  return { jsonrpc: '2.0', id, error: toErrorObject(err) };
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
