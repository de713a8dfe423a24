import {
  JSON_RPC_ERRORS,
  JSON_RPC_ERROR_MESSAGES,
  type JsonRpcErrorCode,
  type JsonRpcErrorObject,
} from './types.js';

/**
 * A protocol-level failure with its JSON-RPC code. The envelope message is
 * the standard one for the code; `message` here becomes `data.message`.
 */
export class RpcError extends Error {
  constructor(readonly code: JsonRpcErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RpcError';
  }
}

export class ParseError extends RpcError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(JSON_RPC_ERRORS.PARSE_ERROR, detail, options);
    this.name = 'ParseError';
  }
}

export class InvalidRequestError extends RpcError {
  constructor(detail: string) {
    super(JSON_RPC_ERRORS.INVALID_REQUEST, detail);
    this.name = 'InvalidRequestError';
  }
}

export class MethodNotFoundError extends RpcError {
  constructor(readonly method: string) {
    super(JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Unknown method: ${method}`);
    this.name = 'MethodNotFoundError';
  }
}

export class InvalidParamsError extends RpcError {
  constructor(detail: string) {
    super(JSON_RPC_ERRORS.INVALID_PARAMS, detail);
    this.name = 'InvalidParamsError';
  }
}

/**
 * Map anything thrown during dispatch onto a JSON-RPC error object.
 * Non-RpcError failures (session state, page size, driver) are Internal Error
 * and keep their own message so callers can tell them apart.
 */
export function toErrorObject(err: unknown): JsonRpcErrorObject {
  if (err instanceof RpcError) {
    return {
      code: err.code,
      message: JSON_RPC_ERROR_MESSAGES[err.code],
      data: { message: err.message },
    };
  }

  const message = err instanceof Error ? err.message : String(err);
  return {
    code: JSON_RPC_ERRORS.INTERNAL_ERROR,
    message,
    data: { message, stacktrace: formatTrace(err) },
  };
}

/** Stack of the error followed by its cause chain. */
export function formatTrace(err: unknown): string {
  const lines: string[] = [];
  let current: unknown = err;
  let depth = 0;

  while (current !== undefined && depth < 8) {
    if (depth > 0) lines.push('Caused by:');
    if (current instanceof Error) {
      lines.push(current.stack ?? `${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(String(current));
      current = undefined;
    }
    depth++;
  }
  return lines.join('\n');
}
