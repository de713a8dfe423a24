/**
 * JSON-RPC 2.0 envelope types and the standard error codes.
 */

export type JsonRpcId = string | number | null;

export type JsonRpcParams = unknown[] | Record<string, unknown>;

/** A request envelope that passed validation. */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  /** undefined or null marks a notification. */
  id?: JsonRpcId;
  method: string;
  params?: JsonRpcParams;
}

export interface JsonRpcErrorData {
  message: string;
  stacktrace?: string;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: JsonRpcErrorData;
}

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

/** What one raw body produces: one envelope, a batch of them, or nothing. */
export type DispatchOutput = JsonRpcResponse | JsonRpcResponse[] | null;

export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export type JsonRpcErrorCode = typeof JSON_RPC_ERRORS[keyof typeof JSON_RPC_ERRORS];

export const JSON_RPC_ERROR_MESSAGES: Record<JsonRpcErrorCode, string> = {
  [JSON_RPC_ERRORS.PARSE_ERROR]: 'Parse error',
  [JSON_RPC_ERRORS.INVALID_REQUEST]: 'Invalid Request',
  [JSON_RPC_ERRORS.METHOD_NOT_FOUND]: 'Method not found',
  [JSON_RPC_ERRORS.INVALID_PARAMS]: 'Invalid params',
  [JSON_RPC_ERRORS.INTERNAL_ERROR]: 'Internal error',
};

export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === undefined || request.id === null;
}
