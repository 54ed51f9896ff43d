/**
 * JSON-RPC 2.0 messages as they travel over a tool server's stdio: one JSON
 * object per line.
 */

import { z } from 'zod';

export type JsonRpcId = number | string;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: unknown;
  error?: JsonRpcErrorObject;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

export const METHOD_NOT_FOUND = -32601;

/** A line read from the server, classified. */
export type IncomingMessage =
  | { kind: 'result'; id: JsonRpcId; result: unknown }
  | { kind: 'error'; id: JsonRpcId; error: JsonRpcErrorObject }
  | { kind: 'request'; id: JsonRpcId; method: string; params?: unknown }
  | { kind: 'notification'; method: string; params?: unknown }
  | { kind: 'invalid'; id?: JsonRpcId; reason: string };

const idSchema = z.union([z.number(), z.string()]);

const errorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const envelopeSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: idSchema.optional(),
    method: z.string().optional(),
    params: z.unknown().optional(),
    result: z.unknown().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseMessage(line: string): IncomingMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { kind: 'invalid', reason: `not JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  if (!isRecord(raw)) {
    return { kind: 'invalid', reason: 'not a JSON object' };
  }

  const maybeId = idSchema.safeParse(raw.id);
  const id = maybeId.success ? maybeId.data : undefined;
  const invalid = (reason: string): IncomingMessage =>
    id === undefined ? { kind: 'invalid', reason } : { kind: 'invalid', id, reason };

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    const issue = envelope.error.issues[0];
    return invalid(`bad envelope at '${issue?.path.join('.') ?? ''}': ${issue?.message ?? 'invalid'}`);
  }
  const message = envelope.data;

  if (message.method !== undefined) {
    if (message.id !== undefined) {
      return { kind: 'request', id: message.id, method: message.method, params: message.params };
    }
    return { kind: 'notification', method: message.method, params: message.params };
  }

  if (message.id === undefined) {
    return invalid('response without id');
  }
  if ('error' in raw && raw.error !== undefined) {
    const error = errorSchema.safeParse(raw.error);
    if (!error.success) {
      return invalid('malformed error object');
    }
    return { kind: 'error', id: message.id, error: error.data };
  }
  if (!('result' in raw)) {
    return invalid('response has neither result nor error');
  }
  return { kind: 'result', id: message.id, result: raw.result };
}

export function encodeMessage(message: JsonRpcMessage): string {
  return `${JSON.stringify(message)}\n`;
}
