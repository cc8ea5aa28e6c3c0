import { z } from 'zod';

export const jsonRpcIdSchema = z.union([z.string(), z.number().int(), z.null()]);

export const jsonRpcParamsSchema = z.union([z.record(z.unknown()), z.array(z.unknown())]);

/** `code` may be a string and `message` may be missing. */
export const errorObjectSchema = z
  .object({
    code: z.union([z.number(), z.string()]).optional(),
    message: z.string().optional(),
    data: z.unknown().optional(),
  })
  .passthrough();

/**
 * Any JSON object the child prints on stdout. Members are not checked: a
 * reply is passed back as the child wrote it, even when it bends JSON-RPC.
 */
export const responseSchema = z
  .object({
    jsonrpc: z.unknown().optional(),
    id: z.unknown().optional(),
    method: z.unknown().optional(),
    result: z.unknown().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

/** Request or notification accepted by the relay endpoint. */
export const relayEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  method: z.string().min(1),
  params: jsonRpcParamsSchema.optional(),
  id: jsonRpcIdSchema.optional(),
});

export type JsonRpcId = z.infer<typeof jsonRpcIdSchema>;
export type JsonRpcParams = z.infer<typeof jsonRpcParamsSchema>;
export type MCPErrorObject = z.infer<typeof errorObjectSchema>;
export type MCPResponse = z.infer<typeof responseSchema>;
export type RelayEnvelope = z.infer<typeof relayEnvelopeSchema>;

export interface MCPRequest {
  jsonrpc: '2.0';
  method: string;
  params?: JsonRpcParams;
  id?: JsonRpcId;
}

export function buildMessage(method: string, params?: JsonRpcParams, id?: JsonRpcId): MCPRequest {
  const message: MCPRequest = id === undefined ? { jsonrpc: '2.0', method } : { jsonrpc: '2.0', id, method };
  if (params !== undefined) {
    message.params = params;
  }
  return message;
}

/** A message from the child with a method and no id is a notification, not a reply. */
export function isNotification(message: MCPResponse): boolean {
  return typeof message.method === 'string' && message.id === undefined;
}

/** The `error` member of a reply, or undefined when the reply carries none. */
export function responseError(message: MCPResponse): MCPErrorObject | undefined {
  if (message.error === undefined || message.error === null) {
    return undefined;
  }
  const parsed = errorObjectSchema.safeParse(message.error);
  return parsed.success ? parsed.data : { message: JSON.stringify(message.error) };
}

export function describeError(error: MCPErrorObject): string {
  const message = error.message ?? 'unknown error';
  return error.code === undefined ? message : `${message} (code ${error.code})`;
}
