import { z } from 'zod';

/**
 * WebSocket message schemas shared by the server and any viewer client.
 */

export const StartAnalysisSchema = z.object({
  type: z.literal('start_analysis'),
  id: z.string().optional(),
});

export const StopAnalysisSchema = z.object({
  type: z.literal('stop_analysis'),
  id: z.string().optional(),
});

export const PingSchema = z.object({
  type: z.literal('ping'),
  id: z.string().optional(),
});

export const GetHistorySchema = z.object({
  type: z.literal('get_history'),
  id: z.string().optional(),
  payload: z
    .object({
      limit: z.number().int().positive().max(500).optional(),
    })
    .optional(),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  StartAnalysisSchema,
  StopAnalysisSchema,
  PingSchema,
  GetHistorySchema,
]);
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ServerMessageType =
  | 'connected'
  | 'frame'
  | 'analysis_result'
  | 'status'
  | 'error'
  | 'analysis_started'
  | 'analysis_stopped'
  | 'history'
  | 'pong';

export interface ServerMessage {
  type: ServerMessageType;
  payload?: unknown;
  id?: string;
}

export type ParsedClientMessage =
  | { ok: true; message: ClientMessage }
  | { ok: false; error: string };

export function parseClientMessage(raw: string): ParsedClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Invalid message format' };
  }

  const parsed = ClientMessageSchema.safeParse(data);
  if (!parsed.success) {
    const type =
      typeof data === 'object' && data !== null && 'type' in data ? String(data.type) : 'undefined';
    const known = ClientMessageSchema.options.some((option) => option.shape.type.value === type);
    return { ok: false, error: known ? `Invalid ${type} message` : `Unknown message type: ${type}` };
  }
  return { ok: true, message: parsed.data };
}
