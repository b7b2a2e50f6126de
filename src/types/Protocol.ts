import { z } from 'zod';

// Client -> Server messages

export const inputMessageSchema = z.object({
  type: z.literal('input'),
  data: z.string().default(''),
});

export const resizeMessageSchema = z.object({
  type: z.literal('resize'),
  rows: z.number().default(24),
  cols: z.number().default(80),
});

export const connectMessageSchema = z.object({
  type: z.literal('connect'),
  host: z.string().min(1, 'Host is required'),
  port: z.number().int().min(1).max(65535).default(22),
  username: z.string().min(1, 'Username is required'),
  credential: z.string(),
});

export const clientMessageSchema = z.discriminatedUnion('type', [
  inputMessageSchema,
  resizeMessageSchema,
  connectMessageSchema,
]);

export type InputMessage = z.infer<typeof inputMessageSchema>;
export type ResizeMessage = z.infer<typeof resizeMessageSchema>;
export type ConnectMessage = z.infer<typeof connectMessageSchema>;
export type ClientMessage = z.infer<typeof clientMessageSchema>;

// Server -> Client messages

export interface OutputMessage {
  type: 'output';
  data: string;
}

export interface ConnectedMessage {
  type: 'connected';
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

export type ServerMessage =
  | OutputMessage
  | ConnectedMessage
  | ErrorMessage;

/**
 * Parses one inbound frame. Returns null for anything that is not a
 * well-formed message of a known kind.
 */
export function parseClientMessage(raw: string | Buffer): ClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(typeof raw === 'string' ? raw : raw.toString('utf8'));
  } catch {
    return null;
  }
  const result = clientMessageSchema.safeParse(json);
  return result.success ? result.data : null;
}
