import { z } from 'zod';

const seq = z.number().int().nonnegative();

export const DapRequestSchema = z
  .object({
    seq,
    type: z.literal('request'),
    command: z.string().min(1),
    arguments: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export const DapResponseSchema = z
  .object({
    seq,
    type: z.literal('response'),
    request_seq: seq,
    command: z.string().min(1),
    success: z.boolean(),
    message: z.string().optional(),
    body: z.unknown().optional(),
  })
  .passthrough();

export const DapEventSchema = z
  .object({
    seq,
    type: z.literal('event'),
    event: z.string().min(1),
    body: z.unknown().optional(),
  })
  .passthrough();

export const DapMessageSchema = z.discriminatedUnion('type', [
  DapRequestSchema,
  DapResponseSchema,
  DapEventSchema,
]);

export type DapMessageZod = z.infer<typeof DapMessageSchema>;
