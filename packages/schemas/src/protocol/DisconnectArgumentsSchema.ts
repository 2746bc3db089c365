import { z } from 'zod';

export const DisconnectArgumentsSchema = z
  .object({
    restart: z.boolean().optional(),
    terminateDebuggee: z.boolean().optional(),
  })
  .passthrough();

export type DisconnectArgumentsZod = z.infer<typeof DisconnectArgumentsSchema>;
