import { z } from 'zod';

/**
 * Literal matcher for a debuggee log message.
 *
 * The wording it matches belongs to the debugger library that produces the
 * records, so matchers are configuration rather than constants.
 */
export const NoiseMatcherSchema = z.object({
  match: z.enum(['prefix', 'suffix', 'contains']),
  text: z.string().min(1),
});

export type NoiseMatcherZod = z.infer<typeof NoiseMatcherSchema>;
