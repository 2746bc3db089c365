/**
 * Final outcome of a debug session, settled exactly once.
 *
 * - `terminated`: the conversation wound down without a restart request
 * - `restarted`: the client asked for a restart while disconnecting
 */
export type ExitVerdict = 'terminated' | 'restarted';

export const ExitVerdicts = {
  TERMINATED: 'terminated',
  RESTARTED: 'restarted',
} as const satisfies Record<string, ExitVerdict>;
