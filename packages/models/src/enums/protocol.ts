/**
 * Protocol commands the session controller intercepts or synthesizes.
 */
export const Commands = {
  LAUNCH: 'launch',
  ATTACH: 'attach',
  DISCONNECT: 'disconnect',
} as const;

export type InterceptedCommand = (typeof Commands)[keyof typeof Commands];

/**
 * Event types whose receipt means the debugging conversation is winding down
 */
export const TerminalEvents = {
  TERMINATED: 'terminated',
  EXITED: 'exited',
} as const;

export type TerminalEventType =
  (typeof TerminalEvents)[keyof typeof TerminalEvents];
