/**
 * Network address at which a started debuggee accepts a debugger
 */
export interface DebuggeeAddress {
  host: string;
  port: number;
}
