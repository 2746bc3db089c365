/**
 * Arguments of the synthetic `attach` request built once the debuggee is reachable
 */
export interface AttachArguments {
  hostName: string;
  port: number;
}

/**
 * Fields of a client `disconnect` request the gateway reads
 */
export interface DisconnectArguments {
  restart?: boolean;
  terminateDebuggee?: boolean;
}
