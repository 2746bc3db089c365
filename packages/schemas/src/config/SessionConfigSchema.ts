import { z } from 'zod';
import { NoiseMatcherSchema } from './NoiseMatcherSchema.js';

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 5000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;
export const DEFAULT_LAUNCH_FAILURE_MESSAGE = 'Could not start debuggee';
export const DEFAULT_ADAPTER_LOGGER_NAME = 'java-debug';
export const DEFAULT_ADDRESS_PATTERN =
  'Listening for transport dt_socket at address: (\\d+)';

const DEFAULT_STREAM_CLOSED_MATCHER = {
  match: 'suffix',
  text: 'java.net.SocketException: Socket closed',
} as const;

const DEFAULT_IGNORED_MATCHERS = [
  {
    match: 'prefix',
    text: 'Exception on recording event: com.sun.jdi.VMDisconnectedException',
  },
] as const;

export const NoiseConfigSchema = z.object({
  // Only suppressed once the debuggee is known to have finished
  streamClosed: NoiseMatcherSchema.default(DEFAULT_STREAM_CLOSED_MATCHER),
  ignored: z
    .array(NoiseMatcherSchema)
    .default(() => DEFAULT_IGNORED_MATCHERS.map((m) => ({ ...m }))),
});

export const SessionConfigSchema = z.object({
  handshakeTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_HANDSHAKE_TIMEOUT_MS),
  shutdownTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
  launchFailureMessage: z
    .string()
    .min(1)
    .default(DEFAULT_LAUNCH_FAILURE_MESSAGE),
  terminalEvents: z
    .array(z.string().min(1))
    .nonempty()
    .default(['terminated', 'exited']),
  adapterLoggerName: z.string().min(1).default(DEFAULT_ADAPTER_LOGGER_NAME),
  noise: NoiseConfigSchema.default({}),
  addressPattern: z
    .string()
    .min(1)
    .refine(
      (pattern) => {
        try {
          new RegExp(pattern);
          return true;
        } catch {
          return false;
        }
      },
      { message: 'addressPattern must be a valid regular expression' },
    )
    .default(DEFAULT_ADDRESS_PATTERN),
  debuggeeHost: z.string().min(1).default('127.0.0.1'),
});

export type NoiseConfigZod = z.infer<typeof NoiseConfigSchema>;
export type SessionConfigZod = z.infer<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;
