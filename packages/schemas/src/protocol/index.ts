export { DisconnectArgumentsSchema } from './DisconnectArgumentsSchema.js';
export type { DisconnectArgumentsZod } from './DisconnectArgumentsSchema.js';
export {
  DapMessageSchema,
  DapRequestSchema,
  DapResponseSchema,
  DapEventSchema,
} from './DapMessageSchema.js';
export type { DapMessageZod } from './DapMessageSchema.js';
