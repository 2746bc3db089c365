export { GatewayError, GatewayErrorCode } from './gateway-error.js';
