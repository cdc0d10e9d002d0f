export { ConsultationGateway } from './gateway.js';
export type { GatewayOptions, GatewayStatus, GenerateOptions } from './gateway.js';
