/**
 * Agent Gateway - Gateway Module
 *
 * Barrel export file for the gateway module
 */

export * from './middleware/index.js';

export { AgentGateway, createAgentGateway, type AgentGatewayOptions } from './agent-gateway.js';
export {
  GatewayServer,
  createGatewayServer,
  createPolicyLimiters,
  policyRequestsPerMinute,
  POLICY_NAMES,
  SERVICE_NAME,
  SERVICE_VERSION,
  type GatewayComponents,
  type GatewayServerOptions,
  type PolicyLimiters,
  type PolicyName,
} from './server.js';
