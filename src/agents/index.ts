/**
 * Agents module exports
 */

export {
  getRoleDefinition,
  listRoleDefinitions,
  hasCapability,
  homeRoleOf,
  type Capability,
} from './roles.js';

export { AgentRegistry, type AgentRegistryOptions } from './agent-registry.js';

export * from './definitions/index.js';
