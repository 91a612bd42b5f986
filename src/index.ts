/**
 * autocrew - coordinator core for a small fleet of role-based agents
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Utils
export * from './utils/index.js';

// Store
export * from './store/index.js';

// Tasks
export * from './tasks/index.js';

// Agents
export * from './agents/index.js';

// Coordination
export * from './coordination/index.js';

// Reporting
export * from './reporting/index.js';
