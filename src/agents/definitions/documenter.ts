/**
 * Documenter role definition
 */

import type { RoleDefinition } from '../../types.js';

export const documenterRole: RoleDefinition = {
  role: 'documenter',
  name: 'Documenter',
  description: 'Creates documentation, comments code, maintains README',
  authority: ['write_docs', 'update_readme', 'create_guides'],
  homePhase: 'documentation',
  capabilities: {
    consumesTask: true,
  },
};
