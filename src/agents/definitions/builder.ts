/**
 * Builder role definition
 */

import type { RoleDefinition } from '../../types.js';

export const builderRole: RoleDefinition = {
  role: 'builder',
  name: 'Builder',
  description: 'Implements features, writes code, creates files',
  authority: ['write_code', 'edit_files', 'create_components'],
  homePhase: 'implementation',
  capabilities: {
    consumesTask: true,
  },
};
