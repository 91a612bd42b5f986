/**
 * Tester role definition
 */

import type { RoleDefinition } from '../../types.js';

export const testerRole: RoleDefinition = {
  role: 'tester',
  name: 'Tester',
  description: 'Writes tests, validates functionality, ensures correctness',
  authority: ['write_tests', 'run_tests', 'validate_features'],
  homePhase: 'testing',
  capabilities: {
    consumesTask: true,
    validates: true,
  },
};
