/**
 * Quality checker role definition
 */

import type { RoleDefinition } from '../../types.js';

export const qualityCheckerRole: RoleDefinition = {
  role: 'quality_checker',
  name: 'Quality Checker',
  description: 'Reviews code quality, enforces standards, validates implementations',
  authority: ['review_code', 'request_changes', 'approve_tasks'],
  homePhase: 'quality_check',
  capabilities: {
    consumesTask: true,
    validates: true,
  },
};
