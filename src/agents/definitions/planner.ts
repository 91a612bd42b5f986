/**
 * Planner role definition
 */

import type { RoleDefinition } from '../../types.js';

export const plannerRole: RoleDefinition = {
  role: 'planner',
  name: 'Planner',
  description: 'Analyzes requirements, creates task breakdowns, designs architecture',
  authority: ['create_tasks', 'update_architecture', 'define_requirements'],
  homePhase: 'planning',
  capabilities: {
    producesTasks: true,
    consumesTask: true,
  },
};
