/**
 * Role catalogue - definitions and capabilities of the worker roles
 */

import type { Phase, Role, RoleCapabilities, RoleDefinition } from '../types.js';
import { ROLES } from '../types.js';
import {
  plannerRole,
  builderRole,
  qualityCheckerRole,
  testerRole,
  documenterRole,
} from './definitions/index.js';

const ROLE_DEFINITIONS: Record<Role, RoleDefinition> = {
  planner: plannerRole,
  builder: builderRole,
  quality_checker: qualityCheckerRole,
  tester: testerRole,
  documenter: documenterRole,
};

export type Capability = keyof RoleCapabilities;

export function getRoleDefinition(role: Role): RoleDefinition {
  return ROLE_DEFINITIONS[role];
}

/**
 * All role definitions in workflow order
 */
export function listRoleDefinitions(): RoleDefinition[] {
  return ROLES.map(role => ROLE_DEFINITIONS[role]);
}

export function hasCapability(role: Role, capability: Capability): boolean {
  return ROLE_DEFINITIONS[role].capabilities[capability] === true;
}

/**
 * The role whose work defines a phase; `done` has none
 */
export function homeRoleOf(phase: Phase): Role | null {
  return ROLES.find(role => ROLE_DEFINITIONS[role].homePhase === phase) ?? null;
}
