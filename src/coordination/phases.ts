/**
 * Phase rules - which roles a phase needs and when it is finished
 */

import type { Phase, Role, Task } from '../types.js';
import { PHASE_ORDER, PHASE_TRANSITIONS, ROLES } from '../types.js';
import { getRoleDefinition, homeRoleOf } from '../agents/roles.js';

export function phaseIndex(phase: Phase): number {
  return PHASE_ORDER.indexOf(phase);
}

export function nextPhase(phase: Phase): Phase | null {
  return PHASE_TRANSITIONS[phase][0] ?? null;
}

export function isOutstanding(task: Task): boolean {
  return task.status !== 'completed';
}

/**
 * Roles that have to work in `phase`: the phase's own role, every role of
 * an earlier phase that still has unfinished tasks, and the owners of
 * unfinished dependencies of those tasks
 */
export function expectedRoles(phase: Phase, tasks: Task[]): Role[] {
  const current = phaseIndex(phase);
  const roles = new Set<Role>();

  const home = homeRoleOf(phase);
  if (home) {
    roles.add(home);
  }

  for (const role of ROLES) {
    const earlier = phaseIndex(getRoleDefinition(role).homePhase) < current;
    if (earlier && tasks.some(t => t.role === role && isOutstanding(t))) {
      roles.add(role);
    }
  }

  const byId = new Map(tasks.map(t => [t.id, t]));
  let grew = true;
  while (grew) {
    grew = false;
    for (const task of tasks) {
      if (!roles.has(task.role) || !isOutstanding(task)) continue;
      for (const depId of task.dependencies) {
        const dep = byId.get(depId);
        if (dep && isOutstanding(dep) && !roles.has(dep.role)) {
          roles.add(dep.role);
          grew = true;
        }
      }
    }
  }

  return ROLES.filter(role => roles.has(role));
}

/**
 * A phase is finished when none of its expected roles owns an unfinished
 * task. Blocked tasks hold the phase until a human resolves them.
 */
export function isPhaseComplete(phase: Phase, tasks: Task[]): boolean {
  const roles = new Set(expectedRoles(phase, tasks));
  return !tasks.some(t => roles.has(t.role) && isOutstanding(t));
}
