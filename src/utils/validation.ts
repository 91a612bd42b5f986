/**
 * Input validation utilities using Zod
 */

import { z } from 'zod';
import { ROLES, type Role } from '../types.js';

export const RoleSchema = z.enum(['planner', 'builder', 'quality_checker', 'tester', 'documenter']);

export const TaskIdSchema = z.string().min(1).max(200);
export const DescriptionSchema = z.string().min(1).max(100_000);
export const PrioritySchema = z.number().int().min(0).max(100);

export const TaskDraftSchema = z.object({
  id: TaskIdSchema,
  role: RoleSchema,
  description: DescriptionSchema,
  dependencies: z.array(TaskIdSchema).optional(),
  priority: PrioritySchema.optional(),
});

export const TaskUpdateSchema = z
  .object({
    description: DescriptionSchema.optional(),
    role: RoleSchema.optional(),
    priority: PrioritySchema.optional(),
  })
  .strict()
  .refine(data => Object.values(data).some(value => value !== undefined), {
    message: 'At least one of description, role or priority must be given',
  });

export const CompletionSchema = z.object({
  taskId: TaskIdSchema,
  outcome: z.enum(['success', 'failure']),
  artifactSummary: z.string().max(1_000_000).default(''),
  tasks: z.array(TaskDraftSchema).optional(),
});

/**
 * One entry of an externally produced task list. Field aliases match the
 * task-list formats agents emit (`task_id`, `subject`, `owner`, `blockedBy`).
 */
export const ImportedTaskSchema = z
  .object({
    id: z.union([TaskIdSchema, z.number().int()]).optional(),
    task_id: z.union([TaskIdSchema, z.number().int()]).optional(),
    description: z.string().optional(),
    subject: z.string().optional(),
    agent_role: RoleSchema.optional(),
    owner: RoleSchema.optional(),
    role: RoleSchema.optional(),
    dependencies: z.array(z.union([TaskIdSchema, z.number().int()])).optional(),
    blockedBy: z.array(z.union([TaskIdSchema, z.number().int()])).optional(),
    priority: PrioritySchema.optional(),
  })
  .refine(data => data.id !== undefined || data.task_id !== undefined, {
    message: 'Either id or task_id must be provided',
  })
  .refine(data => Boolean(data.description || data.subject), {
    message: 'Either description or subject must be provided',
  });

export const ImportedTaskListSchema = z.array(ImportedTaskSchema);

export type ImportedTask = z.infer<typeof ImportedTaskSchema>;

// Validation helper
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): { success: true; data: z.infer<S> } | { success: false; errors: string[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
  };
}

// Type guards
export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some(role => role === value);
}
