/**
 * Validation tests
 */

import { describe, it, expect } from 'vitest';
import {
  CompletionSchema,
  ImportedTaskSchema,
  TaskDraftSchema,
  isRole,
  validate,
} from '../../src/utils/validation.js';

describe('Validation', () => {
  describe('TaskDraftSchema', () => {
    it('should validate a draft', () => {
      const result = validate(TaskDraftSchema, {
        id: 'T2',
        role: 'builder',
        description: 'Add sessions',
        dependencies: ['T1'],
        priority: 7,
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.dependencies).toEqual(['T1']);
      }
    });

    it('should reject an unknown role', () => {
      const result = validate(TaskDraftSchema, { id: 'T1', role: 'manager', description: 'x' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0]?.startsWith('role: ')).toBe(true);
      }
    });

    it('should reject an empty id', () => {
      expect(validate(TaskDraftSchema, { id: '', role: 'builder', description: 'x' }).success).toBe(false);
    });

    it('should reject a fractional priority', () => {
      expect(validate(TaskDraftSchema, { id: 'T1', role: 'builder', description: 'x', priority: 2.5 }).success).toBe(false);
    });
  });

  describe('CompletionSchema', () => {
    it('should default the artifact summary', () => {
      const result = validate(CompletionSchema, { taskId: 'T1', outcome: 'success' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.artifactSummary).toBe('');
      }
    });

    it('should reject an unknown outcome', () => {
      expect(validate(CompletionSchema, { taskId: 'T1', outcome: 'maybe' }).success).toBe(false);
    });

    it('should validate nested task drafts', () => {
      const result = validate(CompletionSchema, {
        taskId: 'planning',
        outcome: 'success',
        tasks: [{ id: 'T1', role: 'builder' }],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors[0]?.startsWith('tasks.0.description: ')).toBe(true);
      }
    });
  });

  describe('ImportedTaskSchema', () => {
    it('should accept numeric ids and aliased fields', () => {
      const result = validate(ImportedTaskSchema, { task_id: 3, subject: 'Write docs', blockedBy: [1, 2] });

      expect(result.success).toBe(true);
    });

    it('should require an id', () => {
      const result = validate(ImportedTaskSchema, { description: 'x' });

      expect(result).toEqual({ success: false, errors: [': Either id or task_id must be provided'] });
    });

    it('should require a description', () => {
      const result = validate(ImportedTaskSchema, { id: 'T1' });

      expect(result).toEqual({ success: false, errors: [': Either description or subject must be provided'] });
    });
  });

  describe('isRole', () => {
    it('should recognise role names', () => {
      expect(isRole('quality_checker')).toBe(true);
      expect(isRole('manager')).toBe(false);
      expect(isRole(3)).toBe(false);
    });
  });
});
