// tests/unit/validation.test.ts

import { z } from 'zod';
import { ErrorKind } from '../../src/core/errors';
import { LabelSchema, checkLabel, describeIssues, validateParams } from '../../src/core/validation';

describe('Label Validation', () => {
    it('should accept ordinary labels', () => {
        expect(checkLabel('Place walls on Level 1')).toBeNull();
        expect(LabelSchema.safeParse('Checkpoint 3').success).toBe(true);
    });

    it('should reject empty or blank labels', () => {
        expect(checkLabel('   ')).toBe('Label cannot be empty');
    });

    it('should reject control characters', () => {
        expect(checkLabel('bad\u0000name')).toBe('Label contains control or bidirectional characters');
    });

    it('should reject bidi override characters', () => {
        expect(checkLabel('abc\u202edef')).toBe('Label contains control or bidirectional characters');
    });

    it('should reject labels over the length limit', () => {
        expect(checkLabel('x'.repeat(201))).toBe('Label exceeds maximum length of 200');
        expect(checkLabel('x'.repeat(200))).toBeNull();
    });
});

describe('Param Validation', () => {
    const schema = z.object({
        elementId: z.string(),
        count: z.number().int().min(1),
    });

    it('should return typed values for valid params', () => {
        const check = validateParams(schema, { elementId: '7', count: 2 }, 'demo');
        expect(check).toEqual({ ok: true, value: { elementId: '7', count: 2 } });
    });

    it('should return a ValidationError failure naming each bad field', () => {
        const check = validateParams(schema, { count: 0 }, 'demo');

        expect(check.ok).toBe(false);
        if (!check.ok) {
            expect(check.failure).toEqual({
                success: false,
                errorKind: ErrorKind.Validation,
                errorMessage: "Invalid parameters for 'demo': elementId: Required, count: Number must be greater than or equal to 1",
            });
        }
    });

    it('should describe issues without a path', () => {
        const parsed = z.string().safeParse(5);
        expect(parsed.success).toBe(false);
        if (!parsed.success) {
            expect(describeIssues(parsed.error)).toBe('Expected string, received number');
        }
    });
});
