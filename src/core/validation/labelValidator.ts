// src/core/validation/labelValidator.ts

import { z } from 'zod';
import { CONFIG } from '../../config/config';

/**
 * Characters that must never reach the host's undo stack:
 * NUL, other C0 controls, bidi overrides/marks and zero-width spaces.
 */
const FORBIDDEN_CHARS = /[\u0000-\u0008\u000b-\u001f\u007f\u200b\u200e\u200f\u202a-\u202e\uffff]/;

/**
 * Returns a reason when `label` is unusable as a group, batch or checkpoint name.
 */
export function checkLabel(label: string): string | null {
    if (label.trim().length === 0) {
        return 'Label cannot be empty';
    }
    if (FORBIDDEN_CHARS.test(label)) {
        return 'Label contains control or bidirectional characters';
    }
    if (label.length > CONFIG.VALIDATION.MAX_LABEL_LENGTH) {
        return `Label exceeds maximum length of ${CONFIG.VALIDATION.MAX_LABEL_LENGTH}`;
    }
    return null;
}

export const LabelSchema = z.string().superRefine((label, ctx) => {
    const reason = checkLabel(label);
    if (reason) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: reason });
    }
});

export const MethodNameSchema = z.string().max(CONFIG.VALIDATION.MAX_METHOD_NAME_LENGTH);
