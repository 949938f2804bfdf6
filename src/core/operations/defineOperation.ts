// src/core/operations/defineOperation.ts

import { z } from 'zod';
import { ResourceHandle } from '../resource/types';
import { validateParams } from '../validation/paramValidator';
import { OperationContext, OperationDefinition, OperationResult, ParamSchema } from './types';

export interface TypedOperationSpec<R extends ResourceHandle, S extends z.ZodTypeAny> {
    name: string;
    schema: S;
    aliases?: string[];
    category?: string;
    description?: string;
    params?: ParamSchema;
    run(resource: R, params: z.infer<S>, context: OperationContext): Promise<OperationResult>;
}

/**
 * Builds a registry definition whose handler converts the untyped params into
 * the schema's typed shape before `run` sees them. Invalid params become a
 * ValidationError result and `run` is never called.
 */
export function defineOperation<R extends ResourceHandle, S extends z.ZodTypeAny>(
    spec: TypedOperationSpec<R, S>
): OperationDefinition<R> {
    const { schema, run, ...info } = spec;
    return {
        ...info,
        handler: async (resource, params, context) => {
            const check = validateParams(schema, params, spec.name);
            if (!check.ok) return check.failure;
            return run(resource, check.value, context);
        },
    };
}
