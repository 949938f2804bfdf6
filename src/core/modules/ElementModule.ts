import { z } from 'zod';
import { OperationModule } from './types';
import { Logger } from '../logging/Logger';
import { ErrorKind } from '../errors';
import { FailureSeverity } from '../failures/types';
import { TypedOperationSpec, defineOperation } from '../operations/defineOperation';
import { OperationDefinition, ParamSchema, fail, ok } from '../operations/types';
import { InMemoryModel } from '../resource/InMemoryModel';

const ElementIdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);
const ParameterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const CreateElementSchema = z.object({
    category: z.string().min(1),
    name: z.string().min(1),
    hostId: ElementIdSchema.optional(),
    parameters: z.record(ParameterValueSchema).optional(),
});

const ElementRefSchema = z.object({
    elementId: ElementIdSchema,
});

const SetParameterSchema = z.object({
    elementId: ElementIdSchema,
    name: z.string().min(1),
    value: ParameterValueSchema,
});

const CountElementsSchema = z.object({
    category: z.string().min(1).optional(),
    expected: z.number().int().min(0).optional(),
    min: z.number().int().min(0).optional(),
});

const elementIdProperty = { type: ['string', 'number'], description: 'Element id' };

const elementRefParams: ParamSchema = {
    properties: { elementId: elementIdProperty },
    required: ['elementId'],
};

const elementOperation = <S extends z.ZodTypeAny>(spec: TypedOperationSpec<InMemoryModel, S>) => defineOperation(spec);

/**
 * Element operations against the in-memory reference model.
 * Each mutating operation asks its context for a transaction, so it works both
 * standalone and inside a batch.
 */
export class ElementModule implements OperationModule<InMemoryModel> {
    public readonly id = 'elements';
    public readonly name = 'Element';
    public readonly description = 'Create, delete, edit and count model elements.';
    public readonly version = '1.0.0';

    async initialize(): Promise<void> {
        Logger.info('ElementModule', 'Element operations initialized.');
    }

    operations(): OperationDefinition<InMemoryModel>[] {
        return [
            elementOperation({
                name: 'createElement',
                aliases: ['placeElement'],
                description: 'Create an element, optionally hosted by another element',
                schema: CreateElementSchema,
                params: {
                    properties: {
                        category: { type: 'string', description: 'Element category, e.g. Walls' },
                        name: { type: 'string', description: 'Element name' },
                        hostId: { ...elementIdProperty, description: 'Id of the host element' },
                        parameters: {
                            type: 'object',
                            description: 'Initial parameter values',
                            additionalProperties: { type: ['string', 'number', 'boolean'] },
                        },
                    },
                    required: ['category', 'name'],
                },
                run: (model, params, context) => context.withTransaction(`Create ${params.category}`, async () => {
                    if (params.hostId !== undefined && !model.getElement(params.hostId)) {
                        return fail(ErrorKind.NotFound, `Host element ${params.hostId} not found`);
                    }

                    const identical = model.listElements(params.category).filter(e => e.name === params.name);
                    const element = model.createElement(params);
                    if (identical.length > 0) {
                        model.postFailure({
                            severity: FailureSeverity.Warning,
                            description: `There are identical instances of '${params.name}' in the same place`,
                            elementIds: [element.id, ...identical.map(e => e.id)],
                        });
                    }
                    return ok({ elementId: element.id, element });
                }),
            }),

            elementOperation({
                name: 'deleteElement',
                aliases: ['deleteElements'],
                description: 'Delete an element; hosted elements are removed with it',
                schema: ElementRefSchema,
                params: elementRefParams,
                run: (model, params, context) => context.withTransaction('Delete element', async () => {
                    if (!model.getElement(params.elementId)) {
                        return fail(ErrorKind.NotFound, `Element ${params.elementId} not found`);
                    }

                    const hosted = model.snapshot().filter(e => e.hostId === params.elementId);
                    model.deleteElement(params.elementId);
                    if (hosted.length > 0) {
                        model.postFailure({
                            severity: FailureSeverity.Error,
                            description: `Element ${params.elementId} hosts ${hosted.length} element(s)`,
                            elementIds: hosted.map(e => e.id),
                            resolution: {
                                description: 'Delete hosted elements',
                                apply: () => hosted.forEach(e => model.deleteElement(e.id)),
                            },
                        });
                    }
                    return ok({ deletedId: params.elementId, hostedElementIds: hosted.map(e => e.id) });
                }),
            }),

            elementOperation({
                name: 'setParameter',
                description: 'Set one parameter value on an element',
                schema: SetParameterSchema,
                params: {
                    properties: {
                        elementId: elementIdProperty,
                        name: { type: 'string', description: 'Parameter name' },
                        value: { type: ['string', 'number', 'boolean'] },
                    },
                    required: ['elementId', 'name', 'value'],
                },
                run: (model, params, context) => context.withTransaction(`Set ${params.name}`, async () => {
                    if (!model.getElement(params.elementId)) {
                        return fail(ErrorKind.NotFound, `Element ${params.elementId} not found`);
                    }

                    model.setParameter(params.elementId, params.name, params.value);
                    if (params.name === 'Mark') {
                        const clash = model.snapshot().some(e =>
                            e.id !== params.elementId && e.parameters.Mark === params.value
                        );
                        if (clash) {
                            model.postFailure({
                                severity: FailureSeverity.Warning,
                                description: `Elements have duplicate 'Mark' values: ${String(params.value)}`,
                                elementIds: [params.elementId],
                            });
                        }
                    }
                    return ok({ targetId: params.elementId, name: params.name, value: params.value });
                }),
            }),

            elementOperation({
                name: 'getElement',
                description: 'Read one element',
                schema: ElementRefSchema,
                params: elementRefParams,
                run: async (model, params) => {
                    const element = model.getElement(params.elementId);
                    return element
                        ? ok({ element })
                        : fail(ErrorKind.NotFound, `Element ${params.elementId} not found`);
                },
            }),

            elementOperation({
                name: 'countElements',
                description: 'Count elements; fails when the count misses `expected` or `min`',
                schema: CountElementsSchema,
                params: {
                    properties: {
                        category: { type: 'string', description: 'Only count this category' },
                        expected: { type: 'number', description: 'Exact count required' },
                        min: { type: 'number', description: 'Minimum count required' },
                    },
                },
                run: async (model, params) => {
                    const count = model.listElements(params.category).length;
                    const what = params.category ?? 'elements';
                    if (params.expected !== undefined && count !== params.expected) {
                        return fail(ErrorKind.Validation, `Expected ${params.expected} ${what}, found ${count}`, { count });
                    }
                    if (params.min !== undefined && count < params.min) {
                        return fail(ErrorKind.Validation, `Expected at least ${params.min} ${what}, found ${count}`, { count });
                    }
                    return ok({ count });
                },
            }),
        ];
    }
}
