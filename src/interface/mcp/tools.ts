// src/interface/mcp/tools.ts

import { CommandDispatcher, Response } from '../../core/engine';
import { OperationRegistry } from '../../core/operations/OperationRegistry';
import { Params } from '../../core/operations/types';
import { ResourceHandle } from '../../core/resource/types';

// Type aliases, not interfaces: the SDK's tool and result types are open records.
export type ToolDefinition = {
    name: string;
    description: string;
    inputSchema: {
        type: 'object';
        properties: Record<string, unknown>;
        required?: string[];
    };
};

export type ToolCallResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

const paramsProperty = {
    type: 'object',
    description: 'Parameters passed to the operation',
};

// Engine command tools
const commandDefinitions: ToolDefinition[] = [
    {
        name: 'startTransactionGroup',
        description: 'Start a transaction group; every change until commit becomes one undo step',
        inputSchema: {
            type: 'object',
            properties: {
                name: { type: 'string', description: 'Name shown in the undo history' },
            },
        },
    },
    {
        name: 'commitTransactionGroup',
        description: 'Commit the active transaction group as a single undo step',
        inputSchema: { type: 'object', properties: {} },
    },
    {
        name: 'rollbackTransactionGroup',
        description: 'Discard every change made since the active group started',
        inputSchema: { type: 'object', properties: {} },
    },
    {
        name: 'addCheckpoint',
        description: 'Add a named checkpoint to the active transaction group',
        inputSchema: {
            type: 'object',
            properties: {
                name: { type: 'string', description: 'Checkpoint label' },
            },
        },
    },
    {
        name: 'getTransactionStatus',
        description: 'Report whether a group is active, with its checkpoints',
        inputSchema: { type: 'object', properties: {} },
    },
    {
        name: 'getUndoHistory',
        description: 'Checkpoints of the active group and the most recent journal entries',
        inputSchema: {
            type: 'object',
            properties: {
                limit: { type: 'number', description: 'Max journal entries', default: 20 },
            },
        },
    },
    {
        name: 'executeWithUndo',
        description: 'Run one operation, recording a checkpoint when a group is active',
        inputSchema: {
            type: 'object',
            properties: {
                method: { type: 'string', description: 'Operation to run' },
                params: paramsProperty,
                undoName: { type: 'string', description: 'Checkpoint label' },
            },
            required: ['method'],
        },
    },
    {
        name: 'batchExecute',
        description: 'Run several operations in one transaction; commits all or nothing unless stopOnError is false',
        inputSchema: {
            type: 'object',
            properties: {
                operations: {
                    type: 'array',
                    items: {
                        type: 'object',
                        properties: {
                            method: { type: 'string' },
                            params: paramsProperty,
                        },
                        required: ['method'],
                    },
                },
                batchName: { type: 'string', default: 'Batch Operation' },
                stopOnError: { type: 'boolean', default: true },
                continueOnWarning: { type: 'boolean', default: true },
                reportPartialAsFailure: { type: 'boolean', default: true },
            },
            required: ['operations'],
        },
    },
    {
        name: 'safeExecute',
        description: 'Run one operation, rolling it back automatically when it fails',
        inputSchema: {
            type: 'object',
            properties: {
                method: { type: 'string' },
                params: paramsProperty,
                operationName: { type: 'string' },
            },
            required: ['method'],
        },
    },
    {
        name: 'verifyAndRollback',
        description: 'Run an operation, then a verification; roll back unless both succeed',
        inputSchema: {
            type: 'object',
            properties: {
                method: { type: 'string' },
                params: paramsProperty,
                verifyMethod: { type: 'string' },
                verifyParams: paramsProperty,
                operationName: { type: 'string' },
            },
            required: ['method', 'verifyMethod'],
        },
    },
    {
        name: 'listMethods',
        description: 'List engine commands and registered operations',
        inputSchema: { type: 'object', properties: {} },
    },
];

/**
 * One tool per engine command, then one per registered operation.
 */
export function buildToolDefinitions<R extends ResourceHandle>(registry: OperationRegistry<R>): ToolDefinition[] {
    const operationTools = registry.list().map((info): ToolDefinition => ({
        name: info.name,
        description: `[${info.category}] ${info.description}`,
        inputSchema: { type: 'object', ...info.params },
    }));
    return [...commandDefinitions, ...operationTools];
}

function toText(response: Response): ToolCallResult {
    const result: ToolCallResult = {
        content: [{ type: 'text', text: JSON.stringify(response, null, 2) }],
    };
    if (!response.success) {
        result.isError = true;
    }
    return result;
}

/**
 * Routes one tool call to the dispatcher and renders its response as JSON text.
 */
export async function callTool<R extends ResourceHandle>(
    dispatcher: CommandDispatcher<R>,
    name: string,
    args: Params | undefined
): Promise<ToolCallResult> {
    const response = await dispatcher.dispatch({ method: name, params: args ?? {} });
    return toText(response);
}
