// src/core/engine/CommandDispatcher.ts

import { Mutex } from 'async-mutex';
import { z } from 'zod';
import { CONFIG } from '../../config/config';
import { BatchExecutor } from '../batch/BatchExecutor';
import { OperationRunner } from '../batch/OperationRunner';
import { SafeExecutor } from '../batch/SafeExecutor';
import { EngineError, ErrorFactory, ErrorKind } from '../errors';
import { WarningSwallowerPolicy } from '../failures/policies';
import { FailurePolicy } from '../failures/types';
import { JournalSink } from '../journal/OperationJournal';
import { Logger } from '../logging/Logger';
import { OperationRegistry } from '../operations/OperationRegistry';
import { Params, createOperation } from '../operations/types';
import { ResourceHandle } from '../resource/types';
import { TransactionGroupManager } from '../transactions/TransactionGroupManager';
import { TransactionManager } from '../transactions/TransactionManager';
import { LabelSchema, MethodNameSchema, describeIssues } from '../validation';
import {
    Response,
    batchResponse,
    safeExecuteResponse,
    serializeCheckpoints,
    toResponse,
    verifyResponse,
} from './responses';

export interface InboundCall {
    method: string;
    params?: Params;
}

export interface EngineOptions {
    failurePolicy?: FailurePolicy;
    journal?: JournalSink;
}

// -------------------------------------------------------------------------
// Command Schemas
// -------------------------------------------------------------------------
const ParamsSchema = z.record(z.unknown()).optional().default({});

const StartGroupSchema = z.object({
    name: LabelSchema.optional(),
});

const CheckpointSchema = z.object({
    name: LabelSchema.optional(),
});

const UndoHistorySchema = z.object({
    limit: z.number().int().min(1).max(200).optional().default(CONFIG.JOURNAL.HISTORY_LIMIT),
});

const ExecuteWithUndoSchema = z.object({
    method: MethodNameSchema.min(1, 'method name required'),
    params: ParamsSchema,
    undoName: LabelSchema.optional(),
});

const BatchSchema = z.object({
    operations: z.array(z.object({
        method: MethodNameSchema,
        params: ParamsSchema,
    })).min(1, 'operations array required').max(CONFIG.BATCH.MAX_OPERATIONS),
    batchName: LabelSchema.optional().default(CONFIG.BATCH.DEFAULT_NAME),
    stopOnError: z.boolean().optional().default(CONFIG.BATCH.STOP_ON_ERROR),
    continueOnWarning: z.boolean().optional().default(CONFIG.BATCH.CONTINUE_ON_WARNING),
    reportPartialAsFailure: z.boolean().optional().default(CONFIG.BATCH.REPORT_PARTIAL_AS_FAILURE),
});

const SafeExecuteSchema = z.object({
    method: MethodNameSchema.min(1, 'method name required'),
    params: ParamsSchema,
    operationName: LabelSchema.optional(),
});

const VerifySchema = z.object({
    method: MethodNameSchema.min(1, 'Both method and verifyMethod are required'),
    params: ParamsSchema,
    verifyMethod: MethodNameSchema.min(1, 'Both method and verifyMethod are required'),
    verifyParams: ParamsSchema,
    operationName: LabelSchema.optional(),
});

type CommandHandler = (params: Params) => Promise<Response>;

function defaultGroupName(): string {
    return `AI Operation ${new Date().toISOString().slice(11, 19)}`;
}

/**
 * CommandDispatcher
 * Entry point for inbound `{ method, params }` calls. Engine commands
 * (transaction groups, batches, safe/verify execution, discovery) are handled
 * here; any other method is resolved through the registry and run standalone.
 *
 * Calls are serialized: the engine is the sole mutator while a scope is open.
 */
export class CommandDispatcher<R extends ResourceHandle = ResourceHandle> {
    public readonly groups: TransactionGroupManager;

    private readonly mutex = new Mutex();
    private readonly transactions: TransactionManager<R>;
    private readonly runner: OperationRunner<R>;
    private readonly batches: BatchExecutor<R>;
    private readonly safe: SafeExecutor<R>;
    private readonly journal?: JournalSink;
    private readonly commands: Map<string, CommandHandler> = new Map();

    constructor(
        private readonly registry: OperationRegistry<R>,
        resource: R,
        options: EngineOptions = {}
    ) {
        this.journal = options.journal;
        this.transactions = new TransactionManager(resource, options.failurePolicy ?? new WarningSwallowerPolicy());
        this.runner = new OperationRunner(registry, this.transactions);
        this.groups = new TransactionGroupManager(this.transactions, this.journal);
        this.batches = new BatchExecutor(this.runner, this.transactions, this.journal);
        this.safe = new SafeExecutor(this.runner, this.transactions, this.journal);
        this.registerCommands();
    }

    async dispatch(call: InboundCall): Promise<Response> {
        return this.mutex.runExclusive(() => this.route(call));
    }

    public listCommands(): string[] {
        return [
            'startTransactionGroup', 'commitTransactionGroup', 'rollbackTransactionGroup',
            'addCheckpoint', 'getTransactionStatus', 'getUndoHistory', 'executeWithUndo',
            'batchExecute', 'safeExecute', 'verifyAndRollback', 'listMethods',
        ];
    }

    private async route(call: InboundCall): Promise<Response> {
        const params = call.params ?? {};
        const command = this.commands.get(call.method.toLowerCase());
        Logger.debug('Dispatcher', `-> ${call.method}`, { command: command !== undefined });

        try {
            if (command) {
                return await command(params);
            }
            return toResponse(await this.runner.runStandalone(createOperation(call.method, params)));
        } catch (error) {
            Logger.error('Dispatcher', `Call '${call.method}' failed`, error);
            return {
                success: false,
                error: error instanceof EngineError ? error.toUserFriendly() : ErrorFactory.messageOf(error),
                errorKind: ErrorFactory.kindOf(error),
            };
        }
    }

    private define<S extends z.ZodTypeAny>(name: string, schema: S, run: (params: z.infer<S>) => Promise<Response>): void {
        this.commands.set(name.toLowerCase(), async (params) => {
            const parsed = schema.safeParse(params);
            if (!parsed.success) {
                return {
                    success: false,
                    error: `Validation Error: ${describeIssues(parsed.error)}`,
                    errorKind: ErrorKind.Validation,
                };
            }
            return run(parsed.data);
        });
    }

    private registerCommands(): void {
        this.define('startTransactionGroup', StartGroupSchema, async ({ name }) => {
            const groupName = name ?? defaultGroupName();
            const result = await this.groups.start(groupName);
            if (result.success) {
                return {
                    success: true,
                    groupName,
                    message: `Transaction group '${groupName}' started. All operations will be combined into one undo.`,
                };
            }
            if (result.error === 'AlreadyActive') {
                return {
                    success: false,
                    error: 'AlreadyActive',
                    activeGroup: result.activeGroup,
                    message: `A transaction group is already active: '${result.activeGroup}'`,
                };
            }
            return { success: false, error: result.message, errorKind: ErrorKind.Resource };
        });

        this.define('commitTransactionGroup', z.object({}), async () => {
            const result = await this.groups.commit();
            if (result.success) {
                return {
                    success: true,
                    groupName: result.groupName,
                    checkpoints: serializeCheckpoints(result.checkpoints),
                    message: `Transaction group '${result.groupName}' committed. Can be undone as single action.`,
                };
            }
            if (result.error === 'StateError') {
                return { success: false, error: result.message, errorKind: ErrorKind.State };
            }
            return {
                success: false,
                error: result.message,
                errorKind: ErrorKind.Resource,
                groupName: result.groupName,
                rolledBackCheckpoints: serializeCheckpoints(result.checkpoints),
            };
        });

        this.define('rollbackTransactionGroup', z.object({}), async () => {
            const result = await this.groups.rollback();
            if (result.success) {
                return {
                    success: true,
                    groupName: result.groupName,
                    rolledBackCheckpoints: serializeCheckpoints(result.checkpoints),
                    message: `Transaction group '${result.groupName}' rolled back. All operations undone.`,
                };
            }
            return {
                success: false,
                error: result.message,
                errorKind: result.error === 'StateError' ? ErrorKind.State : ErrorKind.Resource,
            };
        });

        this.define('addCheckpoint', CheckpointSchema, async ({ name }) => {
            const label = name ?? `Checkpoint ${this.groups.status().checkpointCount}`;
            const result = this.groups.checkpoint(label);
            if (!result.success) {
                return { success: false, error: result.message, errorKind: ErrorKind.State };
            }
            return {
                success: true,
                checkpoint: label,
                checkpointCount: result.checkpointCount,
                activeGroup: result.activeGroup,
                message: `Checkpoint '${label}' added`,
            };
        });

        this.define('getTransactionStatus', z.object({}), async () => {
            const status = this.groups.status();
            return {
                success: true,
                hasActiveGroup: status.hasActive,
                activeGroupName: status.name,
                checkpointCount: status.checkpointCount,
                checkpoints: serializeCheckpoints(status.checkpoints),
            };
        });

        this.define('getUndoHistory', UndoHistorySchema, async ({ limit }) => {
            const status = this.groups.status();
            const recent = this.journal ? await this.journal.recent(limit) : [];
            return {
                success: true,
                checkpointsInSession: status.checkpoints.map(c => c.label),
                activeTransactionGroup: status.name,
                journal: recent.map(entry => ({
                    kind: entry.kind,
                    name: entry.name,
                    outcome: entry.outcome,
                    succeeded: entry.succeeded,
                    failed: entry.failed,
                    at: entry.createdAt.toISOString(),
                })),
            };
        });

        this.define('executeWithUndo', ExecuteWithUndoSchema, async ({ method, params, undoName }) => {
            const label = undoName ?? method;
            if (!this.registry.has(method)) {
                return { success: false, error: `Method '${method}' not found`, errorKind: ErrorKind.NotFound };
            }
            if (this.groups.activeGroupName !== null) {
                this.groups.checkpoint(`Execute: ${label}`);
            }
            const result = await this.runner.runStandalone(createOperation(method, params));
            const response: Response = {
                success: result.success,
                executedMethod: method,
                undoName: label,
                result: toResponse(result),
                message: result.success ? `Executed '${method}' with undo point` : `'${method}' failed`,
            };
            if (!result.success) {
                response.error = result.errorMessage;
            }
            return response;
        });

        this.define('batchExecute', BatchSchema, async (params) => {
            const operations = params.operations.map(op => createOperation(op.method, op.params));
            const batch = await this.batches.run(operations, {
                stopOnError: params.stopOnError,
                continueOnWarning: params.continueOnWarning,
                reportPartialAsFailure: params.reportPartialAsFailure,
            }, params.batchName);
            return batchResponse(batch);
        });

        this.define('safeExecute', SafeExecuteSchema, async ({ method, params, operationName }) => {
            const outcome = await this.safe.safeExecute(createOperation(method, params), operationName ?? method);
            return safeExecuteResponse(outcome);
        });

        this.define('verifyAndRollback', VerifySchema, async (params) => {
            const outcome = await this.safe.verifyAndRollback(
                createOperation(params.method, params.params),
                createOperation(params.verifyMethod, params.verifyParams),
                params.operationName ?? params.method
            );
            return verifyResponse(outcome);
        });

        this.define('listMethods', z.object({}), async () => ({
            success: true,
            commands: this.listCommands(),
            methods: this.registry.list(),
        }));
    }
}
