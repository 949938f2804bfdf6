// tests/helpers/fixtures.ts

import { BatchExecutor } from '../../src/core/batch/BatchExecutor';
import { OperationRunner } from '../../src/core/batch/OperationRunner';
import { SafeExecutor } from '../../src/core/batch/SafeExecutor';
import { ErrorKind } from '../../src/core/errors';
import { WarningSwallowerPolicy } from '../../src/core/failures/policies';
import { FailureClass, FailurePolicy, FailureProcessingResult } from '../../src/core/failures/types';
import { JournalSink } from '../../src/core/journal/OperationJournal';
import { ElementModule } from '../../src/core/modules/ElementModule';
import { OperationModule } from '../../src/core/modules/types';
import { OperationRegistry } from '../../src/core/operations/OperationRegistry';
import { OperationDefinition, fail, ok } from '../../src/core/operations/types';
import { InMemoryModel } from '../../src/core/resource/InMemoryModel';
import { TransactionGroupManager } from '../../src/core/transactions/TransactionGroupManager';
import { TransactionManager } from '../../src/core/transactions/TransactionManager';

/**
 * Small operations with fixed outcomes:
 * opA / opC create one wall each, opB creates a wall then reports "X not found",
 * explode creates a wall then throws.
 */
export class ScenarioModule implements OperationModule<InMemoryModel> {
    public readonly id = 'scenario';
    public readonly name = 'Scenario';
    public readonly description = 'Fixed-outcome operations';
    public readonly version = '0.0.1';

    async initialize(): Promise<void> { }

    operations(): OperationDefinition<InMemoryModel>[] {
        return [
            {
                name: 'opA',
                handler: (model, _params, context) => context.withTransaction('opA', async () => {
                    const element = model.createElement({ category: 'Walls', name: 'A' });
                    return ok({ elementId: element.id });
                }),
            },
            {
                name: 'opB',
                handler: (model, _params, context) => context.withTransaction('opB', async () => {
                    model.createElement({ category: 'Walls', name: 'B' });
                    return fail(ErrorKind.NotFound, 'X not found');
                }),
            },
            {
                name: 'opC',
                handler: (model, _params, context) => context.withTransaction('opC', async () => {
                    const element = model.createElement({ category: 'Walls', name: 'C' });
                    return ok({ elementId: element.id });
                }),
            },
            {
                name: 'explode',
                handler: (model, _params, context) => context.withTransaction('explode', async () => {
                    model.createElement({ category: 'Walls', name: 'E' });
                    throw new Error('boom');
                }),
            },
        ];
    }
}

/**
 * Policy that throws whenever a scope commits with pending failures.
 */
export class ThrowingPolicy implements FailurePolicy {
    public readonly name = 'throwing';

    classify(): FailureClass {
        return 'Warning';
    }

    preprocess(): FailureProcessingResult {
        throw new Error('policy exploded');
    }
}

export interface Stack {
    model: InMemoryModel;
    registry: OperationRegistry<InMemoryModel>;
    transactions: TransactionManager<InMemoryModel>;
    runner: OperationRunner<InMemoryModel>;
    batches: BatchExecutor<InMemoryModel>;
    safe: SafeExecutor<InMemoryModel>;
    groups: TransactionGroupManager;
}

export function buildStack(journal?: JournalSink, policy: FailurePolicy = new WarningSwallowerPolicy()): Stack {
    const model = new InMemoryModel('Test Model');
    const registry = new OperationRegistry<InMemoryModel>();
    for (const module of [new ElementModule(), new ScenarioModule()]) {
        for (const operation of module.operations()) {
            registry.register({ category: module.name, ...operation });
        }
    }
    registry.seal();

    const transactions = new TransactionManager(model, policy);
    const runner = new OperationRunner(registry, transactions);
    return {
        model,
        registry,
        transactions,
        runner,
        batches: new BatchExecutor(runner, transactions, journal),
        safe: new SafeExecutor(runner, transactions, journal),
        groups: new TransactionGroupManager(transactions, journal),
    };
}

export function names(model: InMemoryModel): string[] {
    return model.snapshot().map(e => e.name);
}
