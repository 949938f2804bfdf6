// src/index.ts

export { createEngine, CommandDispatcher } from './core/engine';
export type { Engine, EngineOptions, InboundCall, Response } from './core/engine';
export { OperationRegistry } from './core/operations/OperationRegistry';
export { defineOperation } from './core/operations/defineOperation';
export type { TypedOperationSpec } from './core/operations/defineOperation';
export * from './core/operations/types';
export * from './core/resource/types';
export { InMemoryModel } from './core/resource/InMemoryModel';
export type { ModelElement, NewElement, ParameterValue } from './core/resource/InMemoryModel';
export * from './core/failures/types';
export { WarningSwallowerPolicy, StrictFailurePolicy } from './core/failures/policies';
export * from './core/transactions/types';
export { TransactionManager } from './core/transactions/TransactionManager';
export { TransactionGroupManager } from './core/transactions/TransactionGroupManager';
export * from './core/batch/types';
export { BatchExecutor, collectCreatedIds } from './core/batch/BatchExecutor';
export { SafeExecutor } from './core/batch/SafeExecutor';
export { OperationRunner } from './core/batch/OperationRunner';
export type { OperationModule } from './core/modules/types';
export { ModuleManager } from './core/modules/ModuleManager';
export { ElementModule } from './core/modules/ElementModule';
export { OperationJournal } from './core/journal/OperationJournal';
export type { JournalSink, JournalEntry, JournalRecord } from './core/journal/OperationJournal';
export * from './core/errors';
export { Logger, LogLevel } from './core/logging/Logger';
