// src/core/failures/types.ts

export enum FailureSeverity {
    Warning = 'warning',
    Error = 'error',
}

/**
 * A resolution the host can apply to an error-severity failure.
 */
export interface FailureResolution {
    description: string;
    apply(): void;
}

/**
 * A warning or error raised by the host while a scope was mutating the model.
 */
export interface FailureMessage {
    readonly id: string;
    readonly severity: FailureSeverity;
    readonly description: string;
    readonly elementIds?: readonly string[];
    readonly resolution?: FailureResolution;
}

/**
 * View over the failures pending on a scope at commit time.
 */
export interface FailuresAccessor {
    readonly scopeName: string;
    getFailures(): readonly FailureMessage[];
    deleteWarning(failure: FailureMessage): void;
    resolveFailure(failure: FailureMessage): void;
}

export type FailureProcessingResult = 'continue' | 'proceedWithRollback';

export type FailureClass = 'Warning' | 'Error';

/**
 * Pluggable filter attached to every scope the engine opens.
 */
export interface FailurePolicy {
    readonly name: string;
    classify(failure: FailureMessage): FailureClass;
    preprocess(accessor: FailuresAccessor): FailureProcessingResult;
}
