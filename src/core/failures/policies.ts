// src/core/failures/policies.ts

import { Logger } from '../logging/Logger';
import {
    FailureClass,
    FailureMessage,
    FailurePolicy,
    FailureProcessingResult,
    FailuresAccessor,
    FailureSeverity,
} from './types';

/**
 * Default policy: warnings are deleted, errors with a resolution are resolved,
 * any remaining error fails the scope.
 */
export class WarningSwallowerPolicy implements FailurePolicy {
    public readonly name = 'warning-swallower';

    classify(failure: FailureMessage): FailureClass {
        return failure.severity === FailureSeverity.Warning ? 'Warning' : 'Error';
    }

    preprocess(accessor: FailuresAccessor): FailureProcessingResult {
        let result: FailureProcessingResult = 'continue';

        for (const failure of accessor.getFailures()) {
            if (this.classify(failure) === 'Warning') {
                Logger.debug('FailurePolicy', `Suppressed warning in '${accessor.scopeName}': ${failure.description}`);
                accessor.deleteWarning(failure);
            } else if (failure.resolution) {
                Logger.info('FailurePolicy', `Resolving '${failure.description}' via '${failure.resolution.description}'`);
                accessor.resolveFailure(failure);
            } else {
                Logger.warn('FailurePolicy', `Unresolvable error in '${accessor.scopeName}': ${failure.description}`);
                result = 'proceedWithRollback';
            }
        }

        return result;
    }
}

/**
 * Used when a batch runs with continueOnWarning = false: every failure,
 * warning or error, fails the scope.
 */
export class StrictFailurePolicy implements FailurePolicy {
    public readonly name = 'strict';

    classify(_failure: FailureMessage): FailureClass {
        return 'Error';
    }

    preprocess(accessor: FailuresAccessor): FailureProcessingResult {
        const failures = accessor.getFailures();
        if (failures.length === 0) return 'continue';

        Logger.warn('FailurePolicy', `Strict policy rejecting ${failures.length} failure(s) in '${accessor.scopeName}'`);
        return 'proceedWithRollback';
    }
}
