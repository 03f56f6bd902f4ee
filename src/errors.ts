/**
 * Error raised for malformed input (empty memo, bad revenue rows).
 * Never retried; surfaced to the caller as-is.
 */
export class ValidationError extends Error {
    constructor(
        message: string,
        public readonly rowIndex?: number,
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

/**
 * An external capability (completion, embedding, similarity search) failed.
 */
export class ServiceError extends Error {
    constructor(
        message: string,
        public readonly service: string,
        public readonly originalError?: unknown,
    ) {
        super(message);
        this.name = 'ServiceError';
    }
}

/**
 * An external call exceeded its deadline. Treated like a ServiceError for fallback purposes.
 */
export class TimeoutError extends ServiceError {
    constructor(
        service: string,
        public readonly timeoutMs: number,
    ) {
        super(`${service} timed out after ${timeoutMs}ms`, service);
        this.name = 'TimeoutError';
    }
}

/**
 * The synthesis model answered, but not with one of the allowed decisions.
 */
export class SynthesisParseError extends Error {
    constructor(
        message: string,
        public readonly rawOutput: string,
    ) {
        super(message);
        this.name = 'SynthesisParseError';
    }
}

/**
 * One analysis branch ran out of fallback tiers.
 */
export class BranchExhaustedError extends Error {
    constructor(
        public readonly branch: 'qualitative' | 'quantitative',
        public readonly reasons: string[],
    ) {
        super(`${branch} analysis exhausted all tiers: ${reasons.join('; ')}`);
        this.name = 'BranchExhaustedError';
    }
}

/**
 * Both analysis branches failed. The only error that fails a whole request.
 */
export class TerminalPipelineError extends Error {
    constructor(
        public readonly qualitativeReason: string,
        public readonly quantitativeReason: string,
    ) {
        super(
            `Both analysis branches failed. Qualitative: ${qualitativeReason}. Quantitative: ${quantitativeReason}.`,
        );
        this.name = 'TerminalPipelineError';
    }
}

/**
 * The caller cancelled the request; outstanding work was aborted.
 */
export class CancelledAnalysisError extends Error {
    constructor(message = 'Analysis was cancelled') {
        super(message);
        this.name = 'CancelledAnalysisError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    return String(error);
}
