export class HarnessError extends Error {
    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
        this.name = 'HarnessError';
    }
}

/**
 * Fatal: malformed invocation, missing program under test, or a scratch
 * directory holding something other than regular files.
 */
export class PreconditionViolationError extends HarnessError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'PreconditionViolationError';
    }
}

export class ConfigError extends PreconditionViolationError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
    }
}

/**
 * The program under test exited non-zero (or timed out) where exit code 0 was
 * required. Only thrown where the failure invalidates the run (timed mode).
 */
export class ProcessFailureError extends HarnessError {
    constructor(
        message: string,
        public readonly exitCode: number | null,
        public readonly stderr: string = ''
    ) {
        super(message);
        this.name = 'ProcessFailureError';
    }
}

export class ProcessLaunchError extends HarnessError {
    constructor(exec: string, cause: unknown) {
        super(`Failed to launch ${exec}: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
        this.name = 'ProcessLaunchError';
    }
}
