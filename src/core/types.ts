export type BuildPhase = 'configure' | 'compile';

export enum FailureKind {
    CONFIGURE = 'configure_failure',
    COMPILE = 'compile_failure',
    UNMATCHED = 'unmatched_failure',
    RETRIES_EXHAUSTED = 'retries_exhausted',
    PROJECT_MISSING = 'project_missing'
}

export interface PhaseResult {
    exitCode: number;
    /** stderr followed by stdout */
    output: string;
}

export interface BuildAttempt {
    attempt: number;
    phase: BuildPhase;
    exitCode: number;
    output: string;
}

export interface BuildOutcome {
    success: boolean;
    message: string;
    failure?: FailureKind;
}
