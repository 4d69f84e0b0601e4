import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { CommandRunner } from '../utils/CommandRunner';
import { BuildTool } from './BuildTool';
import { PatternDatabase } from './PatternDatabase';
import { RemediationExecutor } from './RemediationExecutor';
import { BuildAttempt, BuildOutcome, BuildPhase, FailureKind, PhaseResult } from './types';
import { Platform } from './utils/Environment';

export const MAX_RETRY_ATTEMPTS = 3;
export const FAILURE_EXCERPT_LENGTH = 300;

export interface BuildRecoveryControllerOptions {
    patterns: PatternDatabase;
    buildTool: BuildTool;
    /** Runs remediation commands */
    runner: CommandRunner;
    platform: Platform;
    remediationTimeoutMs?: number;
}

type FailureResolution =
    | { retry: true }
    | { retry: false; outcome: BuildOutcome };

const PHASE_LABEL: Record<BuildPhase, string> = {
    configure: 'CMake configure',
    compile: 'Build'
};

/**
 * Drives a project through configure + compile, classifying failures against the
 * pattern table and retrying after a successful remediation. Holds no state between runs.
 */
export class BuildRecoveryController {
    private readonly patterns: PatternDatabase;
    private readonly buildTool: BuildTool;
    private readonly runner: CommandRunner;
    private readonly platform: Platform;
    private readonly remediationTimeoutMs?: number;

    constructor(options: BuildRecoveryControllerOptions) {
        this.patterns = options.patterns;
        this.buildTool = options.buildTool;
        this.runner = options.runner;
        this.platform = options.platform;
        this.remediationTimeoutMs = options.remediationTimeoutMs;
    }

    public async run(projectDir: string): Promise<BuildOutcome> {
        const dir = path.resolve(projectDir);
        if (!this.isDirectory(dir)) {
            logger.error(`BuildRecoveryController: ${dir} is not a directory`);
            return { success: false, message: `Project directory not found: ${dir}`, failure: FailureKind.PROJECT_MISSING };
        }

        const remediation = new RemediationExecutor(this.runner, {
            platform: this.platform,
            timeoutMs: this.remediationTimeoutMs,
            cwd: dir
        });

        for (let attempt = 1; attempt <= MAX_RETRY_ATTEMPTS; attempt++) {
            logger.info(`📦 Build attempt ${attempt}/${MAX_RETRY_ATTEMPTS}`);

            const configured = await this.runPhase(dir, 'configure', attempt);
            if (configured.exitCode !== 0) {
                const resolution = await this.handleFailure(configured, remediation);
                if (resolution.retry) continue;
                return resolution.outcome;
            }

            const compiled = await this.runPhase(dir, 'compile', attempt);
            if (compiled.exitCode !== 0) {
                const resolution = await this.handleFailure(compiled, remediation);
                if (resolution.retry) continue;
                return resolution.outcome;
            }

            logger.info('  ✓ Build successful');
            return { success: true, message: 'Build completed successfully' };
        }

        return {
            success: false,
            message: `Build failed after ${MAX_RETRY_ATTEMPTS} attempts`,
            failure: FailureKind.RETRIES_EXHAUSTED
        };
    }

    private isDirectory(dir: string): boolean {
        try {
            return fs.statSync(dir).isDirectory();
        } catch {
            return false;
        }
    }

    private async runPhase(dir: string, phase: BuildPhase, attempt: number): Promise<BuildAttempt> {
        logger.info(`  → Running: ${this.buildTool.name} ${phase === 'configure' ? 'configure' : 'build'}`);

        let result: PhaseResult;
        try {
            result = phase === 'configure'
                ? await this.buildTool.configure(dir)
                : await this.buildTool.build(dir);
        } catch (e) {
            result = { exitCode: 1, output: e instanceof Error ? e.message : String(e) };
        }

        return { attempt, phase, exitCode: result.exitCode, output: result.output };
    }

    private async handleFailure(failed: BuildAttempt, remediation: RemediationExecutor): Promise<FailureResolution> {
        const label = PHASE_LABEL[failed.phase];
        logger.error(`  ✗ ${label} failed (attempt ${failed.attempt}, exit ${failed.exitCode})`);

        const pattern = this.patterns.match(failed.output, this.platform);
        if (pattern) {
            logger.warn(`  → ${pattern.user_message}`);
            const recovery = await remediation.recover(pattern);
            if (recovery.fixed) {
                logger.info(`  ↻ Retrying after ${recovery.stage} "${recovery.method}"`);
                return { retry: true };
            }
        } else {
            logger.warn('  → No known error pattern matched this output');
        }

        const failure = pattern
            ? (failed.phase === 'configure' ? FailureKind.CONFIGURE : FailureKind.COMPILE)
            : FailureKind.UNMATCHED;

        return {
            retry: false,
            outcome: {
                success: false,
                message: `${label} failed: ${failed.output.slice(0, FAILURE_EXCERPT_LENGTH)}`,
                failure
            }
        };
    }
}
