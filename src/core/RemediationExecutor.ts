import { logger } from '../utils/logger';
import { CommandResult, CommandRunner } from '../utils/CommandRunner';
import { Action, ErrorPattern } from './PatternDatabase';
import { Platform } from './utils/Environment';

export const DEFAULT_REMEDIATION_TIMEOUT_MS = 30000;

export type RecoveryStage = 'auto_fix' | 'fallback';

export interface RecoveryOutcome {
    fixed: boolean;
    stage?: RecoveryStage;
    method?: string;
}

export interface RemediationOptions {
    platform: Platform;
    timeoutMs?: number;
    cwd?: string;
}

function present(value: string | null | undefined): value is string {
    return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Pick the command for this host, falling back to the generic one.
 */
export function selectCommand(action: Action, platform: Platform): string | undefined {
    const order: Array<string | null | undefined> = (() => {
        switch (platform) {
            case Platform.WINDOWS:
                return [action.command_windows, action.command];
            case Platform.DARWIN:
                return [action.command_macos, action.command_linux, action.command];
            default:
                return [action.command_linux, action.command];
        }
    })();
    return order.find(present);
}

export class RemediationExecutor {
    private readonly timeoutMs: number;

    constructor(private readonly runner: CommandRunner, private readonly options: RemediationOptions) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_REMEDIATION_TIMEOUT_MS;
    }

    /**
     * Run actions in order and stop at the first command that exits 0.
     * Returns the method of the action that applied, or undefined.
     */
    public async applyActions(actions: ReadonlyArray<Action>): Promise<string | undefined> {
        for (const action of actions) {
            const method = action.method || 'unnamed fix';
            const command = selectCommand(action, this.options.platform);

            if (!command) {
                logger.info(`  → ${action.message || method}`);
                continue;
            }

            logger.info(`  → Executing fix: ${method}`);
            let result: CommandResult;
            try {
                result = await this.runner.run({ command, cwd: this.options.cwd, timeoutMs: this.timeoutMs });
            } catch (e) {
                logger.warn(`  ✗ Fix failed: ${method} - ${e instanceof Error ? e.message : String(e)}`);
                continue;
            }

            if (result.timedOut) {
                logger.warn(`  ✗ Fix timeout: ${method}`);
                continue;
            }
            if (result.exitCode === 0) {
                logger.info(`  ✓ Fixed: ${method}`);
                return method;
            }
            logger.warn(`  ✗ Fix failed: ${method} (exit ${result.exitCode})`);
        }
        return undefined;
    }

    /**
     * Remediation actions first, then every fallback on its own.
     */
    public async recover(pattern: ErrorPattern): Promise<RecoveryOutcome> {
        const fixedBy = await this.applyActions(pattern.auto_fix);
        if (fixedBy !== undefined) {
            return { fixed: true, stage: 'auto_fix', method: fixedBy };
        }

        for (const fallback of pattern.fallback) {
            const fallbackBy = await this.applyActions([fallback]);
            if (fallbackBy !== undefined) {
                return { fixed: true, stage: 'fallback', method: fallbackBy };
            }
        }

        return { fixed: false };
    }
}
