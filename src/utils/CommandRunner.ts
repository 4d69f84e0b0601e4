import { ChildProcess, execFile, spawn } from 'child_process';
import { logger } from './logger';
import { Environment, Platform } from '../core/utils/Environment';

export interface CommandRequest {
    /** Executable when `args` is given, otherwise a full shell command line. */
    command: string;
    args?: string[];
    cwd?: string;
    /** 0 or undefined means no limit. */
    timeoutMs?: number;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

/** Exit code reported when the process could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface CommandRunner {
    run(request: CommandRequest): Promise<CommandResult>;
}

export function describeCommand(request: CommandRequest): string {
    return request.args ? [request.command, ...request.args].join(' ') : request.command;
}

/**
 * Stop a child and everything it started. On POSIX the child leads its own process
 * group; Windows needs taskkill to reach the tree under powershell.exe.
 */
export function killProcessTree(child: ChildProcess, platform: Platform): void {
    const pid = child.pid;
    if (pid === undefined) {
        child.kill('SIGTERM');
        return;
    }
    if (platform === Platform.WINDOWS) {
        execFile('taskkill', ['/PID', String(pid), '/T', '/F'], { windowsHide: true }, (error) => {
            if (error) {
                logger.debug(`CommandRunner: taskkill for ${pid} failed: ${error.message}`);
            }
        });
        return;
    }
    try {
        process.kill(-pid, 'SIGTERM');
    } catch (e) {
        logger.debug(`CommandRunner: Could not signal process group ${pid}: ${e instanceof Error ? e.message : String(e)}`);
        child.kill('SIGTERM');
    }
}

/**
 * Runs one child process to completion. Never rejects: spawn errors, non-zero exits
 * and timeouts all come back as a CommandResult.
 */
export class ShellCommandRunner implements CommandRunner {
    constructor(private readonly platform: Platform = Environment.resolvePlatform()) {}

    public run(request: CommandRequest): Promise<CommandResult> {
        const { shell, flag } = Environment.shellFor(this.platform);
        const file = request.args ? request.command : shell;
        const args = request.args ? request.args : [flag, request.command];

        return new Promise(resolve => {
            let stdout = '';
            let stderr = '';
            let timedOut = false;
            let settled = false;
            let timer: NodeJS.Timeout | undefined;

            const finish = (result: CommandResult) => {
                if (settled) return;
                settled = true;
                if (timer) clearTimeout(timer);
                resolve(result);
            };

            const child = spawn(file, args, {
                cwd: request.cwd,
                stdio: ['ignore', 'pipe', 'pipe'],
                windowsHide: true,
                detached: this.platform !== Platform.WINDOWS,
            });

            child.stdout?.on('data', (data: Buffer) => {
                stdout += data.toString();
            });
            child.stderr?.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            child.on('error', (err) => {
                logger.debug(`CommandRunner: Failed to start "${describeCommand(request)}": ${err.message}`);
                finish({
                    exitCode: SPAWN_FAILURE_EXIT_CODE,
                    stdout,
                    stderr: stderr + err.message,
                    timedOut
                });
            });

            child.on('close', (code) => {
                finish({ exitCode: code ?? 1, stdout, stderr, timedOut });
            });

            if (request.timeoutMs && request.timeoutMs > 0) {
                timer = setTimeout(() => {
                    timedOut = true;
                    logger.debug(`CommandRunner: "${describeCommand(request)}" exceeded ${request.timeoutMs}ms, killing`);
                    killProcessTree(child, this.platform);
                    finish({ exitCode: 1, stdout, stderr, timedOut });
                }, request.timeoutMs);
            }
        });
    }
}
