import { CommandRunner } from '../utils/CommandRunner';
import { PhaseResult } from './types';

/**
 * The external two-step build. Implementations report failures through the exit code.
 */
export interface BuildTool {
    readonly name: string;
    configure(projectDir: string): Promise<PhaseResult>;
    build(projectDir: string): Promise<PhaseResult>;
}

export interface CMakeBuildToolOptions {
    cmakePath?: string;
    buildDir?: string;
    configureArgs?: string[];
    buildArgs?: string[];
    /** 0 means no limit */
    timeoutMs?: number;
}

export class CMakeBuildTool implements BuildTool {
    public readonly name = 'cmake';
    private readonly cmakePath: string;
    private readonly buildDir: string;

    constructor(private readonly runner: CommandRunner, private readonly options: CMakeBuildToolOptions = {}) {
        this.cmakePath = options.cmakePath || 'cmake';
        this.buildDir = options.buildDir || 'build';
    }

    public configure(projectDir: string): Promise<PhaseResult> {
        return this.invoke(projectDir, ['-B', this.buildDir, ...(this.options.configureArgs ?? [])]);
    }

    public build(projectDir: string): Promise<PhaseResult> {
        return this.invoke(projectDir, ['--build', this.buildDir, ...(this.options.buildArgs ?? [])]);
    }

    private async invoke(projectDir: string, args: string[]): Promise<PhaseResult> {
        const result = await this.runner.run({
            command: this.cmakePath,
            args,
            cwd: projectDir,
            timeoutMs: this.options.timeoutMs
        });
        const timeoutNote = result.timedOut ? `\n${this.cmakePath} timed out after ${this.options.timeoutMs}ms` : '';
        return {
            exitCode: result.timedOut && result.exitCode === 0 ? 1 : result.exitCode,
            output: result.stderr + result.stdout + timeoutNote
        };
    }
}
