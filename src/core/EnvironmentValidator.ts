import fs from 'fs';
import { logger } from '../utils/logger';
import { CommandRunner, SPAWN_FAILURE_EXIT_CODE } from '../utils/CommandRunner';
import { DiskSpace, Environment, Platform } from './utils/Environment';

export interface CheckResult {
    name: string;
    ok: boolean;
    detail: string;
}

export interface ValidationReport {
    passed: boolean;
    platform: Platform;
    issues: string[];
    warnings: string[];
    checks: CheckResult[];
}

export interface EnvironmentValidatorOptions {
    platform: Platform;
    /** Try to repair what can be repaired (Windows long paths). */
    fix?: boolean;
    cmakePath?: string;
    minCmakeVersion?: string;
    minFreeDiskGB?: number;
    toolTimeoutMs?: number;
    compilerCheckTimeoutMs?: number;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    diskSpace?: (dir: string) => Promise<DiskSpace>;
    pathExists?: (p: string) => boolean;
}

interface CheckContext {
    issues: string[];
    warnings: string[];
}

type Check = (ctx: CheckContext) => Promise<CheckResult>;

const COMPILERS: Record<Platform, string[]> = {
    [Platform.WINDOWS]: ['cl', 'g++', 'clang++'],
    [Platform.LINUX]: ['g++', 'clang++'],
    [Platform.DARWIN]: ['clang++', 'g++'],
    [Platform.OTHER]: ['g++', 'clang++']
};

const LONG_PATHS_KEY = 'HKLM:\\SYSTEM\\CurrentControlSet\\Control\\FileSystem';
const MAX_VCPKG_ROOT_LENGTH = 200;
const BYTES_PER_GB = 2 ** 30;

export function parseVersion(text: string): number[] {
    return text.split('.').map(part => parseInt(part, 10)).filter(n => !Number.isNaN(n));
}

/** Compares major.minor only. */
export function meetsMinimum(found: number[], minimum: number[]): boolean {
    const [major = 0, minor = 0] = found;
    const [minMajor = 0, minMinor = 0] = minimum;
    return major > minMajor || (major === minMajor && minor >= minMinor);
}

/**
 * Pre-flight checks run before a build. CMake is the only critical check;
 * everything else contributes warnings.
 */
export class EnvironmentValidator {
    private readonly cmakePath: string;
    private readonly minCmakeVersion: string;
    private readonly minFreeDiskGB: number;
    private readonly toolTimeoutMs: number;
    private readonly compilerCheckTimeoutMs: number;
    private readonly env: NodeJS.ProcessEnv;
    private readonly cwd: string;
    private readonly diskSpace: (dir: string) => Promise<DiskSpace>;
    private readonly pathExists: (p: string) => boolean;

    constructor(private readonly runner: CommandRunner, private readonly options: EnvironmentValidatorOptions) {
        this.cmakePath = options.cmakePath || 'cmake';
        this.minCmakeVersion = options.minCmakeVersion || '3.15';
        this.minFreeDiskGB = options.minFreeDiskGB ?? 10;
        this.toolTimeoutMs = options.toolTimeoutMs ?? 5000;
        this.compilerCheckTimeoutMs = options.compilerCheckTimeoutMs ?? 2000;
        this.env = options.env ?? process.env;
        this.cwd = options.cwd ?? process.cwd();
        this.diskSpace = options.diskSpace ?? Environment.diskSpace;
        this.pathExists = options.pathExists ?? fs.existsSync;
    }

    public async validate(): Promise<ValidationReport> {
        const ctx: CheckContext = { issues: [], warnings: [] };
        const checks: Array<[string, Check]> = [
            ['CMake', c => this.checkCmake(c)],
            ['C++ Compiler', c => this.checkCompiler(c)],
            ['vcpkg Configuration', c => this.checkVcpkg(c)],
            ['Disk Space', c => this.checkDiskSpace(c)]
        ];
        if (this.options.platform === Platform.WINDOWS) {
            checks.push(['Windows Long Paths', c => this.checkWindowsLongPaths(c)]);
        }

        const results: CheckResult[] = [];
        let criticalPassed = true;

        for (const [name, check] of checks) {
            try {
                const result = await check(ctx);
                results.push(result);
                logger.debug(`EnvironmentValidator: ${name}: ${result.ok ? 'ok' : 'failed'} (${result.detail})`);
                if (!result.ok && name === 'CMake') {
                    criticalPassed = false;
                }
            } catch (e) {
                const message = e instanceof Error ? e.message : String(e);
                logger.error(`EnvironmentValidator: ${name} check failed: ${message}`);
                results.push({ name, ok: false, detail: `check failed: ${message}` });
                criticalPassed = false;
            }
        }

        return {
            passed: criticalPassed && ctx.issues.length === 0,
            platform: this.options.platform,
            issues: ctx.issues,
            warnings: ctx.warnings,
            checks: results
        };
    }

    private async checkCmake(ctx: CheckContext): Promise<CheckResult> {
        const name = 'CMake';
        const result = await this.runner.run({
            command: this.cmakePath,
            args: ['--version'],
            timeoutMs: this.toolTimeoutMs
        });

        if (result.timedOut || result.exitCode === SPAWN_FAILURE_EXIT_CODE) {
            ctx.issues.push('CMake not found in PATH');
            return { name, ok: false, detail: 'CMake not found' };
        }

        const match = /cmake version (\d+)\.(\d+)\.(\d+)/i.exec(result.stdout);
        if (!match) {
            ctx.issues.push('CMake version could not be determined');
            return { name, ok: false, detail: 'unknown version' };
        }

        const version = `${match[1]}.${match[2]}.${match[3]}`;
        if (meetsMinimum(parseVersion(version), parseVersion(this.minCmakeVersion))) {
            return { name, ok: true, detail: `CMake ${version} (>= ${this.minCmakeVersion} required)` };
        }
        ctx.issues.push(`CMake ${version} found, but ${this.minCmakeVersion}+ required`);
        return { name, ok: false, detail: `CMake ${version} (< ${this.minCmakeVersion})` };
    }

    private async checkCompiler(ctx: CheckContext): Promise<CheckResult> {
        const name = 'C++ Compiler';
        const cxx = this.env.CXX;
        if (cxx) {
            return { name, ok: true, detail: `CXX environment variable set: ${cxx}` };
        }

        for (const compiler of COMPILERS[this.options.platform]) {
            const result = await this.runner.run({
                command: compiler,
                args: ['--version'],
                timeoutMs: this.compilerCheckTimeoutMs
            });
            if (!result.timedOut && result.exitCode === 0) {
                return { name, ok: true, detail: `Detected C++ compiler: ${compiler}` };
            }
        }

        ctx.warnings.push('No C++ compiler detected. Set CXX environment variable.');
        return { name, ok: false, detail: 'No C++ compiler found' };
    }

    private async checkVcpkg(ctx: CheckContext): Promise<CheckResult> {
        const name = 'vcpkg Configuration';
        const root = this.env.VCPKG_ROOT;
        if (!root) {
            return { name, ok: true, detail: 'VCPKG_ROOT not set (vcpkg not configured)' };
        }

        if (!this.pathExists(root)) {
            ctx.warnings.push(`VCPKG_ROOT points to non-existent path: ${root}`);
            return { name, ok: false, detail: `VCPKG_ROOT path doesn't exist: ${root}` };
        }

        if (this.options.platform === Platform.WINDOWS && root.length > MAX_VCPKG_ROOT_LENGTH) {
            ctx.warnings.push(`VCPKG_ROOT path is long (${root.length} chars). May cause MAX_PATH issues.`);
            return { name, ok: true, detail: `VCPKG_ROOT path: ${root.length} characters (recommend <${MAX_VCPKG_ROOT_LENGTH})` };
        }

        return { name, ok: true, detail: `VCPKG_ROOT: ${root}` };
    }

    private async checkDiskSpace(ctx: CheckContext): Promise<CheckResult> {
        const name = 'Disk Space';
        let space: DiskSpace;
        try {
            space = await this.diskSpace(this.cwd);
        } catch (e) {
            logger.debug(`EnvironmentValidator: statfs failed: ${e}`);
            return { name, ok: true, detail: 'Disk space could not be determined' };
        }

        const freeGB = Math.floor(space.freeBytes / BYTES_PER_GB);
        if (freeGB < this.minFreeDiskGB) {
            ctx.warnings.push(`Low disk space: ${freeGB}GB available (recommend ${this.minFreeDiskGB}GB+)`);
        }
        return { name, ok: true, detail: `${freeGB}GB available` };
    }

    private async checkWindowsLongPaths(ctx: CheckContext): Promise<CheckResult> {
        const name = 'Windows Long Paths';
        const result = await this.runner.run({
            command: 'powershell',
            args: ['-Command', `Get-ItemProperty -Path "${LONG_PATHS_KEY}" -Name "LongPathsEnabled"`],
            timeoutMs: this.toolTimeoutMs
        });

        if (result.timedOut || result.exitCode === SPAWN_FAILURE_EXIT_CODE) {
            ctx.warnings.push('Could not check Windows long path setting');
            return { name, ok: true, detail: 'setting could not be read' };
        }

        if (result.stdout.includes('LongPathsEnabled') && result.stdout.includes(': 1')) {
            return { name, ok: true, detail: 'Windows long paths enabled' };
        }

        ctx.warnings.push('Windows long paths not enabled (may cause MAX_PATH errors)');
        if (this.options.fix) {
            const fixed = await this.enableWindowsLongPaths();
            return { name, ok: false, detail: fixed ? 'Long paths enabled (reboot required)' : 'Failed to enable long paths (requires admin privileges)' };
        }
        return { name, ok: false, detail: 'Windows long paths not enabled' };
    }

    private async enableWindowsLongPaths(): Promise<boolean> {
        logger.info('  → Attempting to enable long paths...');
        const result = await this.runner.run({
            command: 'powershell',
            args: [
                '-Command',
                `New-ItemProperty -Path "${LONG_PATHS_KEY}" -Name "LongPathsEnabled" -Value 1 -PropertyType DWORD -Force`
            ],
            timeoutMs: 10000
        });
        return !result.timedOut && result.exitCode === 0;
    }
}

export function formatReport(report: ValidationReport): string {
    const lines: string[] = [`🔍 Validating C++ development environment (${report.platform})...`, ''];
    for (const check of report.checks) {
        lines.push(`${check.ok ? '✓' : '✗'} ${check.name}: ${check.detail}`);
    }
    lines.push('', '='.repeat(50));

    if (report.issues.length > 0) {
        lines.push('', '❌ Critical Issues:', ...report.issues.map(i => `  • ${i}`));
    }
    if (report.warnings.length > 0) {
        lines.push('', '⚠ Warnings:', ...report.warnings.map(w => `  • ${w}`));
    }

    if (report.passed) {
        lines.push('', '✅ Environment ready for C++ development');
        return lines.join('\n');
    }

    lines.push('', '❌ Environment validation failed', '', 'Recommended actions:');
    if (report.issues.some(i => i.includes('CMake'))) {
        lines.push('  1. Install CMake 3.15+: https://cmake.org/download/');
    }
    if (report.warnings.some(w => w.includes('compiler'))) {
        lines.push('  2. Install C++ compiler (MSVC/GCC/Clang)');
    }
    if (report.warnings.some(w => w.includes('long path'))) {
        lines.push('  3. Enable long paths: Run as admin and reboot');
    }
    return lines.join('\n');
}
