import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { CommandResult, CommandRunner } from '../utils/CommandRunner';
import { meetsMinimum, parseVersion } from './EnvironmentValidator';

export interface ProjectCheck {
    name: string;
    passed: boolean;
    error?: string;
}

export interface ProjectValidationReport {
    projectDir: string;
    strict: boolean;
    passed: boolean;
    checks: ProjectCheck[];
    /** Set when a blocking check failed and the remaining checks were skipped. */
    abortedBecause?: string;
}

export interface ProjectValidatorOptions {
    /** Treat test failures, compiler warnings and format violations as failures. */
    strict?: boolean;
    cmakePath?: string;
    minCmakeVersion?: string;
    toolTimeoutMs?: number;
    /** Applies to configure, build, ctest and clang-format. 0 means no limit. */
    timeoutMs?: number;
}

export const VALIDATE_BUILD_DIR = path.join('build', 'validate');
const ERROR_EXCERPT_LENGTH = 200;

function excerpt(text: string): string {
    return text.slice(0, ERROR_EXCERPT_LENGTH);
}

function listFiles(dir: string, accept: (name: string) => boolean): string[] {
    if (!fs.existsSync(dir)) return [];
    const found: string[] = [];
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            found.push(...listFiles(full, accept));
        } else if (accept(entry.name)) {
            found.push(full);
        }
    }
    return found.sort();
}

/**
 * Post-setup checks for a CMake project: structure, CMake, configure, compiler,
 * build, then the optional tests, warnings, formatting and git checks.
 */
export class ProjectValidator {
    private readonly projectDir: string;
    private readonly buildDir: string;
    private readonly strict: boolean;
    private readonly cmakePath: string;
    private readonly minCmakeVersion: string;
    private readonly toolTimeoutMs: number;
    private readonly timeoutMs: number;
    private checks: ProjectCheck[] = [];

    constructor(private readonly runner: CommandRunner, projectDir: string, options: ProjectValidatorOptions = {}) {
        this.projectDir = path.resolve(projectDir);
        this.buildDir = path.join(this.projectDir, VALIDATE_BUILD_DIR);
        this.strict = options.strict ?? false;
        this.cmakePath = options.cmakePath || 'cmake';
        this.minCmakeVersion = options.minCmakeVersion || '3.15';
        this.toolTimeoutMs = options.toolTimeoutMs ?? 5000;
        this.timeoutMs = options.timeoutMs ?? 0;
    }

    public async validate(): Promise<ProjectValidationReport> {
        this.checks = [];

        const blocking: Array<[() => boolean | Promise<boolean>, string]> = [
            [() => this.checkDirectoryStructure(), 'Project structure invalid. Cannot continue.'],
            [() => this.checkCmakeVersion(), 'CMake not available. Cannot continue.'],
            [() => this.checkCmakeConfiguration(), 'CMake configuration failed. Cannot continue.']
        ];
        for (const [check, reason] of blocking) {
            if (!(await check())) {
                return this.report(reason);
            }
        }

        if (!this.checkCompilerSetup()) {
            logger.warn('ProjectValidator: Compiler setup check failed (continuing)');
        }

        if (!(await this.checkBuild())) {
            return this.report('Build failed. Cannot continue.');
        }

        await this.checkTests();
        await this.checkCompilerWarnings();
        await this.checkCodeFormat();
        await this.checkGitSetup();

        return this.report();
    }

    private report(abortedBecause?: string): ProjectValidationReport {
        return {
            projectDir: this.projectDir,
            strict: this.strict,
            passed: abortedBecause === undefined && this.checks.every(c => c.passed),
            checks: [...this.checks],
            abortedBecause
        };
    }

    private record(name: string, passed: boolean, error?: string): boolean {
        this.checks.push(error === undefined ? { name, passed } : { name, passed, error });
        return passed;
    }

    /** Non-strict runs downgrade a failed optional check to a warning. */
    private soft(name: string, message: string): boolean {
        if (this.strict) {
            return this.record(name, false, message);
        }
        logger.warn(`  ⚠ ${message}`);
        return this.record(name, true, `Warnings: ${message}`);
    }

    private exists(...parts: string[]): boolean {
        return fs.existsSync(path.join(this.projectDir, ...parts));
    }

    private run(command: string, args: string[], timeoutMs: number = this.timeoutMs): Promise<CommandResult> {
        return this.runner.run({ command, args, cwd: this.projectDir, timeoutMs });
    }

    private checkDirectoryStructure(): boolean {
        logger.info('Checking directory structure...');
        if (!this.exists('CMakeLists.txt')) {
            return this.record('Directory: CMakeLists.txt', false, 'CMakeLists.txt not found');
        }
        if (!this.exists('src')) {
            logger.warn('  ⚠ src/ directory not found (optional for header-only libraries)');
        }
        return this.record('Directory: CMakeLists.txt', true);
    }

    private async checkCmakeVersion(): Promise<boolean> {
        logger.info('Checking CMake version...');
        const result = await this.run(this.cmakePath, ['--version'], this.toolTimeoutMs);
        if (result.timedOut || result.exitCode !== 0) {
            return this.record('CMake: Installation', false, 'CMake not found in PATH');
        }

        const match = /cmake version (\d+\.\d+\.\d+)/i.exec(result.stdout);
        if (!match) {
            return this.record('CMake: Version', false, 'Failed to parse version');
        }
        if (!meetsMinimum(parseVersion(match[1]), parseVersion(this.minCmakeVersion))) {
            return this.record('CMake: Version', false, `CMake ${this.minCmakeVersion}+ required, found ${match[1]}`);
        }
        logger.info(`CMake ${match[1]} ✓`);
        return this.record('CMake: Version', true);
    }

    private async checkCmakeConfiguration(): Promise<boolean> {
        logger.info('Running CMake configuration...');
        fs.mkdirSync(this.buildDir, { recursive: true });

        const result = await this.run(this.cmakePath, ['-B', this.buildDir, '-DCMAKE_BUILD_TYPE=Debug']);
        if (result.exitCode !== 0) {
            return this.record('CMake: Configuration', false, `CMake configuration failed: ${excerpt(result.stderr)}`);
        }
        return this.record('CMake: Configuration', true);
    }

    private checkCompilerSetup(): boolean {
        logger.info('Checking compiler setup...');
        const cache = path.join(this.buildDir, 'CMakeCache.txt');
        if (!fs.existsSync(cache)) {
            return this.record('Compiler: Setup', false, 'CMake not configured');
        }
        try {
            if (!fs.readFileSync(cache, 'utf8').includes('CMAKE_CXX_COMPILER')) {
                return this.record('Compiler: Setup', false, 'C++ compiler not configured in CMake');
            }
        } catch (e) {
            return this.record('Compiler: Setup', false, e instanceof Error ? e.message : String(e));
        }
        return this.record('Compiler: Setup', true);
    }

    private async checkBuild(): Promise<boolean> {
        logger.info('Building project...');
        if (!fs.existsSync(this.buildDir)) {
            return this.record('Build', false, 'Build directory not configured');
        }
        const result = await this.run(this.cmakePath, ['--build', this.buildDir, '--config', 'Debug']);
        if (result.exitCode !== 0) {
            return this.record('Build', false, `Build failed: ${excerpt(result.stderr)}`);
        }
        return this.record('Build', true);
    }

    private async checkTests(): Promise<boolean> {
        if (!this.exists('tests')) {
            return this.record('Tests', true, 'No tests configured (optional)');
        }
        logger.info('Running tests...');
        const result = await this.run('ctest', ['--test-dir', this.buildDir, '--output-on-failure']);
        if (result.exitCode !== 0) {
            return this.soft('Tests', `Some tests failed: ${excerpt(result.stderr)}`);
        }
        return this.record('Tests', true);
    }

    private async checkCompilerWarnings(): Promise<boolean> {
        logger.info('Checking for compiler warnings...');
        if (!fs.existsSync(path.join(this.buildDir, 'CMakeCache.txt'))) {
            return this.record('Compiler Warnings', true, 'Build not configured');
        }
        const result = await this.run(this.cmakePath, ['--build', this.buildDir, '--config', 'Debug']);
        const warnings = (result.stdout + result.stderr).split('warning:').length - 1;
        if (warnings > 0) {
            return this.soft('Compiler Warnings', `Found ${warnings} compiler warnings`);
        }
        return this.record('Compiler Warnings', true);
    }

    private async checkCodeFormat(): Promise<boolean> {
        if (!this.exists('.clang-format')) {
            return this.record('Code Format', true, 'No .clang-format (optional)');
        }
        logger.info('Checking code format with clang-format...');
        const files = [
            ...listFiles(path.join(this.projectDir, 'src'), name => name.endsWith('.cpp')),
            ...listFiles(path.join(this.projectDir, 'include'), name => /\.h\w*$/.test(name))
        ];
        if (files.length === 0) {
            return this.record('Code Format', true, 'No source files to check');
        }
        const result = await this.run('clang-format', ['--dry-run', '--Werror', ...files]);
        if (result.exitCode !== 0) {
            return this.soft('Code Format', `Code format check failed: ${excerpt(result.stderr)}`);
        }
        return this.record('Code Format', true);
    }

    private async checkGitSetup(): Promise<boolean> {
        if (!this.exists('.git')) {
            logger.warn('  ⚠ Git repository not initialized');
            return this.record('Git: Repository', true, 'Git not initialized (optional)');
        }
        const result = await this.run('git', ['status'], this.toolTimeoutMs);
        if (result.exitCode !== 0) {
            return this.record('Git: Repository', false, `Git status check failed: ${excerpt(result.stderr)}`);
        }
        this.record('Git: Repository', true);

        if (!this.exists('.gitignore')) {
            return this.record('Git: .gitignore', true, 'No .gitignore (recommended)');
        }
        return this.record('Git: .gitignore', true);
    }
}

export function formatProjectReport(report: ProjectValidationReport): string {
    const rule = '='.repeat(60);
    const lines: string[] = [];
    if (report.abortedBecause) {
        lines.push(`❌ ${report.abortedBecause}`, '');
    }
    lines.push(rule, 'VALIDATION REPORT', rule, '');
    for (const check of report.checks) {
        lines.push(`  [${check.passed ? '✓' : '✗'}] ${check.name}${check.error ? ` (${check.error})` : ''}`);
    }

    const passed = report.checks.filter(c => c.passed).length;
    const total = report.checks.length;
    lines.push('', rule, `SUMMARY: ${passed}/${total} checks passed`);
    lines.push(passed === total ? '✅ ALL VALIDATIONS PASSED!' : `❌ ${total - passed} checks failed`);
    lines.push(rule);
    return lines.join('\n');
}

export function projectReportJson(report: ProjectValidationReport): string {
    return JSON.stringify({
        project_dir: report.projectDir,
        strict_mode: report.strict,
        total_checks: report.checks.length,
        passed_checks: report.checks.filter(c => c.passed).length,
        checks: report.checks.map(c => ({ name: c.name, passed: c.passed, error: c.error ?? null }))
    }, null, 2);
}
