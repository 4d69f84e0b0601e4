import { logger } from '../utils/logger';
import { CommandRunner } from '../utils/CommandRunner';
import { Platform } from './utils/Environment';

export interface ToolInfo {
    version?: string;
    path?: string;
    root?: string;
}

export type ToolCategory = 'compilers' | 'buildTools' | 'packageManagers' | 'qualityTools';

export type ToolReport = Record<ToolCategory, Record<string, ToolInfo>>;

export const TOOL_CATEGORIES: Record<ToolCategory, string> = {
    compilers: 'Compilers',
    buildTools: 'Build Tools',
    packageManagers: 'Package Managers',
    qualityTools: 'Code Quality Tools'
};

export const CATEGORY_ORDER: ToolCategory[] = ['compilers', 'buildTools', 'packageManagers', 'qualityTools'];

/** CLI spellings accepted by `--check`. */
export const CATEGORY_ALIASES: Record<string, ToolCategory> = {
    'compilers': 'compilers',
    'build-tools': 'buildTools',
    'package-managers': 'packageManagers',
    'quality-tools': 'qualityTools'
};

export interface ToolDetectorOptions {
    platform: Platform;
    toolTimeoutMs?: number;
    env?: NodeJS.ProcessEnv;
}

interface ToolQueryResult {
    ok: boolean;
    output: string;
}

const UNKNOWN = 'Unknown';

export class ToolDetector {
    private readonly toolTimeoutMs: number;
    private readonly env: NodeJS.ProcessEnv;

    constructor(private readonly runner: CommandRunner, private readonly options: ToolDetectorOptions) {
        this.toolTimeoutMs = options.toolTimeoutMs ?? 5000;
        this.env = options.env ?? process.env;
    }

    public async detect(): Promise<ToolReport> {
        logger.info('🔍 Detecting C++ development tools...');
        return {
            compilers: await this.detectCompilers(),
            buildTools: await this.detectBuildTools(),
            packageManagers: await this.detectPackageManagers(),
            qualityTools: await this.detectQualityTools()
        };
    }

    public async detectCategory(category: ToolCategory): Promise<Record<string, ToolInfo>> {
        switch (category) {
            case 'compilers':
                return this.detectCompilers();
            case 'buildTools':
                return this.detectBuildTools();
            case 'packageManagers':
                return this.detectPackageManagers();
            case 'qualityTools':
                return this.detectQualityTools();
        }
    }

    private async query(commandLine: string): Promise<ToolQueryResult> {
        const result = await this.runner.run({ command: commandLine, timeoutMs: this.toolTimeoutMs });
        if (result.timedOut) {
            return { ok: false, output: '' };
        }
        return { ok: result.exitCode === 0, output: result.stdout.trim() + result.stderr.trim() };
    }

    private async findPath(tool: string): Promise<string> {
        const lookup = this.options.platform === Platform.WINDOWS ? `where ${tool}` : `which ${tool}`;
        const result = await this.runner.run({ command: lookup, timeoutMs: this.toolTimeoutMs });
        if (result.timedOut || result.exitCode !== 0) {
            return UNKNOWN;
        }
        return result.stdout.trim() || UNKNOWN;
    }

    private async versioned(commandLine: string, pattern: RegExp, tool: string): Promise<ToolInfo | undefined> {
        const { ok, output } = await this.query(commandLine);
        if (!ok) return undefined;
        const match = pattern.exec(output);
        if (!match) return undefined;
        return { version: match[1], path: await this.findPath(tool) };
    }

    private async detectCompilers(): Promise<Record<string, ToolInfo>> {
        const found: Record<string, ToolInfo> = {};

        const gcc = await this.versioned('g++ --version', /(\d+\.\d+\.\d+)/, 'g++');
        if (gcc) found['GCC'] = gcc;

        const clang = await this.query('clang++ --version');
        if (clang.ok) {
            const full = /version (\d+\.\d+\.\d+)/.exec(clang.output);
            if (full) {
                found['Clang'] = { version: full[1], path: await this.findPath('clang++') };
            }
            const apple = /version (\d+\.\d+)/.exec(clang.output);
            if (clang.output.includes('Apple') && apple) {
                found['Apple Clang'] = { version: apple[1], path: await this.findPath('clang++') };
            }
        }

        if (this.options.platform === Platform.WINDOWS) {
            // cl.exe exits non-zero without arguments but still prints its banner
            const msvc = await this.query('cl.exe');
            const match = /(\d+\.\d+\.\d+)/.exec(msvc.output);
            if ((msvc.ok || msvc.output.includes('Version')) && match) {
                found['MSVC'] = { version: match[1], path: 'cl.exe' };
            }
        }

        return found;
    }

    private async detectBuildTools(): Promise<Record<string, ToolInfo>> {
        const found: Record<string, ToolInfo> = {};

        const cmake = await this.versioned('cmake --version', /cmake version (\d+\.\d+\.\d+)/, 'cmake');
        if (cmake) found['CMake'] = cmake;

        const ninja = await this.query('ninja --version');
        if (ninja.ok) {
            found['Ninja'] = { version: ninja.output.trim(), path: await this.findPath('ninja') };
        }

        const make = await this.query('make --version');
        if (make.ok) {
            const match = /Make (\d+\.\d+)/.exec(make.output);
            found['Make'] = { version: match ? match[1] : UNKNOWN, path: await this.findPath('make') };
        }

        return found;
    }

    private async detectPackageManagers(): Promise<Record<string, ToolInfo>> {
        const found: Record<string, ToolInfo> = {};

        const conan = await this.versioned('conan --version', /Conan version (\d+\.\d+\.\d+)/, 'conan');
        if (conan) found['Conan'] = conan;

        const vcpkgRoot = this.env.VCPKG_ROOT;
        if (vcpkgRoot) {
            found['vcpkg'] = { root: vcpkgRoot, path: vcpkgRoot };
        }

        return found;
    }

    private async detectQualityTools(): Promise<Record<string, ToolInfo>> {
        const found: Record<string, ToolInfo> = {};

        const format = await this.versioned('clang-format --version', /version (\d+\.\d+\.\d+)/, 'clang-format');
        if (format) found['clang-format'] = format;

        const tidy = await this.versioned('clang-tidy --version', /version (\d+\.\d+\.\d+)/, 'clang-tidy');
        if (tidy) found['clang-tidy'] = tidy;

        return found;
    }
}

/**
 * Categories a build cannot do without that came back empty.
 */
export function missingCritical(report: Partial<ToolReport>): ToolCategory[] {
    const critical: ToolCategory[] = ['compilers', 'buildTools'];
    return critical.filter(c => {
        const tools = report[c];
        return tools !== undefined && Object.keys(tools).length === 0;
    });
}

export function formatToolReport(report: Partial<ToolReport>, platform: Platform): string {
    const lines: string[] = ['='.repeat(60), 'C++ Development Tools Report', '='.repeat(60), '', `Platform: ${platform}`];

    for (const category of CATEGORY_ORDER) {
        const tools = report[category];
        if (!tools) continue;

        lines.push('', `${TOOL_CATEGORIES[category]}:`, '-'.repeat(60));
        const names = Object.keys(tools);
        if (names.length === 0) {
            lines.push(`  ✗ No ${TOOL_CATEGORIES[category].toLowerCase()} detected`);
            continue;
        }
        for (const name of names) {
            const info = tools[name];
            if (info.version) {
                lines.push(`  ${name.padEnd(20)} ✓ Available      v${info.version}`);
                lines.push(`  ${'Path:'.padEnd(20)} ${info.path ?? 'N/A'}`);
            } else if (info.root) {
                lines.push(`  ${name.padEnd(20)} ✓ Available (VCPKG_ROOT set)`);
                lines.push(`  ${'Root:'.padEnd(20)} ${info.root}`);
            } else {
                lines.push(`  ${name.padEnd(20)} ✓ Available`);
            }
        }
    }

    lines.push('', '='.repeat(60));
    return lines.join('\n');
}
