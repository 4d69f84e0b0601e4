import fs from 'fs';
import path from 'path';
import { BuildFixConfig } from '../config/ConfigManager';
import { BuildRecoveryController } from '../core/BuildRecoveryController';
import { BuildTool, CMakeBuildTool } from '../core/BuildTool';
import { EnvironmentValidator, formatReport } from '../core/EnvironmentValidator';
import { PatternDatabase } from '../core/PatternDatabase';
import { ProjectValidator, formatProjectReport, projectReportJson } from '../core/ProjectValidator';
import { selectCommand } from '../core/RemediationExecutor';
import { CATEGORY_ALIASES, ToolDetector, ToolReport, formatToolReport, missingCritical } from '../core/ToolDetector';
import { Environment, Platform } from '../core/utils/Environment';
import { CommandRunner } from '../utils/CommandRunner';
import { logger } from '../utils/logger';

export interface CliContext {
    config: BuildFixConfig;
    runner: CommandRunner;
    platform: Platform;
    print: (text: string) => void;
    /** Overrides the CMake tool built from config. */
    buildTool?: BuildTool;
    cwd?: string;
}

export interface BuildCommandOptions {
    skipValidate?: boolean;
    patterns?: string;
}

export function loadPatterns(ctx: CliContext, override?: string): PatternDatabase {
    return PatternDatabase.fromFile(PatternDatabase.resolvePath(override || ctx.config.patternsPath, ctx.cwd));
}

function createValidator(ctx: CliContext, fix: boolean): EnvironmentValidator {
    return new EnvironmentValidator(ctx.runner, {
        platform: ctx.platform,
        fix,
        cmakePath: ctx.config.cmakePath,
        minCmakeVersion: ctx.config.minCmakeVersion,
        minFreeDiskGB: ctx.config.minFreeDiskGB,
        toolTimeoutMs: ctx.config.toolTimeoutMs,
        compilerCheckTimeoutMs: ctx.config.compilerCheckTimeoutMs,
        cwd: ctx.cwd
    });
}

export async function validateEnvCommand(ctx: CliContext, fix: boolean = false): Promise<number> {
    const report = await createValidator(ctx, fix).validate();
    ctx.print(formatReport(report));
    return report.passed ? 0 : 1;
}

export interface ValidateProjectOptions {
    strict?: boolean;
    /** Write the report as JSON to this file. */
    json?: string;
}

export async function validateProjectCommand(ctx: CliContext, projectDir: string = '.', options: ValidateProjectOptions = {}): Promise<number> {
    const validator = new ProjectValidator(ctx.runner, path.resolve(ctx.cwd ?? process.cwd(), projectDir), {
        strict: options.strict,
        cmakePath: ctx.config.cmakePath,
        minCmakeVersion: ctx.config.minCmakeVersion,
        toolTimeoutMs: ctx.config.toolTimeoutMs,
        timeoutMs: ctx.config.buildTimeoutMs
    });
    const report = await validator.validate();
    ctx.print(formatProjectReport(report));

    if (options.json) {
        fs.writeFileSync(options.json, projectReportJson(report));
        ctx.print(`Validation report exported to ${options.json}`);
    }
    return report.passed ? 0 : 1;
}

export async function buildCommand(ctx: CliContext, projectDir: string, options: BuildCommandOptions = {}): Promise<number> {
    if (!options.skipValidate) {
        const report = await createValidator(ctx, false).validate();
        for (const warning of report.warnings) {
            logger.warn(`  ⚠ ${warning}`);
        }
        if (!report.passed) {
            ctx.print(formatReport(report));
            logger.error('❌ Environment validation failed');
            return 1;
        }
        logger.info('✓ Environment validation passed');
    }

    const buildTool = ctx.buildTool ?? new CMakeBuildTool(ctx.runner, {
        cmakePath: ctx.config.cmakePath,
        buildDir: ctx.config.buildDir,
        configureArgs: ctx.config.configureArgs,
        buildArgs: ctx.config.buildArgs,
        timeoutMs: ctx.config.buildTimeoutMs
    });

    const controller = new BuildRecoveryController({
        patterns: loadPatterns(ctx, options.patterns),
        buildTool,
        runner: ctx.runner,
        platform: ctx.platform,
        remediationTimeoutMs: ctx.config.remediationTimeoutMs
    });

    logger.info('🔨 Building project...');
    const outcome = await controller.run(projectDir);
    ctx.print(outcome.success ? `✅ ${outcome.message}` : `❌ ${outcome.message}`);
    return outcome.success ? 0 : 1;
}

export async function detectToolsCommand(ctx: CliContext, options: { json?: boolean; check?: string } = {}): Promise<number> {
    const detector = new ToolDetector(ctx.runner, { platform: ctx.platform, toolTimeoutMs: ctx.config.toolTimeoutMs });

    let report: Partial<ToolReport>;
    if (options.check) {
        if (!Object.hasOwn(CATEGORY_ALIASES, options.check)) {
            ctx.print(`Unknown category "${options.check}". Use one of: ${Object.keys(CATEGORY_ALIASES).join(', ')}`);
            return 1;
        }
        const category = CATEGORY_ALIASES[options.check];
        report = {};
        report[category] = await detector.detectCategory(category);
    } else {
        report = await detector.detect();
    }

    ctx.print(options.json ? JSON.stringify(report, null, 2) : formatToolReport(report, ctx.platform));

    const missing = missingCritical(report);
    if (missing.includes('compilers')) {
        ctx.print('\n⚠️  Warning: No C++ compiler detected!\nPlease install GCC, Clang, or MSVC to compile C++ projects.');
        return 1;
    }
    if (missing.includes('buildTools')) {
        ctx.print('\n⚠️  Warning: No build tools detected!\nPlease install CMake to build C++ projects.');
        return 1;
    }
    return 0;
}

export function patternsCommand(ctx: CliContext, options: { platform?: string; patterns?: string } = {}): number {
    const db = loadPatterns(ctx, options.patterns);
    const platform = options.platform ? Environment.parsePlatform(options.platform) : ctx.platform;
    const shown = db.all().filter(p => PatternDatabase.appliesTo(p, platform));

    ctx.print(`${shown.length} of ${db.size} pattern(s) apply to ${platform}:`);
    shown.forEach((pattern, index) => {
        ctx.print(`${index + 1}. ${pattern.id ?? pattern.regex}`);
        ctx.print(`   ${pattern.user_message}`);
        const steps = [
            ...pattern.auto_fix.map(a => ({ kind: 'fix', action: a })),
            ...pattern.fallback.map(a => ({ kind: 'fallback', action: a }))
        ];
        for (const { kind, action } of steps) {
            const command = selectCommand(action, platform);
            ctx.print(`   [${kind}] ${action.method}${command ? `: ${command}` : ' (informational)'}`);
        }
    });
    return 0;
}

export function matchCommand(ctx: CliContext, logFile: string, options: { platform?: string; patterns?: string } = {}): number {
    if (!fs.existsSync(logFile)) {
        ctx.print(`Log file not found: ${logFile}`);
        return 1;
    }
    const output = fs.readFileSync(logFile, 'utf8');
    const platform = options.platform ? Environment.parsePlatform(options.platform) : ctx.platform;
    const pattern = loadPatterns(ctx, options.patterns).match(output, platform);

    if (!pattern) {
        ctx.print(`No known error pattern matches ${logFile} on ${platform}`);
        return 1;
    }
    ctx.print(`Matched ${pattern.id ?? pattern.regex}: ${pattern.user_message}`);
    return 0;
}
