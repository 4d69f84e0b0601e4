#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import path from 'path';
import os from 'os';
import { logger } from '../utils/logger';
import { ConfigManager } from '../config/ConfigManager';
import { Environment } from '../core/utils/Environment';
import { ShellCommandRunner } from '../utils/CommandRunner';
import {
    CliContext,
    buildCommand,
    detectToolsCommand,
    matchCommand,
    patternsCommand,
    validateEnvCommand,
    validateProjectCommand
} from './commands';

dotenv.config(); // Local .env
dotenv.config({ path: path.join(os.homedir(), '.buildfix', '.env') }); // Global .env

process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Promise rejection: ${reason}`);
    process.exitCode = 1;
});

function createContext(configPath?: string): CliContext {
    const platform = Environment.resolvePlatform();
    logger.debug(`buildfix running on ${Environment.describe(platform)}`);
    return {
        config: new ConfigManager(configPath).getAll(),
        runner: new ShellCommandRunner(platform),
        platform,
        print: (text) => console.log(text)
    };
}

const program = new Command();

program
    .name('buildfix')
    .description('Build CMake projects with automatic error recovery')
    .version('1.0.0')
    .option('-c, --config <file>', 'Path to a buildfix.config.yaml');

program
    .command('build')
    .description('Configure and build a project, retrying after known failures are fixed')
    .argument('<dir>', 'Project directory')
    .option('--skip-validate', 'Skip the environment pre-flight checks', false)
    .option('-p, --patterns <file>', 'Error pattern database (JSON)')
    .action(async (dir: string, options: { skipValidate: boolean; patterns?: string }) => {
        const ctx = createContext(program.opts<{ config?: string }>().config);
        process.exitCode = await buildCommand(ctx, dir, options);
    });

program
    .command('validate-env')
    .description('Check CMake, compiler, vcpkg and disk space before building')
    .option('--fix', 'Attempt to fix issues (may require admin)', false)
    .action(async (options: { fix: boolean }) => {
        const ctx = createContext(program.opts<{ config?: string }>().config);
        process.exitCode = await validateEnvCommand(ctx, options.fix);
    });

program
    .command('validate-project')
    .description('Configure, build and test a project, then check formatting and git setup')
    .argument('[dir]', 'Project directory', '.')
    .option('--strict', 'Fail on test failures, compiler warnings and format violations', false)
    .option('--json <file>', 'Export the results as JSON')
    .action(async (dir: string, options: { strict: boolean; json?: string }) => {
        const ctx = createContext(program.opts<{ config?: string }>().config);
        process.exitCode = await validateProjectCommand(ctx, dir, options);
    });

program
    .command('detect-tools')
    .description('Detect compilers, build tools, package managers and code quality tools')
    .option('--json', 'Output as JSON', false)
    .option('--check <category>', 'Only check one category (compilers, build-tools, package-managers, quality-tools)')
    .action(async (options: { json: boolean; check?: string }) => {
        const ctx = createContext(program.opts<{ config?: string }>().config);
        process.exitCode = await detectToolsCommand(ctx, options);
    });

program
    .command('patterns')
    .description('List the error patterns that apply to a platform')
    .option('--platform <name>', 'Windows, Linux or Darwin (defaults to this host)')
    .option('-p, --patterns <file>', 'Error pattern database (JSON)')
    .action((options: { platform?: string; patterns?: string }) => {
        const ctx = createContext(program.opts<{ config?: string }>().config);
        process.exitCode = patternsCommand(ctx, options);
    });

program
    .command('match')
    .description('Show which error pattern a saved build log matches')
    .argument('<logfile>', 'File containing captured build output')
    .option('--platform <name>', 'Windows, Linux or Darwin (defaults to this host)')
    .option('-p, --patterns <file>', 'Error pattern database (JSON)')
    .action((logfile: string, options: { platform?: string; patterns?: string }) => {
        const ctx = createContext(program.opts<{ config?: string }>().config);
        process.exitCode = matchCommand(ctx, logfile, options);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    logger.error(`buildfix: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
});
