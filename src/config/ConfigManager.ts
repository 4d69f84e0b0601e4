import fs from 'fs';
import yaml from 'yaml';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { logger } from '../utils/logger';

export const CONFIG_FILE_NAME = 'buildfix.config.yaml';

const ConfigFileSchema = z.object({
    patternsPath: z.string().min(1),
    remediationTimeoutMs: z.number().int().positive(),
    toolTimeoutMs: z.number().int().positive(),
    compilerCheckTimeoutMs: z.number().int().positive(),
    buildTimeoutMs: z.number().int().nonnegative(),
    buildDir: z.string().min(1),
    configureArgs: z.array(z.string()),
    buildArgs: z.array(z.string()),
    cmakePath: z.string().min(1),
    minCmakeVersion: z.string().regex(/^\d+\.\d+(\.\d+)?$/),
    minFreeDiskGB: z.number().nonnegative()
}).partial();

export type BuildFixConfig = z.infer<typeof ConfigFileSchema> & {
    remediationTimeoutMs: number;
    toolTimeoutMs: number;
    compilerCheckTimeoutMs: number;
    buildTimeoutMs: number;
    buildDir: string;
    configureArgs: string[];
    buildArgs: string[];
    cmakePath: string;
    minCmakeVersion: string;
    minFreeDiskGB: number;
};

type PartialConfig = z.infer<typeof ConfigFileSchema>;

export class ConfigManager {
    private configPath: string;
    private config: BuildFixConfig;
    private readonly dataHome: string;
    private readonly cwd: string;

    constructor(customPath?: string, cwd: string = process.cwd()) {
        this.cwd = cwd;
        this.dataHome = process.env.BUILDFIX_DATA_DIR || path.join(os.homedir(), '.buildfix');

        const explicitPath = customPath || process.env.BUILDFIX_CONFIG_PATH;
        const globalConfigPath = path.join(this.dataHome, CONFIG_FILE_NAME);
        const localConfigPath = path.resolve(this.cwd, CONFIG_FILE_NAME);

        // custom > env > local > global
        this.configPath = explicitPath || (fs.existsSync(localConfigPath) ? localConfigPath : globalConfigPath);
        this.config = this.loadConfig(explicitPath);
    }

    private readLayer(filePath: string, label: string): PartialConfig {
        if (!fs.existsSync(filePath)) return {};
        try {
            const parsed: unknown = yaml.parse(fs.readFileSync(filePath, 'utf8')) ?? {};
            const result = ConfigFileSchema.safeParse(parsed);
            if (!result.success) {
                const reason = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
                logger.warn(`ConfigManager: Ignoring invalid ${label} config ${filePath}: ${reason}`);
                return {};
            }
            return result.data;
        } catch (e) {
            logger.warn(`Error loading ${label} config from ${filePath}: ${e}`);
            return {};
        }
    }

    private loadConfig(explicitPath?: string): BuildFixConfig {
        const defaults = this.getDefaultConfig();

        const globalConfig = this.readLayer(path.join(this.dataHome, CONFIG_FILE_NAME), 'global');
        const localConfig = this.readLayer(path.resolve(this.cwd, CONFIG_FILE_NAME), 'local');
        const customConfig = explicitPath ? this.readLayer(explicitPath, 'custom') : {};

        const envConfig = this.readEnv();

        logger.debug(`ConfigManager: Config path set to ${this.configPath}`);

        return {
            ...defaults,
            ...envConfig,
            ...globalConfig,
            ...localConfig,
            ...customConfig
        };
    }

    private readEnv(): PartialConfig {
        const env: PartialConfig = {};
        if (process.env.BUILDFIX_PATTERNS_PATH) {
            env.patternsPath = process.env.BUILDFIX_PATTERNS_PATH;
        }
        const timeout = Number(process.env.BUILDFIX_REMEDIATION_TIMEOUT_MS);
        if (Number.isInteger(timeout) && timeout > 0) {
            env.remediationTimeoutMs = timeout;
        }
        return env;
    }

    private getDefaultConfig(): BuildFixConfig {
        return {
            patternsPath: undefined,
            remediationTimeoutMs: 30000,
            toolTimeoutMs: 5000,
            compilerCheckTimeoutMs: 2000,
            buildTimeoutMs: 0,
            buildDir: 'build',
            configureArgs: [],
            buildArgs: [],
            cmakePath: 'cmake',
            minCmakeVersion: '3.15',
            minFreeDiskGB: 10
        };
    }

    public get<K extends keyof BuildFixConfig>(key: K): BuildFixConfig[K] {
        return this.config[key];
    }

    public set<K extends keyof BuildFixConfig>(key: K, value: BuildFixConfig[K]) {
        this.config[key] = value;
        this.saveConfig();
    }

    public saveConfig() {
        try {
            fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
            fs.writeFileSync(this.configPath, yaml.stringify(this.config));
            logger.info(`Configuration saved to ${this.configPath}`);
        } catch (error) {
            logger.error(`Error saving config: ${error}`);
        }
    }

    public getConfigPath(): string {
        return this.configPath;
    }

    public getAll(): BuildFixConfig {
        return { ...this.config };
    }
}
