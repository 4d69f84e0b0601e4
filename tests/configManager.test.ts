import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import yaml from 'yaml';
import { CONFIG_FILE_NAME, ConfigManager } from '../src/config/ConfigManager';
import { makeTempDir } from './fakes';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

describe('ConfigManager', () => {
    let home: string;
    let project: string;

    beforeEach(() => {
        home = makeTempDir('home');
        project = makeTempDir('project');
        vi.stubEnv('BUILDFIX_DATA_DIR', home);
        vi.stubEnv('BUILDFIX_CONFIG_PATH', '');
        vi.stubEnv('BUILDFIX_PATTERNS_PATH', '');
        vi.stubEnv('BUILDFIX_REMEDIATION_TIMEOUT_MS', '');
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        fs.rmSync(home, { recursive: true, force: true });
        fs.rmSync(project, { recursive: true, force: true });
    });

    it('uses defaults when no config file exists', () => {
        const config = new ConfigManager(undefined, project);

        expect(config.get('remediationTimeoutMs')).toBe(30000);
        expect(config.get('buildDir')).toBe('build');
        expect(config.get('minCmakeVersion')).toBe('3.15');
        expect(config.get('patternsPath')).toBeUndefined();
        expect(config.getConfigPath()).toBe(path.join(home, CONFIG_FILE_NAME));
    });

    it('does not create the data directory just by loading', () => {
        const dataDir = path.join(home, 'nested');
        vi.stubEnv('BUILDFIX_DATA_DIR', dataDir);

        new ConfigManager(undefined, project);

        expect(fs.existsSync(dataDir)).toBe(false);
    });

    it('lets the project config override the global one', () => {
        fs.writeFileSync(path.join(home, CONFIG_FILE_NAME), 'buildDir: out\nminFreeDiskGB: 5\n');
        fs.writeFileSync(path.join(project, CONFIG_FILE_NAME), 'buildDir: cmake-build\n');

        const config = new ConfigManager(undefined, project);

        expect(config.get('buildDir')).toBe('cmake-build');
        expect(config.get('minFreeDiskGB')).toBe(5);
        expect(config.getConfigPath()).toBe(path.join(project, CONFIG_FILE_NAME));
    });

    it('lets an explicit config file override everything else', () => {
        fs.writeFileSync(path.join(project, CONFIG_FILE_NAME), 'cmakePath: /usr/bin/cmake\n');
        const custom = path.join(project, 'ci.yaml');
        fs.writeFileSync(custom, 'cmakePath: /opt/cmake/bin/cmake\nconfigureArgs: ["-G", "Ninja"]\n');

        const config = new ConfigManager(custom, project);

        expect(config.get('cmakePath')).toBe('/opt/cmake/bin/cmake');
        expect(config.get('configureArgs')).toEqual(['-G', 'Ninja']);
        expect(config.getConfigPath()).toBe(custom);
    });

    it('reads environment variables below file values', () => {
        vi.stubEnv('BUILDFIX_PATTERNS_PATH', '/etc/buildfix/patterns.json');
        vi.stubEnv('BUILDFIX_REMEDIATION_TIMEOUT_MS', '45000');
        fs.writeFileSync(path.join(project, CONFIG_FILE_NAME), 'remediationTimeoutMs: 60000\n');

        const config = new ConfigManager(undefined, project);

        expect(config.get('patternsPath')).toBe('/etc/buildfix/patterns.json');
        expect(config.get('remediationTimeoutMs')).toBe(60000);
    });

    it('ignores a config file that fails validation', () => {
        fs.writeFileSync(path.join(project, CONFIG_FILE_NAME), 'remediationTimeoutMs: -5\nbuildDir: out\n');

        const config = new ConfigManager(undefined, project);

        expect(config.get('remediationTimeoutMs')).toBe(30000);
        expect(config.get('buildDir')).toBe('build');
    });

    it('ignores a config file that is not YAML', () => {
        fs.writeFileSync(path.join(project, CONFIG_FILE_NAME), 'buildDir: [unclosed\n');

        expect(new ConfigManager(undefined, project).get('buildDir')).toBe('build');
    });

    it('persists changes to the active config file', () => {
        const config = new ConfigManager(undefined, project);

        config.set('minFreeDiskGB', 20);

        const saved: unknown = yaml.parse(fs.readFileSync(path.join(home, CONFIG_FILE_NAME), 'utf8'));
        expect(saved).toMatchObject({ minFreeDiskGB: 20, buildDir: 'build' });
        expect(new ConfigManager(undefined, project).get('minFreeDiskGB')).toBe(20);
    });

    it('hands out copies of the merged config', () => {
        const config = new ConfigManager(undefined, project);
        const all = config.getAll();

        all.buildDir = 'elsewhere';

        expect(config.get('buildDir')).toBe('build');
    });
});
