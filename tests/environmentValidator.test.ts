import { describe, expect, it, vi } from 'vitest';
import {
    EnvironmentValidator,
    EnvironmentValidatorOptions,
    formatReport,
    meetsMinimum,
    parseVersion
} from '../src/core/EnvironmentValidator';
import { Platform } from '../src/core/utils/Environment';
import { FakeRunner, RunnerHandler } from './fakes';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

const GB = 2 ** 30;

const cmakeVersion = (version: string) => ({ stdout: `cmake version ${version}\n\nCMake suite maintained and supported by Kitware.` });

function validatorFor(handler: RunnerHandler, options: Partial<EnvironmentValidatorOptions> = {}) {
    const runner = new FakeRunner(handler);
    const validator = new EnvironmentValidator(runner, {
        platform: Platform.LINUX,
        env: {},
        cwd: '/work',
        diskSpace: async () => ({ freeBytes: 50 * GB, totalBytes: 100 * GB }),
        pathExists: () => true,
        ...options
    });
    return { runner, validator };
}

const healthyLinux: RunnerHandler = req => {
    if (req.command === 'cmake') return cmakeVersion('3.28.1');
    if (req.command === 'g++') return { stdout: 'g++ (GCC) 13.2.0' };
    return undefined;
};

describe('version helpers', () => {
    it('parses dotted versions', () => {
        expect(parseVersion('3.28.1')).toEqual([3, 28, 1]);
        expect(parseVersion('3.15')).toEqual([3, 15]);
    });

    it('compares major and minor only', () => {
        expect(meetsMinimum([3, 15, 0], [3, 15])).toBe(true);
        expect(meetsMinimum([3, 14, 9], [3, 15])).toBe(false);
        expect(meetsMinimum([4, 0], [3, 15])).toBe(true);
        expect(meetsMinimum([2, 99], [3, 15])).toBe(false);
    });
});

describe('EnvironmentValidator', () => {
    it('passes a healthy Linux environment', async () => {
        const { validator, runner } = validatorFor(healthyLinux);

        const report = await validator.validate();

        expect(report.passed).toBe(true);
        expect(report.issues).toEqual([]);
        expect(report.warnings).toEqual([]);
        expect(report.checks.map(c => c.name)).toEqual(['CMake', 'C++ Compiler', 'vcpkg Configuration', 'Disk Space']);
        expect(report.checks[1].detail).toBe('Detected C++ compiler: g++');
        expect(runner.commands()).toEqual(['cmake --version', 'g++ --version']);
    });

    it('fails when CMake is missing', async () => {
        const { validator } = validatorFor(req => (req.command === 'g++' ? {} : undefined));

        const report = await validator.validate();

        expect(report.passed).toBe(false);
        expect(report.issues).toEqual(['CMake not found in PATH']);
        expect(report.checks[0]).toEqual({ name: 'CMake', ok: false, detail: 'CMake not found' });
    });

    it('fails when CMake is older than the minimum', async () => {
        const { validator } = validatorFor(req => (req.command === 'cmake' ? cmakeVersion('3.10.2') : {}));

        const report = await validator.validate();

        expect(report.passed).toBe(false);
        expect(report.issues).toEqual(['CMake 3.10.2 found, but 3.15+ required']);
    });

    it('honours a configured minimum version and cmake path', async () => {
        const { validator, runner } = validatorFor(
            req => (req.command === '/opt/cmake/bin/cmake' ? cmakeVersion('3.20.0') : {}),
            { cmakePath: '/opt/cmake/bin/cmake', minCmakeVersion: '3.21' }
        );

        const report = await validator.validate();

        expect(report.issues).toEqual(['CMake 3.20.0 found, but 3.21+ required']);
        expect(runner.requests[0]).toEqual({ command: '/opt/cmake/bin/cmake', args: ['--version'], timeoutMs: 5000 });
    });

    it('trusts CXX without probing compilers', async () => {
        const { validator, runner } = validatorFor(healthyLinux, { env: { CXX: 'clang++-17' } });

        const report = await validator.validate();

        expect(report.checks[1]).toEqual({ name: 'C++ Compiler', ok: true, detail: 'CXX environment variable set: clang++-17' });
        expect(runner.commands()).toEqual(['cmake --version']);
    });

    it('warns without failing when no compiler is found', async () => {
        const { validator, runner } = validatorFor(req => (req.command === 'cmake' ? cmakeVersion('3.28.1') : undefined));

        const report = await validator.validate();

        expect(report.passed).toBe(true);
        expect(report.warnings).toEqual(['No C++ compiler detected. Set CXX environment variable.']);
        expect(runner.requests.slice(1).map(r => [r.command, r.timeoutMs])).toEqual([['g++', 2000], ['clang++', 2000]]);
    });

    it('checks for clang++ first on macOS', async () => {
        const { validator, runner } = validatorFor(
            req => (req.command === 'cmake' ? cmakeVersion('3.28.1') : req.command === 'clang++' ? {} : undefined),
            { platform: Platform.DARWIN }
        );

        const report = await validator.validate();

        expect(report.checks[1].detail).toBe('Detected C++ compiler: clang++');
        expect(runner.commands()).toEqual(['cmake --version', 'clang++ --version']);
    });

    it('warns about a VCPKG_ROOT that does not exist', async () => {
        const { validator } = validatorFor(healthyLinux, {
            env: { VCPKG_ROOT: '/missing/vcpkg' },
            pathExists: () => false
        });

        const report = await validator.validate();

        expect(report.passed).toBe(true);
        expect(report.warnings).toEqual(['VCPKG_ROOT points to non-existent path: /missing/vcpkg']);
    });

    it('warns when free disk space is below the threshold', async () => {
        const { validator } = validatorFor(healthyLinux, {
            diskSpace: async () => ({ freeBytes: 4.5 * GB, totalBytes: 100 * GB })
        });

        const report = await validator.validate();

        expect(report.passed).toBe(true);
        expect(report.warnings).toEqual(['Low disk space: 4GB available (recommend 10GB+)']);
    });

    it('does not fail when disk space cannot be read', async () => {
        const { validator } = validatorFor(healthyLinux, {
            diskSpace: async () => {
                throw new Error('ENOSYS');
            }
        });

        const report = await validator.validate();

        expect(report.passed).toBe(true);
        expect(report.checks[3]).toEqual({ name: 'Disk Space', ok: true, detail: 'Disk space could not be determined' });
    });

    describe('on Windows', () => {
        const windows: RunnerHandler = req => {
            if (req.command === 'cmake') return cmakeVersion('3.29.0');
            if (req.command === 'cl') return {};
            if (req.command === 'powershell' && req.args?.[1].startsWith('Get-ItemProperty')) {
                return { stdout: 'LongPathsEnabled : 0' };
            }
            if (req.command === 'powershell') return { exitCode: 0 };
            return undefined;
        };

        it('warns when long paths are disabled', async () => {
            const { validator, runner } = validatorFor(windows, { platform: Platform.WINDOWS });

            const report = await validator.validate();

            expect(report.passed).toBe(true);
            expect(report.warnings).toEqual(['Windows long paths not enabled (may cause MAX_PATH errors)']);
            expect(report.checks[4]).toEqual({ name: 'Windows Long Paths', ok: false, detail: 'Windows long paths not enabled' });
            expect(runner.requests.filter(r => r.command === 'powershell')).toHaveLength(1);
        });

        it('enables long paths when asked to fix', async () => {
            const { validator, runner } = validatorFor(windows, { platform: Platform.WINDOWS, fix: true });

            const report = await validator.validate();

            expect(report.checks[4].detail).toBe('Long paths enabled (reboot required)');
            const powershell = runner.requests.filter(r => r.command === 'powershell');
            expect(powershell).toHaveLength(2);
            expect(powershell[1].args?.[1]).toContain('New-ItemProperty');
        });

        it('accepts long paths that are already enabled', async () => {
            const { validator } = validatorFor(
                req => (req.command === 'powershell' ? { stdout: 'LongPathsEnabled : 1' } : windows(req)),
                { platform: Platform.WINDOWS }
            );

            const report = await validator.validate();

            expect(report.warnings).toEqual([]);
            expect(report.checks[4].ok).toBe(true);
        });
    });
});

describe('formatReport', () => {
    it('lists checks and the ready banner for a passing report', () => {
        const text = formatReport({
            passed: true,
            platform: Platform.LINUX,
            issues: [],
            warnings: [],
            checks: [{ name: 'CMake', ok: true, detail: 'CMake 3.28.1 (>= 3.15 required)' }]
        });

        expect(text.split('\n')).toEqual([
            '🔍 Validating C++ development environment (Linux)...',
            '',
            '✓ CMake: CMake 3.28.1 (>= 3.15 required)',
            '',
            '='.repeat(50),
            '',
            '✅ Environment ready for C++ development'
        ]);
    });

    it('recommends actions for a failing report', () => {
        const text = formatReport({
            passed: false,
            platform: Platform.LINUX,
            issues: ['CMake not found in PATH'],
            warnings: ['No C++ compiler detected. Set CXX environment variable.'],
            checks: []
        });

        expect(text).toContain('❌ Critical Issues:\n  • CMake not found in PATH');
        expect(text).toContain('  1. Install CMake 3.15+: https://cmake.org/download/');
        expect(text).toContain('  2. Install C++ compiler (MSVC/GCC/Clang)');
        expect(text).not.toContain('Enable long paths');
    });
});
