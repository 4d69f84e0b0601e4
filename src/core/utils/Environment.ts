import fs from 'fs';
import os from 'os';
import process from 'process';

export enum Platform {
    WINDOWS = 'Windows',
    LINUX = 'Linux',
    DARWIN = 'Darwin',
    OTHER = 'Other'
}

export interface ShellInvocation {
    shell: string;
    flag: string;
}

export interface DiskSpace {
    freeBytes: number;
    totalBytes: number;
}

export class Environment {
    /**
     * Map a Node platform id onto the names the pattern table uses.
     */
    public static resolvePlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
        switch (nodePlatform) {
            case 'win32':
                return Platform.WINDOWS;
            case 'linux':
                return Platform.LINUX;
            case 'darwin':
                return Platform.DARWIN;
            default:
                return Platform.OTHER;
        }
    }

    /**
     * Parse a user supplied platform name (CLI flags, config). Unknown names map to OTHER.
     */
    public static parsePlatform(name: string): Platform {
        const clean = name.trim().toLowerCase();
        if (clean === 'windows' || clean === 'win32') return Platform.WINDOWS;
        if (clean === 'linux') return Platform.LINUX;
        if (clean === 'darwin' || clean === 'macos' || clean === 'mac') return Platform.DARWIN;
        return Platform.OTHER;
    }

    public static shellFor(platform: Platform): ShellInvocation {
        return platform === Platform.WINDOWS
            ? { shell: 'powershell.exe', flag: '-Command' }
            : { shell: '/bin/sh', flag: '-c' };
    }

    public static async diskSpace(dir: string = process.cwd()): Promise<DiskSpace> {
        const stats = await fs.promises.statfs(dir);
        return {
            freeBytes: stats.bavail * stats.bsize,
            totalBytes: stats.blocks * stats.bsize
        };
    }

    public static describe(platform: Platform): string {
        return `${platform} (${os.release()}, ${os.arch()}), Node.js ${process.version}`;
    }
}
