import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { Platform } from './utils/Environment';

export const ActionSchema = z.object({
    method: z.string().default(''),
    command: z.string().nullish(),
    command_windows: z.string().nullish(),
    command_linux: z.string().nullish(),
    command_macos: z.string().nullish(),
    message: z.string().nullish()
});

export type Action = z.infer<typeof ActionSchema>;

export const ErrorPatternSchema = z.object({
    id: z.string().optional(),
    regex: z.string().min(1),
    platform: z.array(z.string()).default(['all']),
    auto_fix: z.array(ActionSchema).default([]),
    fallback: z.array(ActionSchema).default([]),
    user_message: z.string().default('Attempting auto-fix...')
});

export type ErrorPattern = z.infer<typeof ErrorPatternSchema>;

interface CompiledPattern {
    pattern: ErrorPattern;
    matcher: RegExp;
}

export const BUNDLED_PATTERNS_PATH = path.resolve(__dirname, '../../config/error-patterns.json');

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Ordered table of known build-failure signatures. Built once and never mutated;
 * lookups are a linear scan so that earlier records win over later ones.
 */
export class PatternDatabase {
    private readonly entries: ReadonlyArray<CompiledPattern>;

    private constructor(entries: CompiledPattern[]) {
        this.entries = Object.freeze(entries);
    }

    public static empty(): PatternDatabase {
        return new PatternDatabase([]);
    }

    public static fromPatterns(patterns: ErrorPattern[]): PatternDatabase {
        return PatternDatabase.fromDocument(patterns);
    }

    /**
     * Accepts either `{ patterns: [...] }` or a bare array. Records that fail validation
     * or carry a regex that does not compile are dropped; the rest keep their order.
     */
    public static fromDocument(document: unknown): PatternDatabase {
        let records: unknown[];
        if (Array.isArray(document)) {
            records = document;
        } else if (document && typeof document === 'object' && 'patterns' in document && Array.isArray(document.patterns)) {
            records = document.patterns;
        } else {
            logger.warn('PatternDatabase: Document has no "patterns" list, using an empty table');
            return PatternDatabase.empty();
        }

        const entries: CompiledPattern[] = [];
        records.forEach((record, index) => {
            const parsed = ErrorPatternSchema.safeParse(record);
            if (!parsed.success) {
                const reason = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
                logger.warn(`PatternDatabase: Skipping pattern #${index}: ${reason}`);
                return;
            }
            try {
                const matcher = new RegExp(parsed.data.regex, 'i');
                entries.push({ pattern: deepFreeze(parsed.data), matcher });
            } catch (e) {
                logger.warn(`PatternDatabase: Skipping pattern #${index}, invalid regex "${parsed.data.regex}": ${e}`);
            }
        });

        return new PatternDatabase(entries);
    }

    /**
     * Load from a JSON file. A missing or unparsable file yields an empty table.
     */
    public static fromFile(filePath: string): PatternDatabase {
        if (!fs.existsSync(filePath)) {
            logger.warn(`PatternDatabase: ${filePath} not found, using an empty table`);
            return PatternDatabase.empty();
        }
        try {
            const raw = fs.readFileSync(filePath, 'utf8');
            const db = PatternDatabase.fromDocument(JSON.parse(raw));
            logger.info(`PatternDatabase: Loaded ${db.size} pattern(s) from ${filePath}`);
            return db;
        } catch (e) {
            logger.warn(`PatternDatabase: Failed to load ${filePath}: ${e}`);
            return PatternDatabase.empty();
        }
    }

    /**
     * First existing of: the configured path, ./buildfix/error-patterns.json, the bundled table.
     */
    public static resolvePath(configured?: string, cwd: string = process.cwd()): string {
        const candidates = [
            configured,
            path.join(cwd, 'buildfix', 'error-patterns.json'),
            BUNDLED_PATTERNS_PATH
        ].filter((p): p is string => typeof p === 'string' && p.length > 0);

        for (const candidate of candidates) {
            if (fs.existsSync(candidate)) {
                return candidate;
            }
        }
        return candidates[0];
    }

    public get size(): number {
        return this.entries.length;
    }

    public all(): ErrorPattern[] {
        return this.entries.map(e => e.pattern);
    }

    public static appliesTo(pattern: ErrorPattern, platform: Platform): boolean {
        const wanted = platform.toLowerCase();
        return pattern.platform.some(p => {
            const name = p.toLowerCase();
            return name === 'all' || name === wanted;
        });
    }

    public match(output: string, platform: Platform): ErrorPattern | undefined {
        for (const { pattern, matcher } of this.entries) {
            if (!PatternDatabase.appliesTo(pattern, platform)) {
                continue;
            }
            if (matcher.test(output)) {
                return pattern;
            }
        }
        return undefined;
    }
}
