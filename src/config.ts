import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_FEED_URL = 'https://lichess.org/api/tv/feed';

const FLAG_VALUES = ['1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'] as const;
const TRUTHY: readonly string[] = FLAG_VALUES.slice(0, 4);

const booleanFlag = z.union([
    z.boolean(),
    z.enum(FLAG_VALUES).transform((value) => TRUTHY.includes(value)),
]);

export const configSchema = z.object({
    /** Newline-delimited feed endpoint */
    feedUrl: z.string().url().default(DEFAULT_FEED_URL),
    glyphs: z.enum(['unicode', 'ascii']).default('unicode'),
    /** ANSI colours for board squares */
    color: booleanFlag.default(true),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
    /** Longest record the feed will buffer before dropping it */
    maxRecordBytes: z.coerce.number().int().positive().default(64 * 1024),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

const ENV_KEYS: Record<keyof Config, string> = {
    feedUrl: 'FENFEED_URL',
    glyphs: 'FENFEED_GLYPHS',
    color: 'FENFEED_COLOR',
    logLevel: 'FENFEED_LOG_LEVEL',
    maxRecordBytes: 'FENFEED_MAX_RECORD_BYTES',
};

/**
 * Resolve configuration from `FENFEED_*` environment variables, with
 * explicit overrides (usually CLI flags) taking precedence.
 */
export function loadConfig(
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<ConfigInput> = {},
): Config {
    const raw: Record<string, unknown> = {};

    for (const [key, name] of Object.entries(ENV_KEYS)) {
        const value = env[name];
        if (value !== undefined && value !== '') {
            raw[key] = value.trim();
        }
    }
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            raw[key] = value;
        }
    }

    const result = configSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
    }
    return result.data;
}
