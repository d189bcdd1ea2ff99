import { z } from 'zod';

/**
 * Engine Configuration
 * Every tunable is read from the environment once and validated as a whole.
 */

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const DEFAULT_UETR_REQUIRED_TYPES = ['pacs.008', 'pacs.009', 'MT103', 'MT202'] as const;

export const EnvSchema = z.object({
    DUALWIRE_LOG_LEVEL: LogLevelSchema.default('info'),
    DUALWIRE_DETECT_PREFIX_BYTES: z.coerce.number().int().min(16).max(65536).default(1024),
    DUALWIRE_ANONYMIZER_SALT: z.string().min(1).default('dualwire-default-salt'),
    DUALWIRE_UETR_REQUIRED_TYPES: z
        .string()
        .optional()
        .transform(value => value === undefined
            ? [...DEFAULT_UETR_REQUIRED_TYPES]
            : value.split(',').map(item => item.trim()).filter(item => item.length > 0)),
});

export interface EngineConfig {
    readonly logLevel: LogLevel;
    readonly detectPrefixBytes: number;
    readonly anonymizerSalt: string;
    readonly uetrRequiredTypes: readonly string[];
}

export type ConfigParseResult =
    | { readonly success: true; readonly config: EngineConfig }
    | { readonly success: false; readonly errors: readonly string[] };

/**
 * Parses the environment without side effects. Every violation is collected.
 */
export function parseConfig(env: NodeJS.ProcessEnv): ConfigParseResult {
    // Empty strings count as unset so that `VAR=` falls back to the default.
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const result = EnvSchema.safeParse(present);
    if (!result.success) {
        return {
            success: false,
            errors: result.error.issues.map(issue =>
                `FATAL CONFIG: ${issue.path.join('.') || '(root)'} ${issue.message}`
            ),
        };
    }

    const values = result.data;
    return {
        success: true,
        config: Object.freeze({
            logLevel: values.DUALWIRE_LOG_LEVEL,
            detectPrefixBytes: values.DUALWIRE_DETECT_PREFIX_BYTES,
            anonymizerSalt: values.DUALWIRE_ANONYMIZER_SALT,
            uetrRequiredTypes: Object.freeze([...values.DUALWIRE_UETR_REQUIRED_TYPES]),
        }),
    };
}

/**
 * Log level lookup used by the logger itself, which must come up even when
 * the rest of the configuration is invalid.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
    return LogLevelSchema.catch('info').parse(env.DUALWIRE_LOG_LEVEL);
}
