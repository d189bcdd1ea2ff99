import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/messageErrors.js';
import { EngineConfig, parseConfig } from './config.js';

let cached: EngineConfig | null = null;

/**
 * Fail-closed configuration guard.
 * Invalid environment values are reported together and never silently replaced.
 */
export class ConfigGuard {
    static enforce(env: NodeJS.ProcessEnv = process.env): EngineConfig {
        const result = parseConfig(env);

        if (!result.success) {
            logger.fatal({
                errors: result.errors,
                remediation: 'Check DUALWIRE_* environment variables.'
            }, 'Configuration Guard Violation');
            throw new ConfigurationError(result.errors);
        }

        logger.debug({ config: { ...result.config, anonymizerSalt: undefined } }, 'Configuration guard passed.');
        return result.config;
    }
}

/** Process-wide configuration, validated on first use. */
export function getConfig(): EngineConfig {
    if (cached === null) {
        cached = ConfigGuard.enforce(process.env);
    }
    return cached;
}

/** Drops the memoized configuration so the next `getConfig()` re-reads the environment. */
export function resetConfig(): void {
    cached = null;
}
