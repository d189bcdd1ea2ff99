import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_UETR_REQUIRED_TYPES, parseConfig, resolveLogLevel } from '../../libs/bootstrap/config.js';
import { ConfigGuard, getConfig, resetConfig } from '../../libs/bootstrap/config-guard.js';
import { ConfigurationError } from '../../libs/errors/messageErrors.js';

describe('Engine Configuration', () => {
    it('falls back to defaults for an empty environment', () => {
        assert.deepStrictEqual(parseConfig({}), {
            success: true,
            config: {
                logLevel: 'info',
                detectPrefixBytes: 1024,
                anonymizerSalt: 'dualwire-default-salt',
                uetrRequiredTypes: [...DEFAULT_UETR_REQUIRED_TYPES],
            },
        });
    });

    it('treats blank values as unset', () => {
        const result = parseConfig({ DUALWIRE_ANONYMIZER_SALT: '   ', DUALWIRE_DETECT_PREFIX_BYTES: '' });
        assert.ok(result.success);
        assert.strictEqual(result.config.anonymizerSalt, 'dualwire-default-salt');
        assert.strictEqual(result.config.detectPrefixBytes, 1024);
    });

    it('reads typed values and comma-separated lists', () => {
        const result = parseConfig({
            DUALWIRE_LOG_LEVEL: 'debug',
            DUALWIRE_DETECT_PREFIX_BYTES: '256',
            DUALWIRE_UETR_REQUIRED_TYPES: 'pacs.008, MT103,,',
        });
        assert.ok(result.success);
        assert.strictEqual(result.config.logLevel, 'debug');
        assert.strictEqual(result.config.detectPrefixBytes, 256);
        assert.deepStrictEqual(result.config.uetrRequiredTypes, ['pacs.008', 'MT103']);
    });

    it('collects every violation', () => {
        const result = parseConfig({ DUALWIRE_LOG_LEVEL: 'loud', DUALWIRE_DETECT_PREFIX_BYTES: '8' });
        assert.ok(!result.success);
        assert.strictEqual(result.errors.length, 2);
        assert.ok(result.errors[0]?.startsWith('FATAL CONFIG: DUALWIRE_LOG_LEVEL '));
        assert.ok(result.errors[1]?.startsWith('FATAL CONFIG: DUALWIRE_DETECT_PREFIX_BYTES '));
    });

    it('resolves the log level even when it is invalid', () => {
        assert.strictEqual(resolveLogLevel({ DUALWIRE_LOG_LEVEL: 'nope' }), 'info');
        assert.strictEqual(resolveLogLevel({ DUALWIRE_LOG_LEVEL: 'warn' }), 'warn');
    });
});

describe('ConfigGuard', () => {
    const original = process.env.DUALWIRE_ANONYMIZER_SALT;

    afterEach(() => {
        if (original === undefined) delete process.env.DUALWIRE_ANONYMIZER_SALT;
        else process.env.DUALWIRE_ANONYMIZER_SALT = original;
        resetConfig();
    });

    it('throws ConfigurationError for an invalid environment', () => {
        assert.throws(
            () => ConfigGuard.enforce({ DUALWIRE_DETECT_PREFIX_BYTES: 'many' }),
            (err: unknown) => err instanceof ConfigurationError && err.violations.length === 1
        );
    });

    it('memoizes process configuration until reset', () => {
        process.env.DUALWIRE_ANONYMIZER_SALT = 'test-salt';
        resetConfig();
        assert.strictEqual(getConfig().anonymizerSalt, 'test-salt');

        process.env.DUALWIRE_ANONYMIZER_SALT = 'other-salt';
        assert.strictEqual(getConfig().anonymizerSalt, 'test-salt');

        resetConfig();
        assert.strictEqual(getConfig().anonymizerSalt, 'other-salt');
    });
});
