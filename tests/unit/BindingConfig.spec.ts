import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadBindingConfig } from '../../libs/config/bindingConfig.js';
import { ConfigurationError } from '../../libs/errors/bindingErrors.js';

describe('Binding Configuration', () => {
    it('should fall back to defaults when nothing is set', () => {
        assert.deepStrictEqual(loadBindingConfig({}), {
            logLevel: 'info',
            strictChoices: false,
            unknownElements: 'ignore',
            xmlDeclaration: true
        });
    });

    it('should read trimmed values', () => {
        const config = loadBindingConfig({
            ISO20022_LOG_LEVEL: ' debug ',
            ISO20022_STRICT_CHOICES: 'true',
            ISO20022_UNKNOWN_ELEMENTS: 'reject',
            ISO20022_XML_DECLARATION: 'false\n'
        });

        assert.deepStrictEqual(config, {
            logLevel: 'debug',
            strictChoices: true,
            unknownElements: 'reject',
            xmlDeclaration: false
        });
    });

    it('should treat blank values as unset', () => {
        const config = loadBindingConfig({ ISO20022_LOG_LEVEL: '', ISO20022_UNKNOWN_ELEMENTS: '   ' });

        assert.strictEqual(config.logLevel, 'info');
        assert.strictEqual(config.unknownElements, 'ignore');
    });

    it('should ignore unrelated variables', () => {
        assert.strictEqual(loadBindingConfig({ PATH: '/usr/bin', ISO20022_EXTRA: 'x' }).logLevel, 'info');
    });

    it('should report every invalid variable at once', () => {
        assert.throws(
            () => loadBindingConfig({ ISO20022_LOG_LEVEL: 'loud', ISO20022_STRICT_CHOICES: 'yes' }),
            (error: unknown) => {
                assert.ok(error instanceof ConfigurationError);
                assert.strictEqual(error.code, 5001);
                assert.strictEqual(error.category, 'CONFIG');
                assert.strictEqual(error.violations.length, 2);
                assert.ok(error.violations[0]?.startsWith('ISO20022_LOG_LEVEL: '));
                assert.ok(error.violations[1]?.startsWith('ISO20022_STRICT_CHOICES: '));
                return true;
            }
        );
    });
});
