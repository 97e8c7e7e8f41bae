import { describe, it, mock } from 'node:test';
import * as assert from 'assert';
import { SecretRedactor } from '../src/utils/SecretRedactor';
import { ConsoleLogger } from '../src/ConsoleLogger';

describe('SecretRedactor.redact', () => {
    it('masks bearer tokens', () => {
        assert.strictEqual(
            SecretRedactor.redact('Authorization: Bearer abc.def-123'),
            'Authorization: ***REDACTED***'
        );
    });

    it('masks values assigned to credential keys but keeps the key', () => {
        assert.strictEqual(SecretRedactor.redact('{"access_token": "abc123"}'), '{"access_token": ***REDACTED***}');
        assert.strictEqual(SecretRedactor.redact("api_key='12345'"), 'api_key=***REDACTED***');
        assert.strictEqual(SecretRedactor.redact('pat=test-secret; next'), 'pat=***REDACTED***; next');
    });

    it('masks bare personal access tokens', () => {
        assert.strictEqual(SecretRedactor.redact(`using ${'a'.repeat(52)} now`), 'using ***REDACTED*** now');
    });

    it('leaves ordinary text alone', () => {
        assert.strictEqual(SecretRedactor.redact('Unexpected token found.'), 'Unexpected token found.');
        assert.strictEqual(SecretRedactor.redact(undefined), '');
    });
});

describe('SecretRedactor.mask', () => {
    it('hides short tokens completely', () => {
        assert.strictEqual(SecretRedactor.mask('short'), '*****');
    });

    it('shows only the ends of long tokens', () => {
        assert.strictEqual(SecretRedactor.mask('test-secret-value-123'), 'test...-123 (length: 21)');
    });
});

describe('ConsoleLogger', () => {
    it('redacts messages and attached errors', () => {
        const log = mock.method(console, 'log', () => undefined);
        const warn = mock.method(console, 'warn', () => undefined);
        try {
            const logger = new ConsoleLogger();
            logger.log('token=test-secret');
            logger.warn('Request failed:', new Error('password=test-secret'));

            assert.deepStrictEqual(log.mock.calls[0].arguments, ['token=***REDACTED***']);
            assert.deepStrictEqual(warn.mock.calls[0].arguments, ['Request failed:', 'password=***REDACTED***']);
        } finally {
            log.mock.restore();
            warn.mock.restore();
        }
    });
});
