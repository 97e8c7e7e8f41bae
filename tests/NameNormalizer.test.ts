import { describe, it } from 'node:test';
import * as assert from 'assert';
import { normalizeTestName } from '../src/NameNormalizer';

describe('normalizeTestName', () => {
    it('reduces snake_case, camelCase and prose to the same form', () => {
        assert.strictEqual(normalizeTestName('test_login_success'), 'login success');
        assert.strictEqual(normalizeTestName('testLoginSuccess'), 'login success');
        assert.strictEqual(normalizeTestName('Login Success'), 'login success');
    });

    it('treats dots, hyphens and repeated separators as single spaces', () => {
        assert.strictEqual(normalizeTestName('TEST-Payment.Flow'), 'payment flow');
        assert.strictEqual(normalizeTestName('  multiple   spaces__here '), 'multiple spaces here');
    });

    it('strips only a whole leading "test" token', () => {
        assert.strictEqual(normalizeTestName('testing_api'), 'testing api');
        assert.strictEqual(normalizeTestName('test_test_checkout'), 'checkout');
        assert.strictEqual(normalizeTestName('checkout_test'), 'checkout test');
    });

    it('returns an empty string when only boilerplate is left', () => {
        assert.strictEqual(normalizeTestName('test_'), '');
        assert.strictEqual(normalizeTestName('Test'), '');
        assert.strictEqual(normalizeTestName(''), '');
    });

    it('is idempotent', () => {
        const inputs = ['test_login_success', 'testLoginSuccess', 'TEST-Payment.Flow', 'test_test_checkout', 'A_b-C.d'];
        for (const input of inputs) {
            const once = normalizeTestName(input);
            assert.strictEqual(normalizeTestName(once), once, input);
        }
    });
});
