import { describe, it } from 'node:test';
import * as assert from 'assert';
import { ReconciliationEngine } from '../src/ReconciliationEngine';
import { OUTCOME_MAP } from '../src/OutcomeMapping';
import { makeOutcome, makePoint } from './helpers';

describe('outcome mapping', () => {
    it('maps result statuses onto remote outcomes', () => {
        assert.deepStrictEqual(OUTCOME_MAP, { Passed: 'Passed', Failed: 'Failed', Error: 'Failed', Skipped: 'Blocked' });
    });
});

describe('ReconciliationEngine', () => {
    const engine = new ReconciliationEngine();

    it('matches a result to the point with the same normalized name', () => {
        const source = makeOutcome('test_login_success', 'Passed');
        const result = engine.reconcile([source], [makePoint({ pointId: 101, testCaseName: 'Login Success' })]);

        assert.deepStrictEqual(result.plan, [
            { pointId: 101, suiteId: 7, planId: 3, targetOutcome: 'Passed', comment: undefined, source, matchScore: 100 },
        ]);
        assert.strictEqual(result.unmatched, 0);
    });

    it('leaves a result unmatched when nothing reaches the threshold', () => {
        const source = makeOutcome('test_payment_flow', 'Failed');
        const result = engine.reconcile(
            [source],
            [makePoint({ pointId: 101, testCaseName: 'Login Success' })],
            { minScore: 90 }
        );

        assert.deepStrictEqual(result.plan, []);
        assert.strictEqual(result.unmatched, 1);
        assert.deepStrictEqual(result.unmatchedOutcomes, [source]);
    });

    it('lets each point be claimed once, in result order', () => {
        const points = [
            makePoint({ pointId: 101, testCaseName: 'Login Success' }),
            makePoint({ pointId: 102, testCaseName: 'Login Success Remembered' }),
        ];
        const result = engine.reconcile(
            [makeOutcome('test_login_success', 'Passed'), makeOutcome('test_login_success', 'Failed')],
            points
        );

        assert.deepStrictEqual(
            result.plan.map((item) => [item.pointId, item.targetOutcome, item.matchScore]),
            [[101, 'Passed', 100], [102, 'Failed', 100]]
        );
    });

    it('reports later duplicates as unmatched once the only point is taken', () => {
        const result = engine.reconcile(
            [makeOutcome('test_login_success'), makeOutcome('test_login_success')],
            [makePoint({ pointId: 101, testCaseName: 'Login Success' })]
        );

        assert.strictEqual(result.plan.length, 1);
        assert.strictEqual(result.unmatched, 1);
    });

    it('only considers points that pass the filter', () => {
        const points = [
            makePoint({ pointId: 101, testCaseName: 'Login Success', currentOutcome: 'Passed' }),
            makePoint({ pointId: 102, testCaseName: 'Login Success', currentOutcome: 'Failed' }),
        ];
        const result = engine.reconcile([makeOutcome('test_login_success')], points, {
            filter: { currentOutcome: 'Failed' },
        });

        assert.deepStrictEqual(result.plan.map((item) => item.pointId), [102]);
    });

    it('prefers the fetched test case title over the point name', () => {
        const point = makePoint({
            pointId: 101,
            testCaseName: 'Unknown',
            details: {
                id: 501,
                title: 'Checkout Cart',
                state: 'Ready',
                priority: '2',
                automationStatus: 'Automated',
                assignedTo: 'QA Bot',
                steps: [],
            },
        });
        const result = engine.reconcile([makeOutcome('testCheckoutCart')], [point]);

        assert.deepStrictEqual(result.plan.map((item) => item.pointId), [101]);
    });

    it('maps skipped results to Blocked', () => {
        const result = engine.reconcile(
            [makeOutcome('test_login_success', 'Skipped')],
            [makePoint({ pointId: 101, testCaseName: 'Login Success' })]
        );
        assert.strictEqual(result.plan[0].targetOutcome, 'Blocked');
    });

    it('renders the comment template for every matched result', () => {
        const source = { ...makeOutcome('test_login_success', 'Failed'), failureMessage: 'boom' };
        const result = engine.reconcile(
            [source],
            [makePoint({ pointId: 101, testCaseName: 'Login Success' })],
            { comment: '{status} by CI ({score}%): {message}{unknown}' }
        );

        assert.strictEqual(result.plan[0].comment, 'Failed by CI (100%): boom{unknown}');
    });

    it('matches names that look like credentials on both sides', () => {
        const points = [
            makePoint({ pointId: 1, testCaseName: 'rejects Bearer abc123 when expired' }),
            makePoint({ pointId: 2, testCaseName: 'token: refresh keeps session' }),
        ];
        const result = engine.reconcile(
            [makeOutcome('rejects Bearer abc123 when expired'), makeOutcome('token: refresh keeps session')],
            points
        );

        assert.deepStrictEqual(result.plan.map((item) => [item.pointId, item.matchScore]), [[1, 100], [2, 100]]);
        assert.strictEqual(result.unmatched, 0);
    });

    it('redacts the test name in rendered comments', () => {
        const result = engine.reconcile(
            [makeOutcome('rejects Bearer abc123 when expired')],
            [makePoint({ pointId: 1, testCaseName: 'rejects Bearer abc123 when expired' })],
            { comment: '{testName}: {status}' }
        );

        assert.strictEqual(result.plan[0].comment, 'rejects ***REDACTED*** when expired: Passed');
    });

    it('never matches results whose names reduce to nothing', () => {
        const result = engine.reconcile([makeOutcome('test_')], [makePoint({ pointId: 101, testCaseName: 'Test' })]);
        assert.deepStrictEqual(result.plan, []);
        assert.strictEqual(result.unmatched, 1);
    });
});
