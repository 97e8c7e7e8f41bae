import { after, describe, it } from 'node:test';
import * as assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { App } from '../src/App';
import { JUnitParser } from '../src/junitParser';
import { ReconciliationEngine } from '../src/ReconciliationEngine';
import { BulkUpdateOrchestrator } from '../src/BulkUpdateOrchestrator';
import { OutputWriter } from '../src/OutputWriter';
import { MalformedXmlError } from '../src/errors';
import { SuitePoints } from '../src/interfaces/ITestPointService';
import { FakeTestPointService, MockLogger, makePoint } from './helpers';

const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'app-'));

const REPORT = `<testsuites>
  <testsuite name="e2e">
    <testcase classname="tests.test_auth" name="test_login_success" time="0.2"/>
    <testcase classname="tests.test_pay" name="test_payment_flow" time="1.1">
      <failure message="boom"/>
    </testcase>
  </testsuite>
</testsuites>`;

function suites(): SuitePoints[] {
    return [{
        suite: { id: 7, name: 'Smoke', type: 'StaticTestSuite' },
        points: [
            makePoint({ pointId: 101, testCaseName: 'Login Success', automated: true }),
            makePoint({ pointId: 102, testCaseName: 'Checkout Cart', automated: false }),
        ],
    }];
}

function createApp(service: FakeTestPointService, logger: MockLogger): App {
    return new App(
        service,
        new JUnitParser(),
        new ReconciliationEngine(),
        new BulkUpdateOrchestrator(service, logger),
        new OutputWriter(logger, tempDir),
        logger
    );
}

function writeReport(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
}

describe('App.syncFromResults', () => {
    after(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('updates matched points and counts the rest as unmatched', async () => {
        const service = new FakeTestPointService(suites());
        const logger = new MockLogger();

        const summary = await createApp(service, logger).syncFromResults({
            planId: 3,
            resultFiles: [writeReport('results.xml', REPORT)],
            minScore: 80,
            dryRun: false,
            concurrency: 1,
        });

        assert.deepStrictEqual(service.updates, [
            { planId: 3, suiteId: 7, pointId: 101, outcome: 'Passed', comment: undefined },
        ]);
        assert.strictEqual(summary.totalAttempted, 1);
        assert.strictEqual(summary.totalUpdated, 1);
        assert.strictEqual(summary.totalUnmatched, 1);
        assert.deepStrictEqual(summary.byOutcome, { Passed: 1 });
        assert.ok(logger.warnings.includes('⚠️ No test point matched "test_payment_flow" (min score 80).'));
    });

    it('changes nothing on a dry run', async () => {
        const service = new FakeTestPointService(suites());

        const summary = await createApp(service, new MockLogger()).syncFromResults({
            planId: 3,
            resultFiles: [writeReport('dry.xml', REPORT)],
            minScore: 80,
            comment: 'CI: {status}',
            dryRun: true,
            concurrency: 1,
        });

        assert.strictEqual(service.updates.length, 0);
        assert.strictEqual(summary.totalUpdated, 1);
        assert.ok(summary.results.every((r) => r.simulated));
    });

    it('stops on malformed XML before contacting the service', async () => {
        const service = new FakeTestPointService(suites());

        await assert.rejects(
            createApp(service, new MockLogger()).syncFromResults({
                planId: 3,
                resultFiles: [writeReport('broken.xml', '<testsuites><testsuite>')],
                minScore: 80,
                dryRun: false,
                concurrency: 1,
            }),
            MalformedXmlError
        );
        assert.strictEqual(service.listCalls, 0);
        assert.strictEqual(service.updates.length, 0);
    });
});

describe('App.updateByCriteria', () => {
    it('sets the outcome on every point that passes the filter', async () => {
        const service = new FakeTestPointService(suites());

        const summary = await createApp(service, new MockLogger()).updateByCriteria({
            planId: 3,
            outcome: 'Blocked',
            filter: { automated: true },
            comment: 'manual',
            dryRun: false,
            concurrency: 2,
        });

        assert.deepStrictEqual(service.updates, [
            { planId: 3, suiteId: 7, pointId: 101, outcome: 'Blocked', comment: 'manual' },
        ]);
        assert.deepStrictEqual(summary.byOutcome, { Blocked: 1 });
        assert.strictEqual(summary.totalUnmatched, 0);
    });
});

describe('App.list', () => {
    it('prints the listing to the console by default', async () => {
        const logger = new MockLogger();

        const listed = await createApp(new FakeTestPointService(suites()), logger).list({
            planId: 3,
            detailed: false,
            output: 'console',
        });

        assert.strictEqual(listed.length, 1);
        assert.ok(logger.messages.includes('Total Suites: 1'));
        assert.ok(logger.messages.includes('Total Test Points: 2'));
    });
});
