import { logger } from './logger.js';
import { HarnessConfigError } from './harnessConfig.js';
import type { Reporter } from './reporter.js';
import { buildRunSummary, type RunSummary, type TestResult } from './runSummary.js';
import type { CaseContext, CaseOutcome, TestCase } from './testCase.js';

function describeFault(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow the registry to the named cases, keeping declaration order.
 */
export function selectTestCases(cases: readonly TestCase[], names: readonly string[]): TestCase[] {
  const known = new Set(cases.map(testCase => testCase.name));
  const unknown = names.filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw new HarnessConfigError(`Unknown test case(s): ${unknown.join(', ')}`);
  }

  const wanted = new Set(names);
  return cases.filter(testCase => wanted.has(testCase.name));
}

/**
 * Runs registered cases one at a time, in order. A case that throws becomes a
 * failed result; nothing escapes the loop.
 */
export class HarnessRunner {
  private readonly cases: readonly TestCase[];

  public constructor(
    cases: readonly TestCase[],
    private readonly reporter: Reporter,
    private readonly clock: () => Date = () => new Date()
  ) {
    const seen = new Set<string>();
    for (const testCase of cases) {
      if (seen.has(testCase.name)) {
        throw new HarnessConfigError(`Duplicate test case name: ${testCase.name}`);
      }
      seen.add(testCase.name);
    }
    this.cases = [...cases];
  }

  public get caseNames(): string[] {
    return this.cases.map(testCase => testCase.name);
  }

  public async runAll(context: CaseContext): Promise<RunSummary> {
    const results: TestResult[] = [];
    this.reporter.runStarted(this.cases.length);

    for (const testCase of this.cases) {
      logger.debug({ test: testCase.name }, 'Running test case');

      let outcome: CaseOutcome;
      try {
        outcome = await testCase.run(context);
      } catch (error: unknown) {
        logger.warn({ test: testCase.name, error: describeFault(error) }, 'Test case raised an exception');
        outcome = { success: false, message: `Exception: ${describeFault(error)}` };
      }

      const result: TestResult = {
        test: testCase.name,
        success: outcome.success,
        message: outcome.message,
        timestamp: this.clock().toISOString()
      };
      results.push(result);
      this.reporter.resultRecorded(result);
    }

    const summary = buildRunSummary(results);
    logger.info(
      { total: summary.total_tests, passed: summary.passed_tests, failed: summary.failed_tests },
      'Run summary'
    );
    this.reporter.runFinished(summary);
    return summary;
  }
}
