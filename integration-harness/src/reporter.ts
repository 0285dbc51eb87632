/* eslint-disable no-console */
import type { RunSummary, TestResult } from './runSummary.js';

const RULE = '='.repeat(50);

/**
 * Receives results as they are recorded. The console reporter is the only
 * production implementation; tests collect into an array instead.
 */
export interface Reporter {
  runStarted(caseCount: number): void;
  resultRecorded(result: TestResult): void;
  runFinished(summary: RunSummary): void;
}

export function formatResultLines(result: TestResult): string[] {
  const status = result.success ? '✅ PASS' : '❌ FAIL';
  const lines = [`${status} ${result.test}`];
  if (result.message) {
    lines.push(`   ${result.message}`);
  }
  return lines;
}

export function formatSummaryLines(summary: RunSummary): string[] {
  const lines = [
    '',
    RULE,
    `📊 Test Results: ${String(summary.passed_tests)}/${String(summary.total_tests)} tests passed`
  ];
  if (summary.failed_tests === 0) {
    lines.push('🎉 All tests passed! The application is fully functional.');
  } else {
    lines.push(`⚠️  ${String(summary.failed_tests)} tests failed. Check the logs above for details.`);
  }
  return lines;
}

export class ConsoleReporter implements Reporter {
  public runStarted(): void {
    console.log('🚀 Starting AI Job Hunter Integration Tests');
    console.log(RULE);
  }

  public resultRecorded(result: TestResult): void {
    for (const line of formatResultLines(result)) {
      console.log(line);
    }
  }

  public runFinished(summary: RunSummary): void {
    for (const line of formatSummaryLines(summary)) {
      console.log(line);
    }
  }
}
