import { writeFile } from 'node:fs/promises';

export interface TestResult {
  readonly test: string;
  readonly success: boolean;
  readonly message: string;
  readonly timestamp: string;
}

/**
 * Aggregate of one run. Field names are the on-disk report format.
 */
export interface RunSummary {
  readonly total_tests: number;
  readonly passed_tests: number;
  readonly failed_tests: number;
  readonly success_rate: number;
  readonly results: readonly TestResult[];
}

export type ExitCode = 0 | 1;

export function buildRunSummary(results: readonly TestResult[]): RunSummary {
  const total = results.length;
  const passed = results.filter(result => result.success).length;

  return {
    total_tests: total,
    passed_tests: passed,
    failed_tests: total - passed,
    success_rate: total > 0 ? (100 * passed) / total : 0,
    results: [...results]
  };
}

export function exitCodeFor(summary: RunSummary): ExitCode {
  return summary.failed_tests === 0 ? 0 : 1;
}

export async function writeRunSummary(path: string, summary: RunSummary): Promise<void> {
  await writeFile(path, `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
}
