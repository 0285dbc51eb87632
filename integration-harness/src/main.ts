#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { ApiClient } from './apiClient.js';
import {
  Credentials,
  DEFAULT_BASE_URL,
  DEFAULT_OUTPUT_PATH,
  HarnessConfigError,
  createHarnessConfig,
  type HarnessConfig
} from './harnessConfig.js';
import { HarnessRunner, selectTestCases } from './harnessRunner.js';
import { logger, setVerbose } from './logger.js';
import { ConsoleReporter, type Reporter } from './reporter.js';
import { exitCodeFor, writeRunSummary, type ExitCode, type RunSummary } from './runSummary.js';
import type { TestCase } from './testCase.js';
import { defaultTestCases } from './testCatalogue.js';

interface CliOptions {
  readonly url?: string;
  readonly atlas?: boolean;
  readonly verbose?: boolean;
  readonly output?: string;
  readonly timeout?: string;
  readonly adminToken?: string;
  readonly only?: string[];
  readonly list?: boolean;
}

/**
 * Run every case against the configured backend, persist the summary and map
 * it to an exit code. The API client is closed on every path out of the run.
 */
export async function runHarness(
  config: HarnessConfig,
  cases: readonly TestCase[],
  reporter: Reporter = new ConsoleReporter()
): Promise<ExitCode> {
  const runner = new HarnessRunner(cases, reporter);
  const client = new ApiClient({
    baseUrl: config.baseUrl,
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {})
  });

  let summary: RunSummary;
  try {
    summary = await runner.runAll({ client, credentials: new Credentials(config.adminToken) });
  } finally {
    client.close();
  }

  try {
    await writeRunSummary(config.outputPath, summary);
  } catch (error: unknown) {
    logger.error({ path: config.outputPath, err: error }, 'Failed to write run summary');
    // eslint-disable-next-line no-console
    console.error(`✗ Could not write results to ${config.outputPath}`);
    return 1;
  }

  // eslint-disable-next-line no-console
  console.log(`\n📄 Detailed results saved to ${config.outputPath}`);
  return exitCodeFor(summary);
}

async function runCli(options: CliOptions, registry: readonly TestCase[]): Promise<ExitCode> {
  let config: HarnessConfig;
  let cases: readonly TestCase[];
  try {
    config = createHarnessConfig(options);
    cases = options.only ? selectTestCases(registry, options.only) : registry;
  } catch (error: unknown) {
    if (error instanceof HarnessConfigError) {
      // eslint-disable-next-line no-console
      console.error(`ERROR: ${error.message}`);
      return 1;
    }
    throw error;
  }

  setVerbose(config.verbose);

  if (options.list) {
    for (const testCase of cases) {
      // eslint-disable-next-line no-console
      console.log(testCase.name);
    }
    return 0;
  }

  // eslint-disable-next-line no-console
  console.log(`Testing against: ${config.baseUrl}`);
  if (config.atlas) {
    // eslint-disable-next-line no-console
    console.log('Using MongoDB Atlas configuration');
  }

  try {
    return await runHarness(config, cases);
  } catch (error: unknown) {
    if (error instanceof HarnessConfigError) {
      // eslint-disable-next-line no-console
      console.error(`ERROR: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

/**
 * Commander-based CLI entrypoint.
 */
export async function main(argv: string[], registry: readonly TestCase[] = defaultTestCases()): Promise<ExitCode> {
  let exitCode: ExitCode = 0;
  const program = new Command();

  program
    .name('job-hunter-integration')
    .description('Integration checks for the AI Job Hunter backend')
    .version('1.0.0')
    .option('--url <url>', 'base URL for API tests', DEFAULT_BASE_URL)
    .option('--atlas', 'test against MongoDB Atlas (informational only)', false)
    .option('-v, --verbose', 'enable verbose output', false)
    .option('-o, --output <file>', 'where to write the JSON results', DEFAULT_OUTPUT_PATH)
    .option('--timeout <ms>', 'per-request timeout in milliseconds')
    .option('--admin-token <token>', 'X-Admin-Token for upload routes (default: $ADMIN_TOKEN)')
    .option('--only <names...>', 'run only the named test cases')
    .option('--list', 'list test case names and exit', false)
    .action(async (options: CliOptions) => {
      exitCode = await runCli(options, registry);
    });

  await program.parseAsync(['node', 'job-hunter-integration', ...argv]);
  return exitCode;
}

function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ err: error }, 'Integration run aborted');
      process.exitCode = 1;
    }
  );
}
