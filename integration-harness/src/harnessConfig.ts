/**
 * Run-scoped configuration for the integration harness.
 *
 * Everything here is fixed once the CLI has been parsed, with the single
 * exception of the bearer token held by {@link Credentials}, which a test case
 * may assign once and every later request reads.
 */

export const DEFAULT_BASE_URL = 'http://backend:8000';
export const DEFAULT_OUTPUT_PATH = 'integration_test_results.json';
export const DEFAULT_ADMIN_TOKEN = 'changeme-admin-token';

/**
 * Admin token for the upload routes: ADMIN_TOKEN, then NEXT_PUBLIC_ADMIN_TOKEN,
 * then the backend's development default.
 */
export function adminTokenFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  return env['ADMIN_TOKEN'] || env['NEXT_PUBLIC_ADMIN_TOKEN'] || DEFAULT_ADMIN_TOKEN;
}

export class HarnessConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'HarnessConfigError';
  }
}

export interface HarnessConfig {
  readonly baseUrl: string;
  readonly verbose: boolean;
  readonly atlas: boolean;
  readonly outputPath: string;
  readonly adminToken: string;
  readonly timeoutMs?: number;
}

export interface HarnessConfigInput {
  readonly url?: string;
  readonly verbose?: boolean;
  readonly atlas?: boolean;
  readonly output?: string;
  readonly timeout?: string;
  readonly adminToken?: string;
}

function parseBaseUrl(raw: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new HarnessConfigError(`Invalid base URL: ${raw}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new HarnessConfigError(`Base URL must use http or https: ${raw}`);
  }

  return parsed.toString();
}

function parseTimeout(raw: string): number {
  const timeoutMs = Number(raw);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new HarnessConfigError(`Timeout must be a positive number of milliseconds: ${raw}`);
  }
  return timeoutMs;
}

/**
 * Validate and normalise raw CLI options into a HarnessConfig.
 */
export function createHarnessConfig(input: HarnessConfigInput = {}): HarnessConfig {
  const baseUrl = parseBaseUrl(input.url ?? DEFAULT_BASE_URL);
  const outputPath = input.output ?? DEFAULT_OUTPUT_PATH;
  if (outputPath.trim() === '') {
    throw new HarnessConfigError('Output path must not be empty');
  }

  return {
    baseUrl,
    verbose: input.verbose === true,
    atlas: input.atlas === true,
    outputPath,
    adminToken: input.adminToken ?? adminTokenFromEnv(),
    ...(input.timeout !== undefined ? { timeoutMs: parseTimeout(input.timeout) } : {})
  };
}

/**
 * Tokens passed explicitly to every request: the fixed admin token and a
 * bearer token assigned at most once during the run.
 */
export class Credentials {
  private token: string | null = null;

  public constructor(public readonly adminToken: string = DEFAULT_ADMIN_TOKEN) {}

  public get bearerToken(): string | null {
    return this.token;
  }

  public setBearerToken(token: string): void {
    if (this.token !== null) {
      throw new HarnessConfigError('Bearer token has already been set for this run');
    }
    this.token = token;
  }
}
