import type { ApiClient, FormPayload, HttpMethod, JsonValue, NormalizedResponse } from './apiClient.js';
import type { Credentials } from './harnessConfig.js';

export interface CaseOutcome {
  readonly success: boolean;
  readonly message: string;
}

/**
 * What a case gets to work with. Credentials are threaded explicitly rather
 * than living on the client.
 */
export interface CaseContext {
  readonly client: ApiClient;
  readonly credentials: Credentials;
}

export interface TestCase {
  readonly name: string;
  run(context: CaseContext): Promise<CaseOutcome>;
}

export interface RequestSpec {
  readonly method: HttpMethod;
  readonly path: string;
  readonly body?: JsonValue;
  readonly form?: FormPayload;
  readonly headers?: Readonly<Record<string, string>>;
  /** Send the run's admin token as X-Admin-Token. */
  readonly admin?: boolean;
}

/**
 * Declarative check: one request and a predicate over its response.
 */
export interface RequestCheck {
  readonly name: string;
  readonly request: RequestSpec;
  evaluate(response: NormalizedResponse, context: CaseContext): CaseOutcome;
}

export function pass(message: string): CaseOutcome {
  return { success: true, message };
}

export function fail(message: string): CaseOutcome {
  return { success: false, message };
}

/**
 * Turn a RequestCheck into a runnable TestCase. Transport errors fail the
 * case before the predicate sees the response.
 */
export function requestCase(check: RequestCheck): TestCase {
  return {
    name: check.name,
    async run(context: CaseContext): Promise<CaseOutcome> {
      const { method, path, body, form, admin } = check.request;
      const headers = admin
        ? { 'X-Admin-Token': context.credentials.adminToken, ...check.request.headers }
        : check.request.headers;
      const response = await context.client.request(method, path, {
        credentials: context.credentials,
        ...(body !== undefined ? { body } : {}),
        ...(form !== undefined ? { form } : {}),
        ...(headers !== undefined ? { headers } : {})
      });

      if (response.kind === 'error') {
        return fail(`Transport error (status 0): ${response.error}`);
      }

      return check.evaluate(response, context);
    }
  };
}
