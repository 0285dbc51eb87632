import { vi } from 'vitest';

export type RouteHandler = () => Response;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

export function textResponse(text: string, status = 200, contentType = 'text/plain'): Response {
  return new Response(text, { status, headers: { 'content-type': contentType } });
}

/**
 * Answers for every registered check that make each one pass.
 */
export const HEALTHY_BACKEND: Readonly<Record<string, RouteHandler>> = {
  'GET /health': () => jsonResponse({ status: 'ok', message: 'up' }),
  'GET /api/v1/users/me': () => jsonResponse({ detail: 'Not authenticated' }, 401),
  'GET /jobs': () => jsonResponse({ items: [{ id: 'job-1' }, { id: 'job-2' }] }),
  'GET /candidates': () => jsonResponse({ items: [{ id: 'candidate-1' }] }),
  'GET /recruiters': () => jsonResponse({ items: [] }),
  'GET /users': () => jsonResponse({ users: [] }),
  'POST /ranking': () => jsonResponse({ match_score: 0.5 }),
  'GET /resumes/test_user': () => jsonResponse([]),
  'POST /jobs/upload-jd': () => jsonResponse({ job_id: 'job-3' }, 201),
  'POST /resumes/': () => jsonResponse({ resume_id: 'resume-1' }, 201),
  'POST /api/scrape-jobs': () => jsonResponse({ jobs: [] }),
  'POST /recruiter-workflow/generate-stream': () => textResponse('data: {}\n\n', 200, 'text/event-stream'),
  'GET /api/admin/llm/providers': () => jsonResponse({ detail: 'Not authenticated' }, 401),
  'GET /api/admin/prompts': () => jsonResponse({ detail: 'Forbidden' }, 403),
  'POST /recruiter-workflow/generate': () =>
    jsonResponse({ engagement_plan: 'plan', fairness_guidance: 'guidance' })
};

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') {
    return new URL(input);
  }
  return input instanceof URL ? input : new URL(input.url);
}

/**
 * In-process stand-in for the backend: routes by "METHOD /path", and answers
 * unknown routes the way the backend does.
 */
export function fakeFetch(routes: Readonly<Record<string, RouteHandler>>) {
  return vi.fn((input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const key = `${init?.method ?? 'GET'} ${requestUrl(input).pathname}`;
    const handler = routes[key];
    return Promise.resolve(handler ? handler() : jsonResponse({ detail: 'Not Found' }, 404));
  });
}

export function unreachableFetch() {
  return vi.fn((): Promise<Response> =>
    Promise.reject(
      new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND backend.test') })
    )
  );
}

/**
 * fetch that never settles until its signal aborts.
 */
export function hangingFetch() {
  return vi.fn((_input: string | URL | Request, init?: RequestInit): Promise<Response> =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) {
        return;
      }
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      signal.addEventListener(
        'abort',
        () => {
          reject(signal.reason);
        },
        { once: true }
      );
    })
  );
}
