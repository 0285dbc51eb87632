import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiClient, type JsonValue, type NormalizedResponse } from './apiClient.js';
import { Credentials } from './harnessConfig.js';
import {
  HEALTHY_BACKEND,
  fakeFetch,
  jsonResponse,
  textResponse,
  unreachableFetch,
  type RouteHandler
} from './fakeBackend.js';
import type { CaseContext, RequestCheck } from './testCase.js';
import { CHECKS, UNVERIFIED_BEARER_TOKEN, defaultTestCases } from './testCatalogue.js';

function checkNamed(name: string): RequestCheck {
  const check = CHECKS.find(candidate => candidate.name === name);
  if (!check) {
    throw new Error(`No check named ${name}`);
  }
  return check;
}

function json(body: JsonValue, status = 200): NormalizedResponse {
  return { kind: 'json', status, body };
}

describe('test catalogue', () => {
  let context: CaseContext;

  beforeEach(() => {
    context = {
      client: new ApiClient({ baseUrl: 'http://backend.test:8000/' }),
      credentials: new Credentials('test-admin-token')
    };
  });

  afterEach(() => {
    context.client.close();
    vi.unstubAllGlobals();
  });

  async function runCase(name: string, routes: Readonly<Record<string, RouteHandler>>) {
    vi.stubGlobal('fetch', fakeFetch(routes));
    const testCase = defaultTestCases().find(candidate => candidate.name === name);
    if (!testCase) {
      throw new Error(`No case named ${name}`);
    }
    return testCase.run(context);
  }

  it('registers uniquely named cases in a fixed order', () => {
    const names = CHECKS.map(check => check.name);

    expect(names).toEqual([
      'Health Check',
      'Auth0 Authentication',
      'Data Loading - Jobs',
      'Data Loading - Candidates',
      'Data Loading - Recruiters',
      'API Route - GET /users',
      'API Route - POST /ranking',
      'File Upload',
      'JD Upload - Form',
      'JD Upload - JSON',
      'Resume Upload - Candidate',
      'Resume Upload - Legacy',
      'Job Scraping',
      'AI Streaming',
      'Admin LLM Settings',
      'Prompts Management',
      'Recruiter Workflow'
    ]);
    expect(new Set(names).size).toBe(names.length);
  });

  it('builds a well-formed but unsigned bearer token', () => {
    const segments = UNVERIFIED_BEARER_TOKEN.split('.');

    expect(segments).toHaveLength(3);
    expect(JSON.parse(Buffer.from(segments[0] ?? '', 'base64url').toString('utf8'))).toEqual({
      alg: 'HS256',
      typ: 'JWT'
    });
  });

  describe('Health Check', () => {
    it('passes when status is ok and a message is present', async () => {
      const outcome = await runCase('Health Check', {
        'GET /health': () => jsonResponse({ status: 'ok', message: 'up' })
      });

      expect(outcome).toEqual({ success: true, message: 'Health endpoint responding correctly' });
    });

    it('fails when the message is missing', () => {
      const outcome = checkNamed('Health Check').evaluate(json({ status: 'ok' }), context);

      expect(outcome).toEqual({ success: false, message: 'Health check failed: {"status":"ok"}' });
    });
  });

  describe('Auth0 Authentication', () => {
    it('accepts a backend without the auth route', async () => {
      const outcome = await runCase('Auth0 Authentication', {});

      expect(outcome).toEqual({ success: true, message: 'Auth0 not configured (expected in dev environment)' });
    });

    it('sends the unverified token', async () => {
      const fetchMock = fakeFetch({});
      vi.stubGlobal('fetch', fetchMock);

      await requestAuth();

      expect(fetchMock).toHaveBeenCalledWith(
        'http://backend.test:8000/api/v1/users/me',
        expect.objectContaining({
          headers: { Accept: 'application/json', Authorization: `Bearer ${UNVERIFIED_BEARER_TOKEN}` }
        }) as RequestInit
      );
    });

    async function requestAuth() {
      const testCase = defaultTestCases().find(candidate => candidate.name === 'Auth0 Authentication');
      if (!testCase) {
        throw new Error('Auth case missing');
      }
      return testCase.run(context);
    }

    it.each([401, 403])('accepts a %i rejection', async status => {
      const outcome = await runCase('Auth0 Authentication', {
        'GET /api/v1/users/me': () => jsonResponse({ detail: 'Not authenticated' }, status)
      });

      expect(outcome).toEqual({ success: true, message: 'Auth0 authentication flow accessible' });
      expect(context.credentials.bearerToken).toBeNull();
    });

    it('stores the token for later requests when the backend accepts it', async () => {
      const outcome = await runCase('Auth0 Authentication', {
        'GET /api/v1/users/me': () => jsonResponse({ id: 'integration-test-user' })
      });

      expect(outcome.success).toBe(true);
      expect(context.credentials.bearerToken).toBe(UNVERIFIED_BEARER_TOKEN);
    });

    it('fails on any other answer', () => {
      const outcome = checkNamed('Auth0 Authentication').evaluate(json({ detail: 'boom' }, 500), context);

      expect(outcome).toEqual({ success: false, message: 'Auth flow not working: {"detail":"boom"}' });
    });
  });

  describe('Data Loading', () => {
    it('counts the listed items', async () => {
      const outcome = await runCase('Data Loading - Jobs', {
        'GET /jobs': () => jsonResponse({ items: [{ id: 'job-1' }, { id: 'job-2' }] })
      });

      expect(outcome).toEqual({ success: true, message: 'Loaded 2 jobs from database' });
    });

    it('fails when items is not an array', () => {
      const outcome = checkNamed('Data Loading - Recruiters').evaluate(json({ items: 'none' }), context);

      expect(outcome).toEqual({ success: false, message: 'Failed to load recruiters: {"items":"none"}' });
    });
  });

  it('requires a users field on the users route', () => {
    const check = checkNamed('API Route - GET /users');

    expect(check.evaluate(json({ users: [] }), context).success).toBe(true);
    expect(check.evaluate(json({ items: [] }), context)).toEqual({
      success: false,
      message: 'Route failed: {"items":[]}'
    });
  });

  it('posts both skill lists to the ranking route', async () => {
    const fetchMock = fakeFetch({ 'POST /ranking': () => jsonResponse({ match_score: 0.5 }) });
    vi.stubGlobal('fetch', fetchMock);
    const testCase = defaultTestCases().find(candidate => candidate.name === 'API Route - POST /ranking');

    const outcome = await testCase?.run(context);

    expect(outcome).toEqual({ success: true, message: 'Route accessible - returned data' });
    expect(fetchMock).toHaveBeenCalledWith(
      'http://backend.test:8000/ranking',
      expect.objectContaining({
        method: 'POST',
        body: '{"user_skills":["python","react"],"job_skills":["python","django"]}'
      }) as RequestInit
    );
  });

  describe('File Upload', () => {
    const check = () => checkNamed('File Upload');

    it('accepts a list of resumes', () => {
      expect(check().evaluate(json([{ resume_id: 'r-1' }]), context).success).toBe(true);
    });

    it('accepts an object without error indicators', () => {
      expect(check().evaluate(json({ resumes: [] }), context).success).toBe(true);
    });

    it('rejects an error detail', () => {
      expect(check().evaluate(json({ detail: 'User not found' }, 404), context)).toEqual({
        success: false,
        message: 'Resume endpoint failed: {"detail":"User not found"}'
      });
    });
  });

  describe('uploads', () => {
    it('posts the job description form with the admin token', async () => {
      const fetchMock = fakeFetch(HEALTHY_BACKEND);
      vi.stubGlobal('fetch', fetchMock);
      const testCase = defaultTestCases().find(candidate => candidate.name === 'JD Upload - Form');

      const outcome = await testCase?.run(context);

      expect(outcome).toEqual({ success: true, message: 'Upload accepted (status 201)' });
      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.headers).toEqual({ Accept: 'application/json', 'X-Admin-Token': 'test-admin-token' });
      const form = init?.body;
      expect(form).toBeInstanceOf(FormData);
      if (form instanceof FormData) {
        expect(form.get('recruiter_id')).toBe('test-recruiter-001');
        expect(form.get('title')).toBe('Senior DevOps Engineer');
      }
    });

    it('accepts 200 for the JSON job description upload', async () => {
      const outcome = await runCase('JD Upload - JSON', {
        'POST /jobs/upload-jd': () => jsonResponse({ job_id: 'job-4' })
      });

      expect(outcome).toEqual({ success: true, message: 'Upload accepted (status 200)' });
    });

    it('sends the legacy resume fields', async () => {
      const fetchMock = fakeFetch(HEALTHY_BACKEND);
      vi.stubGlobal('fetch', fetchMock);
      const testCase = defaultTestCases().find(candidate => candidate.name === 'Resume Upload - Legacy');

      await testCase?.run(context);

      const form = fetchMock.mock.calls[0]?.[1]?.body;
      expect(form).toBeInstanceOf(FormData);
      if (form instanceof FormData) {
        expect(form.get('user_id')).toBe('test-user-002');
        expect(form.get('resume_type')).toBe('Business');
        expect(form.get('file')).toBeInstanceOf(Blob);
      }
    });

    it('requires 201 for a resume upload', () => {
      const outcome = checkNamed('Resume Upload - Candidate').evaluate(json({ resume_id: 'r-1' }), context);

      expect(outcome).toEqual({ success: false, message: 'Upload failed with status 200: {"resume_id":"r-1"}' });
    });

    it('fails on a rejected admin token', () => {
      const outcome = checkNamed('JD Upload - Form').evaluate(json({ detail: 'Invalid admin token' }, 403), context);

      expect(outcome).toEqual({
        success: false,
        message: 'Upload failed with status 403: {"detail":"Invalid admin token"}'
      });
    });
  });

  describe('Job Scraping', () => {
    it('accepts a missing scraper route', async () => {
      const outcome = await runCase('Job Scraping', {});

      expect(outcome).toEqual({
        success: true,
        message: 'Job scraping not available (expected without scraper configuration)'
      });
    });

    it('accepts any other answer', () => {
      const outcome = checkNamed('Job Scraping').evaluate(
        { kind: 'text', status: 500, text: 'Internal Server Error' },
        context
      );

      expect(outcome).toEqual({ success: true, message: 'Scrape endpoint accessible' });
    });
  });

  describe('AI Streaming', () => {
    it('accepts an event stream', async () => {
      const outcome = await runCase('AI Streaming', {
        'POST /recruiter-workflow/generate-stream': () => textResponse('data: {}\n\n', 200, 'text/event-stream')
      });

      expect(outcome).toEqual({ success: true, message: 'AI streaming endpoint accessible' });
    });

    it('fails when the route is missing', async () => {
      const outcome = await runCase('AI Streaming', {});

      expect(outcome).toEqual({ success: false, message: 'AI streaming failed: {"detail":"Not Found"}' });
    });
  });

  describe('admin routes', () => {
    it('accepts an auth rejection', () => {
      const outcome = checkNamed('Admin LLM Settings').evaluate(json({ detail: 'Not authenticated' }, 401), context);

      expect(outcome).toEqual({ success: true, message: 'LLM settings endpoint accessible (requires auth)' });
    });

    it.each(['Not Found', 'Method Not Allowed'])('fails on "%s"', detail => {
      const outcome = checkNamed('Prompts Management').evaluate(json({ detail }, 404), context);

      expect(outcome).toEqual({
        success: false,
        message: `Prompts management failed: {"detail":"${detail}"}`
      });
    });

    it('fails when no detail is returned', () => {
      const outcome = checkNamed('Prompts Management').evaluate(json({ prompts: [] }), context);

      expect(outcome.success).toBe(false);
    });
  });

  describe('Recruiter Workflow', () => {
    it('passes when both sections are generated', async () => {
      const outcome = await runCase('Recruiter Workflow', HEALTHY_BACKEND);

      expect(outcome).toEqual({ success: true, message: 'Workflow returned engagement plan and fairness guidance' });
    });

    it('accepts a reachable but unconfigured workflow', () => {
      const outcome = checkNamed('Recruiter Workflow').evaluate(json({ detail: 'LLM provider not configured' }, 503), context);

      expect(outcome).toEqual({
        success: true,
        message: 'Recruiter workflow route reachable (generation not configured)'
      });
    });
  });

  it('fails every case with status 0 when the backend is unreachable', async () => {
    vi.stubGlobal('fetch', unreachableFetch());

    for (const testCase of defaultTestCases()) {
      const outcome = await testCase.run(context);

      expect(outcome).toEqual({
        success: false,
        message: 'Transport error (status 0): fetch failed: getaddrinfo ENOTFOUND backend.test'
      });
    }
  });
});
