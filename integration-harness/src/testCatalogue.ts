import { Buffer } from 'node:buffer';
import {
  describeResponse,
  hasResponseField,
  isJsonObject,
  responseField,
  type NormalizedResponse
} from './apiClient.js';
import { fail, pass, requestCase, type RequestCheck, type TestCase } from './testCase.js';

const NOT_FOUND = 'Not Found';
const METHOD_NOT_ALLOWED = 'Method Not Allowed';

function encodeSegment(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

/**
 * Syntactically valid JWT that no identity provider signed.
 */
export const UNVERIFIED_BEARER_TOKEN = [
  encodeSegment({ alg: 'HS256', typ: 'JWT' }),
  encodeSegment({ sub: 'integration-test-user', name: 'Integration Test', iat: 1_700_000_000 }),
  Buffer.from('test-signature').toString('base64url')
].join('.');

function isNotFound(response: NormalizedResponse): boolean {
  return responseField(response, 'detail') === NOT_FOUND;
}

function listingCheck(resource: 'jobs' | 'candidates' | 'recruiters', label: string): RequestCheck {
  return {
    name: `Data Loading - ${label}`,
    request: { method: 'GET', path: `/${resource}` },
    evaluate(response) {
      const items = responseField(response, 'items');
      if (Array.isArray(items)) {
        return pass(`Loaded ${String(items.length)} ${resource} from database`);
      }
      return fail(`Failed to load ${resource}: ${describeResponse(response)}`);
    }
  };
}

function adminRouteCheck(name: string, path: string, label: string): RequestCheck {
  return {
    name,
    request: { method: 'GET', path },
    evaluate(response) {
      const detail = responseField(response, 'detail');
      if (detail !== undefined && detail !== NOT_FOUND && detail !== METHOD_NOT_ALLOWED) {
        return pass(`${label} endpoint accessible (requires auth)`);
      }
      return fail(`${label} failed: ${describeResponse(response)}`);
    }
  };
}

const JOB_DESCRIPTION_TEXT = [
  'Senior DevOps Engineer',
  '',
  'Location: San Francisco, CA',
  'Experience: 5+ years',
  '',
  'We are looking for an experienced DevOps Engineer to join our infrastructure team.',
  '',
  'Required Skills:',
  '- Kubernetes, Docker',
  '- Python, Bash scripting',
  '- CI/CD tools (Jenkins, GitLab CI, GitHub Actions)'
].join('\n');

const RESUME_TEXT = [
  'Test Candidate',
  'DevOps Engineer',
  '',
  'Experience: 6 years running Kubernetes and AWS infrastructure.',
  'Skills: Docker, Terraform, Python, Bash'
].join('\n');

function uploadCheck(name: string, request: RequestCheck['request'], acceptedStatuses: readonly number[]): RequestCheck {
  return {
    name,
    request: { ...request, admin: true },
    evaluate(response) {
      if (acceptedStatuses.includes(response.status)) {
        return pass(`Upload accepted (status ${String(response.status)})`);
      }
      return fail(`Upload failed with status ${String(response.status)}: ${describeResponse(response)}`);
    }
  };
}

function resumeUploadCheck(name: string, fields: Readonly<Record<string, string>>): RequestCheck {
  return uploadCheck(
    name,
    {
      method: 'POST',
      path: '/resumes/',
      form: {
        file: { filename: 'test-resume.txt', contentType: 'text/plain', content: RESUME_TEXT },
        ...fields
      }
    },
    [201]
  );
}

const RECRUITER_WORKFLOW_PAYLOAD = {
  job_description:
    'We are looking for a Senior Frontend Engineer with expertise in React, TypeScript, ' +
    'and modern web development. The ideal candidate will have 5+ years of experience ' +
    'building scalable web applications.',
  resumes: [
    { resume_id: 'software-engineer-resume', candidate_id: 'candidate_1' },
    { resume_id: 'product-manager-resume', candidate_id: 'candidate_1' }
  ],
  job_metadata: {
    title: 'Senior Frontend Engineer',
    code: 'REQ-001',
    level: 'Senior',
    salary_band: '$130k - $150k AUD',
    summary: 'Senior Frontend Engineer role at Example Corp'
  }
};

/**
 * The checks run against the backend, in execution order.
 *
 * Several checks accept "not configured" answers from the backend: optional
 * integrations (Auth0, scraping, LLM workflows) may be absent in the test
 * environment.
 */
export const CHECKS: readonly RequestCheck[] = [
  {
    name: 'Health Check',
    request: { method: 'GET', path: '/health' },
    evaluate(response) {
      if (responseField(response, 'status') === 'ok' && hasResponseField(response, 'message')) {
        return pass('Health endpoint responding correctly');
      }
      return fail(`Health check failed: ${describeResponse(response)}`);
    }
  },
  {
    name: 'Auth0 Authentication',
    request: {
      method: 'GET',
      path: '/api/v1/users/me',
      headers: { Authorization: `Bearer ${UNVERIFIED_BEARER_TOKEN}` }
    },
    evaluate(response, { credentials }) {
      if (isNotFound(response)) {
        return pass('Auth0 not configured (expected in dev environment)');
      }
      if (response.status === 200 || response.status === 401 || response.status === 403) {
        if (response.status === 200 && credentials.bearerToken === null) {
          credentials.setBearerToken(UNVERIFIED_BEARER_TOKEN);
        }
        return pass('Auth0 authentication flow accessible');
      }
      return fail(`Auth flow not working: ${describeResponse(response)}`);
    }
  },
  listingCheck('jobs', 'Jobs'),
  listingCheck('candidates', 'Candidates'),
  listingCheck('recruiters', 'Recruiters'),
  {
    name: 'API Route - GET /users',
    request: { method: 'GET', path: '/users' },
    evaluate(response) {
      if (hasResponseField(response, 'users')) {
        return pass('Route accessible - returned data');
      }
      return fail(`Route failed: ${describeResponse(response)}`);
    }
  },
  {
    name: 'API Route - POST /ranking',
    request: {
      method: 'POST',
      path: '/ranking',
      body: { user_skills: ['python', 'react'], job_skills: ['python', 'django'] }
    },
    evaluate(response) {
      if (hasResponseField(response, 'match_score')) {
        return pass('Route accessible - returned data');
      }
      return fail(`Route failed: ${describeResponse(response)}`);
    }
  },
  {
    name: 'File Upload',
    request: { method: 'GET', path: '/resumes/test_user' },
    evaluate(response) {
      const accessible =
        response.kind === 'text' ||
        (response.kind === 'json' &&
          (Array.isArray(response.body) ||
            (isJsonObject(response.body) &&
              !hasResponseField(response, 'detail') &&
              !hasResponseField(response, 'error'))));
      if (accessible) {
        return pass('Resume endpoint accessible');
      }
      return fail(`Resume endpoint failed: ${describeResponse(response)}`);
    }
  },
  uploadCheck(
    'JD Upload - Form',
    {
      method: 'POST',
      path: '/jobs/upload-jd',
      form: {
        file: { filename: 'test_jd.txt', contentType: 'text/plain', content: JOB_DESCRIPTION_TEXT },
        recruiter_id: 'test-recruiter-001',
        title: 'Senior DevOps Engineer',
        description: 'Cloud infrastructure role'
      }
    },
    [200, 201]
  ),
  uploadCheck(
    'JD Upload - JSON',
    {
      method: 'POST',
      path: '/jobs/upload-jd',
      body: {
        title: 'Senior DevOps Engineer',
        description: JOB_DESCRIPTION_TEXT,
        recruiter_id: 'test-recruiter-002',
        level: 'Senior',
        salary_band: '150k-180k'
      }
    },
    [200, 201]
  ),
  resumeUploadCheck('Resume Upload - Candidate', {
    candidate_id: 'test-candidate-001',
    name: 'Test Resume 1',
    type: 'Technical',
    summary: 'Test upload with candidate format'
  }),
  resumeUploadCheck('Resume Upload - Legacy', {
    user_id: 'test-user-002',
    name: 'Test Resume 2',
    resume_type: 'Business',
    summary: 'Test upload with legacy format'
  }),
  {
    name: 'Job Scraping',
    request: {
      method: 'POST',
      path: '/api/scrape-jobs',
      body: { platform: 'indeed', keyword: 'software engineer', location: 'remote' }
    },
    evaluate(response) {
      if (isNotFound(response)) {
        return pass('Job scraping not available (expected without scraper configuration)');
      }
      return pass('Scrape endpoint accessible');
    }
  },
  {
    name: 'AI Streaming',
    request: {
      method: 'POST',
      path: '/recruiter-workflow/generate-stream',
      body: { candidate_id: 'test_candidate', job_id: 'test_job' }
    },
    evaluate(response) {
      if (isNotFound(response)) {
        return fail(`AI streaming failed: ${describeResponse(response)}`);
      }
      return pass('AI streaming endpoint accessible');
    }
  },
  adminRouteCheck('Admin LLM Settings', '/api/admin/llm/providers', 'LLM settings'),
  adminRouteCheck('Prompts Management', '/api/admin/prompts', 'Prompts management'),
  {
    name: 'Recruiter Workflow',
    request: { method: 'POST', path: '/recruiter-workflow/generate', body: RECRUITER_WORKFLOW_PAYLOAD },
    evaluate(response) {
      if (hasResponseField(response, 'engagement_plan') && hasResponseField(response, 'fairness_guidance')) {
        return pass('Workflow returned engagement plan and fairness guidance');
      }
      const detail = responseField(response, 'detail');
      if (detail !== undefined && detail !== NOT_FOUND) {
        return pass('Recruiter workflow route reachable (generation not configured)');
      }
      return fail(`Recruiter workflow failed: ${describeResponse(response)}`);
    }
  }
];

export function defaultTestCases(): readonly TestCase[] {
  return CHECKS.map(requestCase);
}
