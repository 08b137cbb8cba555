/**
 * HTTP API tests
 *
 * The app listens on an ephemeral loopback port; the orchestrator is a stub.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import type { ProposalBundle } from '@usecase-studio/shared-types';
import { createApp, type ProposalService } from '../app.js';

const successBundle: ProposalBundle = {
  status: 'success',
  researchData: {
    inputName: 'Acme Bank',
    industry: 'Finance',
    segment: 'Retail Banking',
    offerings: [],
    strategicFocus: [],
    searchResults: [],
  },
  useCases: [],
  resourceLinks: {
    'Fraud Detection': [{ title: 'Dataset', link: 'https://kaggle.example/fraud', snippet: 's' }],
  },
  genaiSuggestions: [],
};

class StubOrchestrator implements ProposalService {
  readonly subjects: string[] = [];

  async orchestrate(subjectName: string): Promise<ProposalBundle> {
    this.subjects.push(subjectName);
    if (subjectName === 'Crash Corp') {
      throw new Error('unexpected');
    }
    if (subjectName === 'No Links Ltd') {
      return { ...successBundle, resourceLinks: {} };
    }
    return successBundle;
  }
}

describe('HTTP API', () => {
  const orchestrator = new StubOrchestrator();
  let server: Server;
  let baseUrl = '';

  beforeAll(async () => {
    const app = createApp({ orchestrator, allowedOrigins: ['http://localhost:5173'] });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('GET /health reports ok', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok' });
    expect(response.headers.get('x-request-id')).toMatch(/^req-/);
  });

  it('returns the bundle as JSON and trims the subject', async () => {
    const response = await post('/api/proposals', { subject: '  Acme Bank  ' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, bundle: successBundle });
    expect(orchestrator.subjects.at(-1)).toBe('Acme Bank');
  });

  it.each([
    [{}, 'subject is required'],
    [{ subject: 42 }, 'subject must be a string'],
    [{ subject: '   ' }, 'subject must not be empty'],
    [{ subject: 'x'.repeat(201) }, 'subject must be at most 200 characters'],
  ])('rejects %j with 400', async (body, message) => {
    const response = await post('/api/proposals', body);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'INVALID_REQUEST', message });
  });

  it('answers 400 with a JSON body for malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/api/proposals`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"subject":',
    });

    expect(response.status).toBe(400);
    expect(response.headers.get('content-type')).toBe('application/json; charset=utf-8');
    expect(await response.json()).toEqual({
      error: 'INVALID_REQUEST',
      message: 'Request body is not valid JSON',
    });
  });

  it('answers 404 with a JSON body for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/api/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'NOT_FOUND', message: 'No route for GET /api/unknown' });
  });

  it('rejects an unknown format', async () => {
    const response = await post('/api/proposals?format=pdf', { subject: 'Acme Bank' });

    expect(response.status).toBe(400);
  });

  it('serves the resource file as a Markdown attachment', async () => {
    const response = await post('/api/proposals?format=markdown', { subject: 'Acme Bank' });

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/markdown; charset=utf-8');
    expect(response.headers.get('content-disposition')).toBe(
      'attachment; filename="Acme_Bank_ai_resources.md"',
    );
    expect(await response.text()).toBe(
      '# Relevant Resource Links\n\n## Fraud Detection\n\n- [Dataset](https://kaggle.example/fraud)\n\n',
    );
  });

  it('answers 404 when there are no resource links', async () => {
    const response = await post('/api/proposals?format=markdown', { subject: 'No Links Ltd' });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: 'NO_RESOURCES',
      message: 'No resource links were collected',
    });
  });

  it('answers 500 on an unexpected fault', async () => {
    const response = await post('/api/proposals', { subject: 'Crash Corp' });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'INTERNAL_ERROR', message: 'unexpected' });
  });

  it('blocks origins outside the allow-list', async () => {
    const allowed = await fetch(`${baseUrl}/health`, { headers: { Origin: 'http://localhost:5173' } });
    const blocked = await fetch(`${baseUrl}/health`, { headers: { Origin: 'https://evil.example' } });

    expect(allowed.headers.get('access-control-allow-origin')).toBe('http://localhost:5173');
    expect(blocked.status).toBe(403);
    expect(await blocked.json()).toEqual({
      error: 'ORIGIN_NOT_ALLOWED',
      message: 'Origin https://evil.example is not allowed',
    });
  });
});
