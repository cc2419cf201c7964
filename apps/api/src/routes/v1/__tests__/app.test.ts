/**
 * Tests for app-level routes and middleware
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CATEGORIES } from '@kasbook/types';
import { API_VERSION } from '../health.js';
import { createTestApp, makeRequest } from '../../../test/helpers.js';

describe('App', () => {
  it('should report health at both mount points', async () => {
    const { app } = createTestApp();

    for (const path of ['/health', '/v1/health']) {
      const response = await makeRequest(app, 'GET', path);
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: 'ok', version: API_VERSION });
    }
  });

  it('should list the default categories', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/v1/categories');

    expect(await response.json()).toEqual({ categories: [...DEFAULT_CATEGORIES] });
  });

  it('should not open a ledger session for health or category requests', async () => {
    const { app, registry } = createTestApp();

    await makeRequest(app, 'GET', '/v1/health');
    await makeRequest(app, 'GET', '/v1/categories');

    expect(registry.size).toBe(0);
  });

  it('should echo a provided request id', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/health', { headers: { 'x-request-id': 'req-123' } });

    expect(response.headers.get('x-request-id')).toBe('req-123');
  });

  it('should return JSON 404 for unknown paths', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/nowhere');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('should allow the configured web app origin', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/health', {
      headers: { Origin: 'http://localhost:5173' },
    });

    expect(response.headers.get('access-control-allow-origin')).toBe('http://localhost:5173');
  });
});
