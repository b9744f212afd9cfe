import { describe, it, expect } from 'vitest';
import { handler } from './get';
import { apiEvent } from '../../testing/fixtures';

describe('GET /health', () => {
  it('reports the service as up', async () => {
    const res = await handler(apiEvent({ path: '/health' }));

    expect(res.statusCode).toBe(200);
    expect(res.headers).toEqual({ 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' });
    expect(JSON.parse(res.body).data).toMatchObject({ status: 'ok', service: 'mystery-trail' });
  });
});
