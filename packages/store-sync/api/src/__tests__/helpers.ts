import type { FastifyInstance, LightMyRequestResponse } from 'fastify';

export const TEST_API_KEY = 'test-api-key';

export interface ErrorResponse {
  error: string;
  message: string;
}

/** Local {price:100,name:"Tea"} at 10:00, remote {price:120,name:"Tea"} at 10:05 */
export function detectPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    entityType: 'Product',
    entityId: 'product-42',
    localSnapshot: { price: 100, name: 'Tea' },
    remoteSnapshot: { price: 120, name: 'Tea' },
    localTimestamp: '2024-05-01T10:00:00.000Z',
    remoteTimestamp: '2024-05-01T10:05:00.000Z',
    storeId: 'store-nairobi',
    syncBatchId: 'batch-1',
    ...overrides,
  };
}

export function get(app: FastifyInstance, url: string): Promise<LightMyRequestResponse> {
  return app.inject({ method: 'GET', url, headers: { 'x-api-key': TEST_API_KEY } });
}

export function post(app: FastifyInstance, url: string, payload?: Record<string, unknown>): Promise<LightMyRequestResponse> {
  return app.inject({
    method: 'POST',
    url,
    headers: { 'x-api-key': TEST_API_KEY },
    ...(payload ? { payload } : {}),
  });
}

export function put(app: FastifyInstance, url: string, payload: Record<string, unknown>): Promise<LightMyRequestResponse> {
  return app.inject({ method: 'PUT', url, headers: { 'x-api-key': TEST_API_KEY }, payload });
}

export function del(app: FastifyInstance, url: string): Promise<LightMyRequestResponse> {
  return app.inject({ method: 'DELETE', url, headers: { 'x-api-key': TEST_API_KEY } });
}

/** Detect the default Product conflict and return its id */
export async function createConflict(app: FastifyInstance, overrides: Record<string, unknown> = {}): Promise<string> {
  const response = await post(app, '/api/conflicts/detect', detectPayload(overrides));
  const body = response.json<{ detected: boolean; conflict: { id: string } }>();
  return body.conflict.id;
}
