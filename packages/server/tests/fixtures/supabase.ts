/**
 * In-process stand-ins for the Supabase REST API
 */

import { vi } from 'vitest';
import type { DatanodeDetails } from '@strata/shared';

export const DN1 = '11111111-1111-4111-8111-111111111111';
export const DN2 = '22222222-2222-4222-8222-222222222222';
export const DN3 = '33333333-3333-4333-8333-333333333333';

export function makeDetails(uuid: string): DatanodeDetails {
  const suffix = uuid.slice(0, 1);
  return {
    uuid,
    hostName: `dn${suffix}.example.internal`,
    ipAddress: `10.0.0.${suffix}`,
    ports: [{ name: 'RATIS', value: 9858 }],
    networkLocation: '/rack1',
    persistedOpState: 'IN_SERVICE',
    persistedOpStateExpiryEpochSec: 0,
    version: '1.4.0',
    setupTime: 1_700_000_000_000,
    revision: 'rev-1',
  };
}

/**
 * A request as the fake server saw it
 */
export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Fetch that answers REST requests from `handler` and records them
 */
export function createFakeFetch(handler: (request: RecordedRequest) => Response) {
  const requests: RecordedRequest[] = [];

  const fetchImpl = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const body = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: new URL(input instanceof Request ? input.url : String(input)),
      headers: new Headers(init?.headers),
      body: typeof body === 'string' ? JSON.parse(body) : undefined,
    };
    if (request.url.pathname.startsWith('/rest/v1/')) {
      requests.push(request);
      return handler(request);
    }
    return json({});
  });

  return { fetchImpl, requests };
}
