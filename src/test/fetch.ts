/**
 * Helpers for tests that stub the global fetch
 */

import { vi } from 'vitest';

export const BASE_URL = 'http://owui.test';

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function mockJson(status: number, body: unknown): void {
  vi.mocked(fetch).mockResolvedValueOnce(jsonResponse(status, body));
}

export function mockText(status: number, text: string | null): void {
  vi.mocked(fetch).mockResolvedValueOnce(new Response(text, { status }));
}

export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

/**
 * The n-th fetch call, with a JSON request body decoded.
 */
export function fetchCall(index: number): RecordedCall {
  const call = vi.mocked(fetch).mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${vi.mocked(fetch).mock.calls.length} times; no call #${index}`);
  }
  const [input, init] = call;
  const body = init?.body;
  return {
    url: String(input),
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
    body: typeof body === 'string' ? JSON.parse(body) : body,
  };
}

export function fetchCalls(): RecordedCall[] {
  return vi.mocked(fetch).mock.calls.map((_, i) => fetchCall(i));
}
