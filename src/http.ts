/**
 * HTTP transport and response translation
 *
 * HttpClient owns base URL, auth and timeout handling. handleApiResponse maps
 * an HTTP answer to either its decoded body or one of the SDK error types.
 */

import { z } from 'zod';
import {
  APIError,
  AuthenticationError,
  ConnectionError,
  NotFoundError,
  OpenWebUIError,
  errorMessage,
} from './errors.js';
import { createLogger } from './logger.js';
import type { ClientOptions } from './types.js';

const log = createLogger('http');

export const DEFAULT_TIMEOUT_MS = 30000;

const validationErrorSchema = z.object({
  detail: z.array(
    z.object({
      loc: z.array(z.union([z.string(), z.number()])).optional(),
      msg: z.string().optional(),
    })
  ),
});

function formatValidationError(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    log.debug('422 body is not JSON; using it verbatim');
    return undefined;
  }
  const result = validationErrorSchema.safeParse(parsed);
  if (!result.success) {
    return undefined;
  }
  const details = result.data.detail
    .map((d) => `${JSON.stringify(d.loc ?? [])}: ${d.msg ?? ''}`)
    .join('; ');
  return `Validation Error (422): ${details}`;
}

/**
 * Decodes a successful response or throws the matching SDK error.
 *
 * Successful responses without a body resolve to `true`; bodies that are not
 * JSON resolve to their raw text.
 */
export async function handleApiResponse(response: Response, resourceName = 'resource'): Promise<unknown> {
  log.debug(`Received API response for ${resourceName}: status ${response.status}`);

  if (response.ok) {
    if (response.status === 204) {
      return true;
    }
    const text = await response.text();
    if (text.length === 0) {
      log.debug(`Empty body for ${resourceName}; treating as success`);
      return true;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      log.warn(`Could not JSON decode response body for ${resourceName}; returning raw text`);
      return text;
    }
  }

  if (response.status === 401) {
    log.error('Authentication failed. Check your API key.');
    throw new AuthenticationError();
  }

  if (response.status === 404) {
    log.warn(`Resource not found: ${resourceName}`);
    throw new NotFoundError(resourceName);
  }

  let message = await response.text().catch(() => response.statusText);
  if (response.status === 422) {
    message = formatValidationError(message) ?? message;
  }

  log.error(`API Error ${response.status}: ${message}`);
  throw new APIError(
    `Received unexpected status code: ${response.status} for ${resourceName}: ${message}`,
    response.status
  );
}

export class HttpClient {
  readonly baseUrl: string;
  private apiKey: string;
  private timeout: number;

  constructor(options: ClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  }

  async get(path: string, resource: string): Promise<unknown> {
    return this.request(path, { method: 'GET' }, resource);
  }

  async post(path: string, body: unknown, resource: string): Promise<unknown> {
    return this.request(
      path,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      },
      resource
    );
  }

  /**
   * Multipart upload; fetch supplies the boundary header.
   */
  async postForm(path: string, form: FormData, resource: string): Promise<unknown> {
    return this.request(path, { method: 'POST', body: form }, resource);
  }

  async delete(path: string, resource: string): Promise<unknown> {
    return this.request(path, { method: 'DELETE' }, resource);
  }

  /**
   * Sends one request and decodes its answer. The timeout covers the whole
   * exchange, body included; a server that stalls after the headers still
   * fails with ConnectionError.
   */
  private async request(path: string, init: RequestInit, resource: string): Promise<unknown> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        reject(new ConnectionError(`Request for ${resource} timed out after ${this.timeout}ms`));
        controller.abort();
      }, this.timeout);
    });

    try {
      return await Promise.race([this.exchange(path, init, resource, controller.signal), timedOut]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async exchange(path: string, init: RequestInit, resource: string, signal: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.apiKey}`,
    };
    if (init.headers) {
      new Headers(init.headers).forEach((value, key) => {
        headers[key] = value;
      });
    }

    log.debug(`${init.method ?? 'GET'} ${url}`);
    try {
      const response = await fetch(url, {
        ...init,
        headers,
        signal,
      });
      return await handleApiResponse(response, resource);
    } catch (error) {
      if (error instanceof OpenWebUIError) {
        throw error;
      }
      if (signal.aborted) {
        throw new ConnectionError(`Request for ${resource} timed out after ${this.timeout}ms`, { cause: error });
      }
      throw new ConnectionError(
        `A network error occurred while requesting ${resource}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
