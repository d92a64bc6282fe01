/**
 * Shared HTTP plumbing for the LLM backends
 */

import { ProviderError } from './types';

export type FetchFn = typeof fetch;

export interface PostJsonOptions {
  headers: Record<string, string>;
  body: unknown;
  signal: AbortSignal;
  fetchFn?: FetchFn;
}

/**
 * POST a JSON body and return the parsed response.
 * Maps every failure to a ProviderError of the right kind.
 */
export async function postJson(
  provider: string,
  url: string,
  options: PostJsonOptions
): Promise<unknown> {
  const { headers, body, signal, fetchFn = fetch } = options;

  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (err) {
    if (signal.aborted) {
      throw new ProviderError(provider, 'timeout', `${provider} request aborted`, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ProviderError(provider, 'transport', `${provider} request failed: ${message}`, { cause: err });
  }

  const responseText = await response.text();
  const responseJson = safeJson(responseText);

  if (!response.ok) {
    throw new ProviderError(
      provider,
      'provider',
      `${provider} request failed (${response.status}): ${errorMessage(responseJson) ?? responseText.slice(0, 500)}`,
      { status: response.status }
    );
  }

  return responseJson;
}

function errorMessage(json: unknown): string | undefined {
  const error = toRecord(json)?.error;
  if (typeof error === 'string') {
    return error;
  }
  return asString(toRecord(error)?.message);
}

export function safeJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return { raw: text };
  }
}

export function toRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return value as Record<string, unknown>;
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
