/**
 * Google Gemini backend (Generative Language API, generateContent)
 */

import { EnsembleContext, InvokeOptions, LLMProvider, ProviderError } from './types';
import { FetchFn, postJson, toRecord } from './http';

export const GEMINI_DEFAULT_MODEL = 'gemini-2.0-flash';
export const GEMINI_DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com';

export interface GeminiProviderOptions {
  name?: string;
  priority: number;
  apiKey: string | null;
  model?: string;
  baseUrl?: string;
  fetchFn?: FetchFn;
}

interface GeminiPayload {
  contents: Array<{ role: 'user'; parts: Array<{ text: string }> }>;
  systemInstruction?: { parts: Array<{ text: string }> };
  generationConfig: { responseMimeType: 'application/json' | 'text/plain' };
}

export function mapToGeminiPayload(prompt: string, context: EnsembleContext): GeminiPayload {
  const payload: GeminiPayload = {
    contents: [{ role: 'user', parts: [{ text: prompt }] }],
    generationConfig: {
      responseMimeType: context.responseFormat === 'json' ? 'application/json' : 'text/plain',
    },
  };

  if (context.systemInstruction) {
    payload.systemInstruction = { parts: [{ text: context.systemInstruction }] };
  }

  return payload;
}

export function parseGeminiResponseText(response: unknown): string {
  const candidates = toRecord(response)?.candidates;
  const first = Array.isArray(candidates) ? toRecord(candidates[0]) : undefined;
  const parts = toRecord(first?.content)?.parts;

  if (!Array.isArray(parts)) {
    return '';
  }

  return parts
    .map(part => toRecord(part)?.text)
    .filter((text): text is string => typeof text === 'string')
    .join('')
    .trim();
}

export class GeminiProvider implements LLMProvider {
  readonly name: string;
  readonly priority: number;

  private apiKey: string | null;
  private model: string;
  private baseUrl: string;
  private fetchFn?: FetchFn;

  constructor(options: GeminiProviderOptions) {
    this.name = options.name ?? 'gemini';
    this.priority = options.priority;
    this.apiKey = options.apiKey;
    this.model = options.model ?? GEMINI_DEFAULT_MODEL;
    this.baseUrl = options.baseUrl ?? GEMINI_DEFAULT_BASE_URL;
    this.fetchFn = options.fetchFn;
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async invoke(prompt: string, context: EnsembleContext, options: InvokeOptions): Promise<string> {
    if (!this.apiKey) {
      throw new ProviderError(this.name, 'provider', `${this.name} has no API key`);
    }

    const endpoint = new URL(
      `/v1beta/models/${encodeURIComponent(this.model)}:generateContent`,
      this.baseUrl
    ).toString();

    const json = await postJson(this.name, endpoint, {
      headers: { 'x-goog-api-key': this.apiKey },
      body: mapToGeminiPayload(prompt, context),
      signal: options.signal,
      fetchFn: this.fetchFn,
    });

    const text = parseGeminiResponseText(json);
    if (!text) {
      throw new ProviderError(this.name, 'malformed', `${this.name} response contained no text parts`);
    }
    return text;
  }
}
