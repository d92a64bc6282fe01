/**
 * LLM backends
 *
 * Built-in backends:
 *   - gemini:  Google Generative Language API
 *   - mistral: Mistral chat completions
 *   - groq:    Groq (OpenAI-compatible) chat completions
 *
 * Usage:
 *   const providers = buildProviders([
 *     { name: 'primary', priority: 1, backend: 'gemini', apiKey: '...' },
 *     { name: 'fallback', priority: 2, backend: 'mistral', apiKey: null },
 *   ]);
 */

import { LLMProvider } from './types';
import { FetchFn } from './http';
import { GeminiProvider, GEMINI_DEFAULT_BASE_URL, GEMINI_DEFAULT_MODEL } from './gemini';
import { ChatCompletionsProvider } from './chat-completions';

export type BackendType = 'gemini' | 'mistral' | 'groq';

export interface BackendDefaults {
  model: string;
  baseUrl: string;
  /** Vendor's own environment variable for its key */
  keyEnv: string;
}

export const BACKENDS: Record<BackendType, BackendDefaults> = {
  gemini: {
    model: GEMINI_DEFAULT_MODEL,
    baseUrl: GEMINI_DEFAULT_BASE_URL,
    keyEnv: 'GOOGLE_API_KEY',
  },
  mistral: {
    model: 'mistral-large-latest',
    baseUrl: 'https://api.mistral.ai/v1',
    keyEnv: 'MISTRAL_API_KEY',
  },
  groq: {
    model: 'llama-3.3-70b-versatile',
    baseUrl: 'https://api.groq.com/openai/v1',
    keyEnv: 'GROQ_API_KEY',
  },
};

export function isBackendType(value: string): value is BackendType {
  return Object.prototype.hasOwnProperty.call(BACKENDS, value);
}

/**
 * One configured position in the failover chain.
 */
export interface ProviderSlot {
  name: string;
  priority: number;
  backend: BackendType;
  apiKey: string | null;
  model?: string;
  baseUrl?: string;
}

export function createProvider(slot: ProviderSlot, fetchFn?: FetchFn): LLMProvider {
  const defaults = BACKENDS[slot.backend];
  const model = slot.model ?? defaults.model;
  const baseUrl = slot.baseUrl ?? defaults.baseUrl;

  if (slot.backend === 'gemini') {
    return new GeminiProvider({
      name: slot.name,
      priority: slot.priority,
      apiKey: slot.apiKey,
      model,
      baseUrl,
      fetchFn,
    });
  }

  return new ChatCompletionsProvider({
    name: slot.name,
    priority: slot.priority,
    apiKey: slot.apiKey,
    model,
    baseUrl,
    fetchFn,
  });
}

export function buildProviders(slots: ProviderSlot[], fetchFn?: FetchFn): LLMProvider[] {
  return slots.map(slot => createProvider(slot, fetchFn));
}

export type {
  LLMProvider,
  EnsembleContext,
  InvokeOptions,
  ResponseFormat,
  ProviderErrorKind,
} from './types';
export { ProviderError } from './types';
export { GeminiProvider } from './gemini';
export { ChatCompletionsProvider } from './chat-completions';
