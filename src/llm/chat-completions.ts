/**
 * OpenAI-compatible chat-completions backend.
 * Serves both Mistral and Groq, which speak the same wire format.
 */

import { EnsembleContext, InvokeOptions, LLMProvider, ProviderError } from './types';
import { FetchFn, postJson, toRecord } from './http';

export interface ChatCompletionsProviderOptions {
  name: string;
  priority: number;
  apiKey: string | null;
  model: string;
  /** API root without the /chat/completions suffix */
  baseUrl: string;
  fetchFn?: FetchFn;
}

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

interface ChatCompletionsPayload {
  model: string;
  messages: ChatMessage[];
  response_format?: { type: 'json_object' };
}

export function mapToChatCompletionsPayload(
  model: string,
  prompt: string,
  context: EnsembleContext
): ChatCompletionsPayload {
  const messages: ChatMessage[] = [];
  if (context.systemInstruction) {
    messages.push({ role: 'system', content: context.systemInstruction });
  }
  messages.push({ role: 'user', content: prompt });

  const payload: ChatCompletionsPayload = { model, messages };
  if (context.responseFormat === 'json') {
    payload.response_format = { type: 'json_object' };
  }
  return payload;
}

export function parseChatCompletionsText(response: unknown): string {
  const choices = toRecord(response)?.choices;
  const first = Array.isArray(choices) ? toRecord(choices[0]) : undefined;
  const content = toRecord(first?.message)?.content;
  return typeof content === 'string' ? content.trim() : '';
}

export class ChatCompletionsProvider implements LLMProvider {
  readonly name: string;
  readonly priority: number;

  private apiKey: string | null;
  private model: string;
  private endpoint: string;
  private fetchFn?: FetchFn;

  constructor(options: ChatCompletionsProviderOptions) {
    this.name = options.name;
    this.priority = options.priority;
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    this.fetchFn = options.fetchFn;
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async invoke(prompt: string, context: EnsembleContext, options: InvokeOptions): Promise<string> {
    if (!this.apiKey) {
      throw new ProviderError(this.name, 'provider', `${this.name} has no API key`);
    }

    const json = await postJson(this.name, this.endpoint, {
      headers: { authorization: `Bearer ${this.apiKey}` },
      body: mapToChatCompletionsPayload(this.model, prompt, context),
      signal: options.signal,
      fetchFn: this.fetchFn,
    });

    const text = parseChatCompletionsText(json);
    if (!text) {
      throw new ProviderError(this.name, 'malformed', `${this.name} response contained no message content`);
    }
    return text;
  }
}
