/**
 * LLM provider contract
 *
 * Every backend in the ensemble implements LLMProvider. A provider either
 * returns text or throws; ProviderError lets it say what kind of failure
 * occurred.
 */

export type ResponseFormat = 'text' | 'json';

/** Structured context sent alongside the prompt */
export interface EnsembleContext {
  systemInstruction?: string;
  responseFormat?: ResponseFormat;
}

export interface InvokeOptions {
  /** Aborted when the ensemble gives up on this call; carries the deadline */
  signal: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  /** Lower runs first; unique within an ensemble */
  readonly priority: number;
  /** False when the provider is unconfigured (e.g. no credential) */
  isAvailable(): boolean;
  invoke(prompt: string, context: EnsembleContext, options: InvokeOptions): Promise<string>;
}

export type ProviderErrorKind = 'timeout' | 'transport' | 'provider' | 'malformed';

export class ProviderError extends Error {
  readonly provider: string;
  readonly kind: ProviderErrorKind;
  readonly status?: number;

  constructor(
    provider: string,
    kind: ProviderErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ProviderError';
    this.provider = provider;
    this.kind = kind;
    this.status = options?.status;
  }
}
