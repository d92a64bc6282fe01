/**
 * LLM ensemble
 *
 * Tries providers in ascending priority and returns the first success.
 * Single pass: no retries, no backoff, no fan-out. Later providers are
 * never invoked once one succeeds.
 */

import { EnsembleExhaustedError, VaultError, VaultErrorCode } from './errors';
import {
  EnsembleContext,
  LLMProvider,
  ProviderError,
  ProviderErrorKind,
} from '../llm/types';
import type { AuditSink } from './audit';

export type AttemptOutcome = 'success' | 'failed' | 'skipped' | 'not_attempted';

export interface AttemptRecord {
  provider: string;
  outcome: AttemptOutcome;
  latencyMs: number;
  errorKind?: ProviderErrorKind;
  error?: string;
}

export interface EnsembleRequest {
  prompt: string;
  context?: EnsembleContext;
  /** Per-provider timeout; defaults to the ensemble's */
  timeoutMs?: number;
}

export interface EnsembleResult {
  provider: string;
  text: string;
  /** One entry per configured provider, in priority order */
  trace: AttemptRecord[];
}

export interface EnsembleOptions {
  timeoutMs?: number;
  now?: () => number;
  audit?: AuditSink;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

export class LLMEnsemble {
  private providers: LLMProvider[];
  private timeoutMs: number;
  private now: () => number;
  private audit?: AuditSink;

  constructor(providers: LLMProvider[], options: EnsembleOptions = {}) {
    const seen = new Map<number, string>();
    for (const provider of providers) {
      const clash = seen.get(provider.priority);
      if (clash !== undefined) {
        throw new VaultError(
          VaultErrorCode.CONFIG_ERROR,
          `Providers "${clash}" and "${provider.name}" share priority ${provider.priority}`
        );
      }
      seen.set(provider.priority, provider.name);
    }

    this.providers = [...providers].sort((a, b) => a.priority - b.priority);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.audit = options.audit;
  }

  /** Provider names in the order they are tried */
  get chain(): string[] {
    return this.providers.map(p => p.name);
  }

  /**
   * @throws EnsembleExhaustedError when every provider is skipped or fails
   */
  async query(request: EnsembleRequest): Promise<EnsembleResult> {
    const context = request.context ?? {};
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const trace: AttemptRecord[] = [];
    const started = this.now();

    for (const [index, provider] of this.providers.entries()) {
      if (!provider.isAvailable()) {
        trace.push({ provider: provider.name, outcome: 'skipped', latencyMs: 0 });
        continue;
      }

      const attemptStart = this.now();
      try {
        const text = await this.invoke(provider, request.prompt, context, timeoutMs);
        trace.push({ provider: provider.name, outcome: 'success', latencyMs: this.now() - attemptStart });

        for (const rest of this.providers.slice(index + 1)) {
          trace.push({ provider: rest.name, outcome: 'not_attempted', latencyMs: 0 });
        }

        this.record('success', provider.name, started, trace);
        return { provider: provider.name, text, trace };
      } catch (err) {
        trace.push({
          provider: provider.name,
          outcome: 'failed',
          latencyMs: this.now() - attemptStart,
          errorKind: classifyError(err),
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    this.record('exhausted', undefined, started, trace);
    throw new EnsembleExhaustedError(trace);
  }

  private async invoke(
    provider: LLMProvider,
    prompt: string,
    context: EnsembleContext,
    timeoutMs: number
  ): Promise<string> {
    const controller = new AbortController();
    const call = provider.invoke(prompt, context, { signal: controller.signal });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProviderError(provider.name, 'timeout', `Timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    let text: string;
    try {
      text = await Promise.race([call, deadline]);
    } finally {
      clearTimeout(timer);
      if (controller.signal.aborted) {
        // Late result of an abandoned call is discarded
        call.catch(() => undefined);
      }
    }

    return validateResponse(provider.name, text, context);
  }

  private record(
    outcome: 'success' | 'exhausted',
    provider: string | undefined,
    started: number,
    trace: AttemptRecord[]
  ): void {
    this.audit?.log({
      kind: 'query',
      outcome,
      provider,
      durationMs: this.now() - started,
      trace: trace.map(({ provider: name, outcome: result, latencyMs, errorKind }) => ({
        provider: name,
        outcome: result,
        latencyMs,
        errorKind,
      })),
    });
  }
}

function validateResponse(provider: string, text: unknown, context: EnsembleContext): string {
  if (typeof text !== 'string' || text.trim().length === 0) {
    throw new ProviderError(provider, 'malformed', 'Provider returned an empty response');
  }

  if (context.responseFormat === 'json') {
    try {
      JSON.parse(text);
    } catch {
      throw new ProviderError(provider, 'malformed', 'Provider returned invalid JSON');
    }
  }

  return text;
}

function classifyError(err: unknown): ProviderErrorKind {
  if (err instanceof ProviderError) {
    return err.kind;
  }
  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return 'timeout';
  }
  // fetch() reports network failures as TypeError
  if (err instanceof TypeError) {
    return 'transport';
  }
  return 'provider';
}
