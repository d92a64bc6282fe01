import { openVault } from '../context';
import { exitWithError } from '../output';
import { EnsembleExhaustedError } from '../../core/errors';
import type { AttemptRecord } from '../../core/ensemble';

export interface AskOptions {
  system?: string;
  historyAsset?: string;
  format?: string;
  timeout?: string;
  trace?: boolean;
  json?: boolean;
}

export function formatTrace(trace: AttemptRecord[]): string[] {
  return trace.map(t => {
    const icon = t.outcome === 'success' ? '✅' : t.outcome === 'failed' ? '❌' : '·';
    const detail = t.errorKind ? ` ${t.errorKind}` : '';
    const latency = t.outcome === 'success' || t.outcome === 'failed' ? ` ${t.latencyMs}ms` : '';
    return `  ${icon} ${t.provider.padEnd(12)} ${t.outcome}${detail}${latency}`;
  });
}

export async function askCommand(promptWords: string[], options: AskOptions = {}): Promise<void> {
  try {
    const prompt = promptWords.join(' ').trim();
    if (!prompt) {
      throw new Error('Prompt must not be empty');
    }
    if (options.format && options.format !== 'text' && options.format !== 'json') {
      throw new Error(`--format must be text or json, got "${options.format}"`);
    }

    const vault = await openVault();

    let systemInstruction = options.system;
    if (options.historyAsset) {
      const historyAsset = options.historyAsset;
      const history = await vault.guards.asset.run(() => vault.assets.loadTail(historyAsset));
      systemInstruction = [systemInstruction, 'Conversation history:', history]
        .filter(Boolean)
        .join('\n\n');
    }

    let timeoutMs: number | undefined;
    if (options.timeout) {
      const seconds = Number(options.timeout);
      if (!Number.isFinite(seconds) || seconds <= 0) {
        throw new Error(`--timeout must be a positive number of seconds, got "${options.timeout}"`);
      }
      timeoutMs = Math.round(seconds * 1000);
    }

    const result = await vault.ask({
      prompt,
      context: {
        systemInstruction,
        responseFormat: options.format === 'json' ? 'json' : 'text',
      },
      timeoutMs,
    });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    console.log(result.text);
    console.log();
    console.log(`Thought from: ${result.provider}`);
    if (options.trace) {
      formatTrace(result.trace).forEach(line => console.log(line));
    }
  } catch (error) {
    if (error instanceof EnsembleExhaustedError && !options.json) {
      console.error('❌ All providers were skipped or failed:');
      formatTrace(error.trace).forEach(line => console.error(line));
      process.exit(1);
    }
    exitWithError(error, options.json);
  }
}
