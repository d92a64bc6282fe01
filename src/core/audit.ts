/**
 * Audit logging for memvault
 * Appends unlock, guard, query and asset events to daily JSONL files
 *
 * Events never carry keys, prompts, access codes or asset contents.
 */

import fs from 'fs';
import path from 'path';
import { generateToken } from './crypto';

export type AuditKind = 'unlock' | 'guard' | 'query' | 'asset';

export interface AuditTraceEntry {
  provider: string;
  outcome: string;
  latencyMs: number;
  errorKind?: string;
}

export interface AuditEvent {
  id: string;
  timestamp: string;
  kind: AuditKind;
  outcome: string;
  action?: string;
  provider?: string;
  asset?: string;
  durationMs?: number;
  trace?: AuditTraceEntry[];
}

export type AuditInput = Omit<AuditEvent, 'id' | 'timestamp'>;

/**
 * Anything that accepts audit events. The guard, gate, loader and ensemble
 * depend on this rather than on the file logger.
 */
export interface AuditSink {
  log(event: AuditInput): void;
}

export class AuditLogger implements AuditSink {
  private logDir: string;
  private currentLogFile: string;

  constructor(logDir: string) {
    this.logDir = logDir;
    this.currentLogFile = this.getLogFilePath();

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });
    }
  }

  /**
   * Get current log file path (one file per day)
   */
  private getLogFilePath(): string {
    const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    return path.join(this.logDir, `${date}.jsonl`);
  }

  log(input: AuditInput): void {
    const event: AuditEvent = {
      id: generateToken('evt', 8),
      timestamp: new Date().toISOString(),
      ...input
    };

    // Rotate when the day changes
    this.currentLogFile = this.getLogFilePath();

    fs.appendFileSync(this.currentLogFile, JSON.stringify(event) + '\n', { mode: 0o600 });
  }

  /**
   * Read recent events, newest first
   */
  async readLogs(options: {
    limit?: number;
    kind?: AuditKind;
    since?: Date;
  } = {}): Promise<AuditEvent[]> {
    const { limit = 100, kind, since } = options;

    if (!fs.existsSync(this.logDir)) {
      return [];
    }

    const files = fs.readdirSync(this.logDir)
      .filter(f => f.endsWith('.jsonl'))
      .sort()
      .reverse();

    const events: AuditEvent[] = [];

    for (const file of files) {
      const content = fs.readFileSync(path.join(this.logDir, file), 'utf8');
      const lines = content.trim().split('\n').filter(Boolean);

      for (const line of lines.reverse()) {
        const event = parseEvent(line);
        if (!event) {
          console.error(`Invalid log line in ${file}`);
          continue;
        }

        if (kind && event.kind !== kind) continue;
        if (since && new Date(event.timestamp) < since) continue;

        events.push(event);

        if (events.length >= limit) {
          return events;
        }
      }
    }

    return events;
  }

  /**
   * Follow logs in real-time (tail -f style)
   */
  async *tail(pollMs: number = 500): AsyncGenerator<AuditEvent> {
    let position = fs.existsSync(this.currentLogFile)
      ? fs.statSync(this.currentLogFile).size
      : 0;

    while (true) {
      const currentSize = fs.existsSync(this.currentLogFile)
        ? fs.statSync(this.currentLogFile).size
        : 0;

      if (currentSize > position) {
        const fd = fs.openSync(this.currentLogFile, 'r');
        const buffer = Buffer.alloc(currentSize - position);
        fs.readSync(fd, buffer, 0, buffer.length, position);
        fs.closeSync(fd);

        for (const line of buffer.toString('utf8').split('\n').filter(Boolean)) {
          const event = parseEvent(line);
          if (event) {
            yield event;
          }
        }

        position = currentSize;
      }

      const newLogFile = this.getLogFilePath();
      if (newLogFile !== this.currentLogFile) {
        this.currentLogFile = newLogFile;
        position = 0;
      }

      await new Promise(resolve => setTimeout(resolve, pollMs));
    }
  }
}

function parseEvent(line: string): AuditEvent | null {
  try {
    const parsed: unknown = JSON.parse(line);
    if (!parsed || typeof parsed !== 'object') {
      return null;
    }
    const record = parsed as Record<string, unknown>;
    if (typeof record.id !== 'string' || typeof record.timestamp !== 'string' ||
        typeof record.kind !== 'string' || typeof record.outcome !== 'string') {
      return null;
    }
    return parsed as AuditEvent;
  } catch {
    return null;
  }
}
