import { AuditEvent, AuditKind, AuditLogger } from '../../core/audit';
import { getAuditDir, getConfigDir } from '../../config';
import { exitWithError } from '../output';

const KINDS: AuditKind[] = ['unlock', 'guard', 'query', 'asset'];

function isAuditKind(value: string): value is AuditKind {
  return KINDS.some(kind => kind === value);
}

export function formatEvent(event: AuditEvent, timestamp: string): string {
  const subject = event.asset ?? event.provider ?? event.action ?? '';
  const failed = ['denied', 'too_fast', 'rate_limited', 'exhausted', 'not_found', 'missing_key', 'auth_failed']
    .includes(event.outcome);
  const color = failed ? '\x1b[31m' : '\x1b[32m';
  const reset = '\x1b[0m';
  const duration = event.durationMs !== undefined ? ` ${event.durationMs}ms` : '';
  return `${timestamp} ${event.kind.padEnd(6)} ${subject} ${color}${event.outcome}${reset}${duration}`;
}

export async function logsCommand(options: {
  follow?: boolean;
  lines?: string;
  kind?: string;
  json?: boolean;
}): Promise<void> {
  try {
    if (options.kind && !isAuditKind(options.kind)) {
      throw new Error(`--kind must be one of ${KINDS.join(', ')}`);
    }
    const kind = options.kind && isAuditKind(options.kind) ? options.kind : undefined;
    const auditLogger = new AuditLogger(getAuditDir(getConfigDir()));

    if (options.follow) {
      if (options.json) {
        throw new Error('--json not supported with --follow');
      }

      console.log('Following logs (Ctrl+C to stop)...\n');

      for await (const event of auditLogger.tail()) {
        if (kind && event.kind !== kind) continue;
        console.log(formatEvent(event, new Date(event.timestamp).toLocaleTimeString()));
      }
      return;
    }

    const limit = parseInt(options.lines || '20', 10);
    const events = (await auditLogger.readLogs({ limit, kind })).reverse();

    if (options.json) {
      console.log(JSON.stringify({ logs: events }, null, 2));
      return;
    }

    if (events.length === 0) {
      console.log('No logs found.');
      return;
    }

    console.log('');
    console.log(`Recent activity (last ${events.length} events):`);
    console.log('');
    events.forEach(event => {
      console.log(formatEvent(event, new Date(event.timestamp).toLocaleString()));
    });
    console.log('');
  } catch (error) {
    exitWithError(error, options.json);
  }
}
