#!/usr/bin/env node

/**
 * memvault CLI
 * Encrypted memory archive with a failover LLM ensemble
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { initCommand } from './commands/init';
import { keygenCommand } from './commands/keygen';
import { sealCommand } from './commands/seal';
import { openCommand } from './commands/open';
import { askCommand } from './commands/ask';
import { unlockCommand } from './commands/unlock';
import { hashCodeCommand } from './commands/hash-code';
import { statusCommand } from './commands/status';
import { logsCommand } from './commands/logs';

// Read version from package.json
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
const version = packageJson.version || '0.0.0';

const program = new Command();

program
  .name('memvault')
  .description('Encrypted memory archive with a failover LLM ensemble')
  .version(version);

program
  .command('init')
  .description('Create ~/.memvault with an example config and print a new vault key')
  .option('--json', 'Output as JSON')
  .action(initCommand);

program
  .command('keygen')
  .description('Print a new random vault key')
  .option('--json', 'Output as JSON')
  .action(keygenCommand);

program
  .command('seal [dir]')
  .description('Encrypt private assets to *.enc (default: the assets directory)')
  .option('-e, --ext <extension...>', 'File extensions to seal (e.g. .json .txt)')
  .option('--json', 'Output as JSON')
  .action(sealCommand);

program
  .command('open <asset>')
  .description('Load an asset (plaintext or decrypted) to stdout or a file')
  .option('-o, --out <file>', 'Write to a file instead of stdout')
  .option('-t, --tail <chars>', 'Only the last <chars> characters of a text asset')
  .action(openCommand);

program
  .command('ask <prompt...>')
  .description('Query the provider chain; the first provider to answer wins')
  .option('-s, --system <text>', 'System instruction')
  .option('--history-asset <asset>', 'Append the tail of a chat-log asset to the system instruction')
  .option('-f, --format <format>', 'Response format (text|json)', 'text')
  .option('--timeout <seconds>', 'Per-provider timeout')
  .option('--trace', 'Show the attempt trace')
  .option('--json', 'Output as JSON')
  .action(askCommand);

program
  .command('unlock')
  .description('Check an access code (rate limited)')
  .option('-c, --code <code>', 'Access code (prompted when omitted)')
  .option('--json', 'Output as JSON')
  .action(unlockCommand);

program
  .command('hash-code <code>')
  .description('Print the UNLOCK_CODE_HASHES entry for an access code')
  .option('--json', 'Output as JSON')
  .action(hashCodeCommand);

program
  .command('status')
  .description('Show provider availability, vault key and guard states')
  .option('--json', 'Output as JSON')
  .action(statusCommand);

program
  .command('logs')
  .description('View audit logs')
  .option('-f, --follow', 'Follow logs in real-time')
  .option('-n, --lines <count>', 'Number of recent events to show', '20')
  .option('-k, --kind <kind>', 'Filter by kind (unlock|guard|query|asset)')
  .option('--json', 'Output as JSON (not supported with --follow)')
  .action(logsCommand);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
