import { password } from '@inquirer/prompts';
import { openVault } from '../context';
import { exitWithError, formatDuration } from '../output';
import { GuardRejectionError } from '../../core/errors';

export async function unlockCommand(options: { code?: string; json?: boolean } = {}): Promise<void> {
  try {
    const vault = await openVault();

    if (!vault.gate.configured) {
      throw new Error('No access codes configured. Set UNLOCK_CODE_HASHES (see `memvault hash-code`).');
    }

    const code = options.code ?? await password({ message: 'Access key', mask: '*' });
    const granted = await vault.unlock(code);
    const status = vault.guards.unlock.status();

    if (options.json) {
      console.log(JSON.stringify({ granted, remainingAttempts: status.remainingAttempts }, null, 2));
    } else if (granted) {
      console.log('🔓 Access granted.');
    } else {
      console.error(`🔒 Access denied. ${status.remainingAttempts} attempt(s) left this window.`);
    }

    if (!granted) {
      process.exit(1);
    }
  } catch (error) {
    if (error instanceof GuardRejectionError && !options.json) {
      console.error(`⛔ ${error.message} (retry in ${formatDuration(error.retryAfterSeconds)})`);
      process.exit(1);
    }
    exitWithError(error, options.json);
  }
}
