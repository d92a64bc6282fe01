import { hashAccessCode, normalizeAccessCode } from '../../core/unlock';
import { exitWithError } from '../output';

export async function hashCodeCommand(code: string, options: { json?: boolean } = {}): Promise<void> {
  try {
    if (!normalizeAccessCode(code)) {
      throw new Error('Access code must not be empty');
    }

    const hash = hashAccessCode(code);
    if (options.json) {
      console.log(JSON.stringify({ hash }, null, 2));
      return;
    }

    console.log(hash);
    console.log();
    console.log('Add it to UNLOCK_CODE_HASHES (comma-separated for several codes).');
  } catch (error) {
    exitWithError(error, options.json);
  }
}
