import path from 'path';
import { loadConfig } from '../../config';
import { sealAssets } from '../../core/seal';
import { exitWithError } from '../output';

export async function sealCommand(
  dir: string | undefined,
  options: { ext?: string[]; json?: boolean } = {}
): Promise<void> {
  try {
    const config = await loadConfig();
    if (!config.vaultKey) {
      throw new Error('VAULT_KEY is not configured. Run `memvault keygen` and export it first.');
    }

    const root = dir ? path.resolve(dir) : config.assetsDir;
    const extensions = options.ext?.map(e => (e.startsWith('.') ? e : `.${e}`));
    const result = sealAssets({ root, key: config.vaultKey, extensions });

    if (options.json) {
      console.log(JSON.stringify({ root, ...result }, null, 2));
    } else {
      console.log(`Found ${result.sealed.length + result.failed.length} files to encrypt in ${root}`);
      for (const file of result.sealed) {
        console.log(`  🔒 ${file} -> ${file}.enc`);
      }
      for (const { file, error } of result.failed) {
        console.error(`  ❌ ${file}: ${error}`);
      }
      console.log();
      if (result.sealed.length > 0) {
        console.log('Commit the .enc files; keep the plaintext out of git.');
      }
    }

    if (result.failed.length > 0) {
      process.exit(1);
    }
  } catch (error) {
    exitWithError(error, options.json);
  }
}
