import fs from 'fs';
import { openVault } from '../context';
import { exitWithError } from '../output';

export async function openCommand(
  asset: string,
  options: { out?: string; tail?: string } = {}
): Promise<void> {
  try {
    const vault = await openVault();

    let output: Buffer;
    if (options.tail) {
      const maxChars = parseInt(options.tail, 10);
      if (!Number.isFinite(maxChars) || maxChars <= 0) {
        throw new Error(`--tail must be a positive integer, got "${options.tail}"`);
      }
      const text = await vault.guards.asset.run(() => vault.assets.loadTail(asset, maxChars));
      output = Buffer.from(text, 'utf8');
    } else {
      output = await vault.openAsset(asset);
    }

    if (options.out) {
      fs.writeFileSync(options.out, output, { mode: 0o600 });
      console.error(`Wrote ${output.length} bytes to ${options.out}`);
      return;
    }

    process.stdout.write(output);
  } catch (error) {
    exitWithError(error);
  }
}
