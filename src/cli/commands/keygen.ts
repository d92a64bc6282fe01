import { generateVaultKey } from '../../core/crypto';

export async function keygenCommand(options: { json?: boolean } = {}): Promise<void> {
  const vaultKey = generateVaultKey();
  if (options.json) {
    console.log(JSON.stringify({ vaultKey }, null, 2));
  } else {
    console.log(vaultKey);
  }
}
