import { openVault } from '../context';
import { exitWithError, formatDuration } from '../output';
import type { GuardedAction } from '../../memvault';

export async function statusCommand(options: { json?: boolean } = {}): Promise<void> {
  try {
    const vault = await openVault();
    const { config } = vault;

    const providers = config.providers.map(p => ({
      name: p.name,
      priority: p.priority,
      backend: p.backend,
      model: p.model,
      available: p.apiKey !== null,
    }));
    const actions: GuardedAction[] = ['unlock', 'query', 'asset'];
    const guards = actions.map(action => vault.guards[action].status());

    if (options.json) {
      console.log(JSON.stringify({
        assetsDir: config.assetsDir,
        requireEncrypted: config.requireEncrypted,
        vaultKeyConfigured: config.vaultKey !== null,
        accessCodesConfigured: config.unlockCodeHashes.length,
        providers,
        guards,
      }, null, 2));
      return;
    }

    console.log('');
    console.log(`Assets:     ${config.assetsDir}`);
    console.log(`Precedence: ${config.requireEncrypted ? 'encrypted only' : 'plaintext, then encrypted'}`);
    console.log(`Vault key:  ${config.vaultKey ? 'configured' : 'not configured'}`);
    console.log(`Access codes: ${config.unlockCodeHashes.length}`);
    console.log('');
    console.log('Provider chain:');
    for (const p of providers) {
      const model = p.model ? ` ${p.model}` : '';
      console.log(`  ${p.priority}. ${p.name.padEnd(12)} ${p.backend}${model} ${p.available ? '✅' : '⏭  skipped (no key)'}`);
    }
    console.log('');
    console.log('Guards:');
    for (const g of guards) {
      const wait = g.retryAfterSeconds > 0 ? ` (${formatDuration(g.retryAfterSeconds)})` : '';
      console.log(`  ${g.action.padEnd(8)} ${g.state}${wait}, ${g.remainingAttempts} attempt(s) left`);
    }
    console.log('');
  } catch (error) {
    exitWithError(error, options.json);
  }
}
