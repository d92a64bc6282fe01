import { loadConfig, getLedgerFile } from '../config';
import { createMemvault, Memvault } from '../memvault';

/**
 * Build the vault for a CLI invocation. Guard ledgers go to
 * <home>/ledger.json so lockouts outlive the process.
 */
export async function openVault(): Promise<Memvault> {
  const config = await loadConfig();
  return createMemvault(config, { ledgerFile: getLedgerFile(config.home) });
}
