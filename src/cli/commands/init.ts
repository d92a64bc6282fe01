import fs from 'fs';
import path from 'path';
import { generateVaultKey } from '../../core/crypto';
import { getAuditDir, getConfigDir } from '../../config';
import { exitWithError } from '../output';

const EXAMPLE_CONFIG = `# memvault configuration
# Environment variables override every value here.

version: '0.3.0'

# Directory asset names are resolved against (MEMVAULT_ASSETS_DIR)
assetsDir: .

# Ignore plaintext files and read only *.enc (MEMVAULT_REQUIRE_ENCRYPTED)
requireEncrypted: false

ensemble:
  timeoutSeconds: 30   # per provider (ENSEMBLE_TIMEOUT_SECONDS)
  # Tried top to bottom; the first success wins.
  chain:
    - name: gemini
      backend: gemini
      keyEnv: PRIMARY_PROVIDER_KEY
    - name: mistral
      backend: mistral
      keyEnv: FALLBACK_PROVIDER_KEY
    - name: groq
      backend: groq
      keyEnv: EMERGENCY_PROVIDER_KEY
      # model: llama-3.3-70b-versatile

rateLimit:
  maxFailures: 10          # RATE_LIMIT_MAX_FAILURES
  windowSeconds: 3600      # RATE_LIMIT_WINDOW_SECONDS
  minIntervalSeconds: 0.5  # MIN_REQUEST_INTERVAL_SECONDS

# Keys and access-code hashes belong in the environment or in secrets.yaml
# beside this file:
#   VAULT_KEY: "..."
#   PRIMARY_PROVIDER_KEY: "..."
#   UNLOCK_CODE_HASHES: "<memvault hash-code output>"
`;

export async function initCommand(options: { json?: boolean } = {}): Promise<void> {
  try {
    const configDir = getConfigDir();
    const configFile = path.join(configDir, 'config.yaml');
    const logsDir = getAuditDir(configDir);

    if (!fs.existsSync(configDir)) {
      fs.mkdirSync(configDir, { mode: 0o700, recursive: true });
    }
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { mode: 0o700, recursive: true });
    }

    if (fs.existsSync(configFile)) {
      throw new Error(`Config already exists at ${configFile}`);
    }

    fs.writeFileSync(configFile, EXAMPLE_CONFIG, { mode: 0o600 });

    // Printed once, never stored by memvault
    const vaultKey = generateVaultKey();

    if (options.json) {
      console.log(JSON.stringify({ configFile, logsDir, vaultKey }, null, 2));
      return;
    }

    console.log('✅ memvault initialized');
    console.log();
    console.log(`Config file: ${configFile}`);
    console.log(`Logs directory: ${logsDir}`);
    console.log();
    console.log('Generated vault key:');
    console.log(`  ${vaultKey}`);
    console.log();
    console.log('Next steps:');
    console.log(`  1. Add it to your environment: VAULT_KEY='${vaultKey}'`);
    console.log('  2. Encrypt your assets:        memvault seal assets');
    console.log('  3. Commit the *.enc files and keep the plaintext out of git');
    console.log();
  } catch (error) {
    exitWithError(error, options.json);
  }
}
