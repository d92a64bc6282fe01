/**
 * YAML secrets file source
 *
 * A flat mapping of NAME: value, e.g. ~/.memvault/secrets.yaml:
 *
 *   VAULT_KEY: "..."
 *   PRIMARY_PROVIDER_KEY: "..."
 *
 * A missing file is an empty source. A file that is not a mapping is a
 * configuration error.
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { SecretsSource } from './types';
import { VaultError, VaultErrorCode } from '../core/errors';

export class YamlFileSource implements SecretsSource {
  readonly name: string;
  readonly type = 'yaml-file';

  private filePath: string;
  private values: Map<string, string> | null = null;

  constructor(filePath: string, name: string = 'secrets-file') {
    this.name = name;
    this.filePath = filePath;
  }

  async getSecret(secretName: string): Promise<string | null> {
    const value = this.load().get(secretName);
    return value === undefined || value === '' ? null : value;
  }

  private load(): Map<string, string> {
    if (this.values) {
      return this.values;
    }

    const values = new Map<string, string>();

    if (fs.existsSync(this.filePath)) {
      let parsed: unknown;
      try {
        parsed = yaml.load(fs.readFileSync(this.filePath, 'utf8'));
      } catch (err) {
        throw new VaultError(
          VaultErrorCode.CONFIG_ERROR,
          `Secrets file "${this.filePath}" is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        );
      }

      if (parsed !== null && parsed !== undefined) {
        if (typeof parsed !== 'object' || Array.isArray(parsed)) {
          throw new VaultError(
            VaultErrorCode.CONFIG_ERROR,
            `Secrets file "${this.filePath}" must be a mapping of NAME: value`
          );
        }

        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === 'string' || typeof value === 'number') {
            values.set(key, String(value));
          }
        }
      }
    }

    this.values = values;
    return values;
  }
}
