/**
 * Secret & key resolver
 * Asks each source in order and returns the first value found.
 */

import { SecretsSource, isValidSecretName } from './types';
import { VaultError, VaultErrorCode } from '../core/errors';

export class SecretResolver {
  private sources: SecretsSource[];

  constructor(sources: SecretsSource[]) {
    this.sources = sources;
  }

  get sourceNames(): string[] {
    return this.sources.map(s => s.name);
  }

  async resolve(name: string): Promise<string | null> {
    if (!isValidSecretName(name)) {
      throw new VaultError(VaultErrorCode.CONFIG_ERROR, `Invalid secret name "${name}"`);
    }

    for (const source of this.sources) {
      const value = await source.getSecret(name);
      if (value !== null) {
        return value;
      }
    }

    return null;
  }

  /**
   * First name (in order) that any source defines.
   */
  async resolveFirst(names: string[]): Promise<string | null> {
    for (const name of names) {
      const value = await this.resolve(name);
      if (value !== null) {
        return value;
      }
    }
    return null;
  }
}
