/**
 * Environment variable secrets source
 *
 * Reads secrets from process.env (or an injected map) at lookup time.
 * Empty strings count as unset.
 */

import { SecretsSource } from './types';

export interface EnvSourceOptions {
  /** Optional prefix added to all lookups (e.g. "MEMVAULT_" makes "FOO" read "MEMVAULT_FOO") */
  prefix?: string;
  env?: NodeJS.ProcessEnv;
}

export class EnvSource implements SecretsSource {
  readonly name: string;
  readonly type = 'env';

  private prefix: string;
  private env: NodeJS.ProcessEnv;

  constructor(name: string = 'env', options: EnvSourceOptions = {}) {
    this.name = name;
    this.prefix = options.prefix || '';
    this.env = options.env ?? process.env;
  }

  async getSecret(varName: string): Promise<string | null> {
    const value = this.env[this.prefix + varName];
    return value === undefined || value === '' ? null : value;
  }
}
