/**
 * Secret source contract
 *
 * A source answers "what is the value of NAME?" and nothing else:
 * no caching, no validation of what the value means.
 */

export interface SecretsSource {
  /** Human-readable source name (e.g. "secrets-file") */
  readonly name: string;

  /** Source type identifier (e.g. "env", "yaml-file") */
  readonly type: string;

  /**
   * Look a secret up by name.
   * @returns The value, or null when the source does not define it
   */
  getSecret(name: string): Promise<string | null>;
}

/** Valid secret name: environment-variable style */
const SECRET_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,127}$/;

export function isValidSecretName(name: string): boolean {
  return SECRET_NAME_PATTERN.test(name);
}
