/**
 * Secret & key resolution
 *
 * Built-in sources:
 *   - yaml-file: flat NAME: value mapping (checked first)
 *   - env:       environment variables
 */

export { SecretResolver } from './resolver';
export { EnvSource } from './env';
export { YamlFileSource } from './file';
export { isValidSecretName } from './types';
export type { SecretsSource } from './types';
