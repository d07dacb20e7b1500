/**
 * Secret Management Module
 *
 * Resolves {"$secret": "NAME"} descriptors so that configuration files never
 * carry the signing secret itself.
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export { SecretResolver, type SecretResolverConfig } from './SecretResolver.js';

export { FileSecretProvider } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
