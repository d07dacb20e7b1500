/**
 * Secret Provider Interface
 *
 * Providers resolve logical secret names (e.g. "AAA_SIGNING_SECRET") from one
 * source each: mounted files, environment variables, a vault.
 * Providers are tried in order by SecretResolver until one returns a value.
 */

export interface ISecretProvider {
  /**
   * Attempts to resolve a logical secret name from this provider's source.
   *
   * @returns the secret, or undefined when this source does not hold it
   * @throws Error only for unexpected failures (permission denied on a vault, network errors).
   *         Do NOT throw for "secret not found" - return undefined instead
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(obj: unknown): obj is ISecretProvider {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'resolve' in obj &&
    typeof obj.resolve === 'function'
  );
}
