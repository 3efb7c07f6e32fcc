/**
 * Client defaults.
 * Flags override these; nothing else reads them.
 */

export const CLIENT_DEFAULTS = {
  /** Field separator for delimited output */
  separator: '\t',
  /** Bound on each HTTP request in milliseconds */
  timeoutMs: 30_000,
  /** Environment variable holding the service URL */
  urlEnv: 'GABI_URL',
  /** Environment variable holding the bearer token */
  tokenEnv: 'OCP_CONSOLE_TOKEN',
} as const;
