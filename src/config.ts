function intEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

const cliArgs = process.argv.slice(2);

export const config = {
  // Tunables
  MAX_RESULTS: intEnv('MAX_RESULTS', 5),
  REQUEST_TIMEOUT_MS: intEnv('REQUEST_TIMEOUT_MS', 30_000),
  DEBUG_HTML_PATH: process.env.DEBUG_HTML_PATH || 'ebay_debug.html',

  // Hardcoded settings
  DEFAULT_QUERIES: ['iphone 12', 'jordan 1', 'pokemon etb'],

  // CLI flags
  SAVE_DEBUG_HTML:
    process.env.SAVE_DEBUG_HTML === 'true' || cliArgs.includes('--debug'),
  CLI_QUERIES: cliArgs.filter((arg) => !arg.startsWith('--')),
} as const;
