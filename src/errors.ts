/** Exit code for missing prerequisites (gh CLI, gh auth) */
export const EXIT_PREREQ = 1;

/** Exit code for an unreadable or invalid configuration file */
export const EXIT_CONFIG = 2;

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token patterns with [REDACTED].
 * Applied to every error message before it is logged.
 */
export function scrubSecrets(text: string): string {
  return text
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Bearer/token auth headers
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._\-]+/gi, '$1 [REDACTED]')
    // URL-embedded credentials
    .replace(/https?:\/\/[^@\s]+@/g, 'https://[REDACTED]@');
}

/**
 * Extract a safe error message from an unknown error value.
 * Converts to string, then scrubs any embedded secrets.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}

/** Raised when the configuration file cannot be read or fails validation */
export class ConfigError extends Error {
  constructor(message: string, readonly path: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
