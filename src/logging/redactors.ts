/**
 * Secret Redaction Configuration
 *
 * Path-based redaction covers known locations in log objects;
 * `redactSecrets` masks keys quoted inside provider messages.
 *
 * @module logging/redactors
 */

/**
 * Paths redacted from every log object (Pino redaction path syntax)
 */
export const REDACT_PATHS = [
  // Environment variables
  "env.OPENAI_API_KEY",
  "env.GROQ_API_KEY",
  "env.NEO4J_PASSWORD",

  // Config objects logged at startup
  "neo4j.password",
  "llm.apiKey",
  "embedding.apiKey",

  // Common secret field names
  "*.apiKey",
  "*.api_key",
  "*.password",
  "*.token",
  "*.secret",
  "*.accessToken",
  "*.access_token",
  "*.credentials",
  "*.connectionString",

  "headers.authorization",
  "headers.Authorization",
];

/**
 * Pino redaction options
 * See: https://getpino.io/#/docs/redaction
 */
export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  // Keep the key, replace the value
  remove: false,
};

/**
 * Mask key-shaped substrings inside free text such as provider error messages
 */
export function redactSecrets(message: string): string {
  return message
    .replace(/\b(sk|gsk)[-_][A-Za-z0-9_-]{20,}/g, "$1-***REDACTED***")
    .replace(/\b[a-zA-Z0-9]{40,}\b/g, "***REDACTED***");
}
