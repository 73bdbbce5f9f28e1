// Telegram bot tokens: <bot id>:<35 chars>
const BOT_TOKEN_RE = /(?<!\d)\d{6,12}:[A-Za-z0-9_-]{30,}\b/g;
// OpenAI-style secret keys (sk-..., xai-..., ghp_...)
const API_KEY_RE = /\b(?:sk|xai)-[A-Za-z0-9_-]{16,}\b|\bgh[pousr]_[A-Za-z0-9]{20,}\b/g;

export function redactSecrets(text: string): string {
  return text.replace(BOT_TOKEN_RE, '[REDACTED_TOKEN]').replace(API_KEY_RE, '[REDACTED_KEY]');
}

/**
 * Reduce an unknown thrown value to a single log-safe line.
 */
export function sanitizeError(error: unknown): string {
  if (error instanceof Error) {
    return redactSecrets(`${error.name}: ${error.message}`);
  }
  return redactSecrets(String(error));
}
