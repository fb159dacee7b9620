export const REDACTED = "***REDACTED***";

export interface RedactionResult {
  text: string;
  masked_count: number;
  masked_chars: number;
  kinds: Record<SecretKind, number>;
}

export type SecretKind = "key_value" | "aws_access_key" | "private_key" | "jwt";

// Assignments such as `API_KEY=...`, `export GITHUB_TOKEN=...` or `db_password: ...`
const KEY_VALUE_REGEX = /\b([A-Z0-9_]*(?:API_KEY|TOKEN|SECRET|PASSWORD|ACCESS_KEY))(\s*[=:]\s*)(["']?)[^\s"']+\3/gi;
const AWS_KEY_REGEX = /\b(?:AKIA|ASIA)[0-9A-Z]{16}\b/g;
const PRIVATE_KEY_REGEX = /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g;
const JWT_REGEX = /\beyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g;

/**
 * Mask credentials in free text (typically a diff) before it leaves the machine.
 * Key/value assignments keep their key and separator so the diff stays readable.
 */
export function redactText(input: string): RedactionResult {
  let text = input;
  let masked_count = 0;
  let masked_chars = 0;
  const kinds: Record<SecretKind, number> = {
    key_value: 0,
    aws_access_key: 0,
    private_key: 0,
    jwt: 0
  };

  const record = (kind: SecretKind, match: string) => {
    masked_count += 1;
    masked_chars += match.length;
    kinds[kind] += 1;
  };

  // Private keys first: their bodies can contain substrings the other patterns would split.
  text = text.replace(PRIVATE_KEY_REGEX, (match) => {
    record("private_key", match);
    return REDACTED;
  });

  text = text.replace(KEY_VALUE_REGEX, (match: string, key: string, separator: string, quote: string) => {
    record("key_value", match);
    return `${key}${separator}${quote}${REDACTED}${quote}`;
  });

  text = text.replace(AWS_KEY_REGEX, (match) => {
    record("aws_access_key", match);
    return REDACTED;
  });

  text = text.replace(JWT_REGEX, (match) => {
    record("jwt", match);
    return REDACTED;
  });

  return { text, masked_count, masked_chars, kinds };
}
