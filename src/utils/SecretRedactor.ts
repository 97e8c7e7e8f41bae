const MASK = "***REDACTED***";

/**
 * Masks credentials before text reaches a log line or an update comment.
 */
export class SecretRedactor {
    private static readonly TOKEN_PATTERNS: RegExp[] = [
        /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
        /Basic\s+[a-zA-Z0-9+/]{8,}=*/g,
        /(?:ghp|gho|ghu|ghs|ghr)_[a-zA-Z0-9]{36}/g,
        /AKIA[0-9A-Z]{16}/g,
        // Azure DevOps personal access tokens (52 chars, base32 alphabet)
        /\b[a-z2-7]{52}\b/g,
        /-----BEGIN [A-Z ]+ PRIVATE KEY-----/g,
    ];

    // key = value / "key": "value" for the usual credential names; the key survives.
    private static readonly ASSIGNMENT_PATTERN =
        /(["']?)\b(password|pwd|secret|client_secret|access_token|api_token|auth_token|access_key|api_key|pat|token)\1\s*([:=])\s*(?:"[^"]*"|'[^']*'|[^"'\s,;]+)/gi;

    public static redact(text: string | undefined | null): string {
        if (!text) return "";

        let redacted = this.TOKEN_PATTERNS.reduce(
            (acc, pattern) => acc.replace(pattern, MASK),
            text
        );

        redacted = redacted.replace(
            this.ASSIGNMENT_PATTERN,
            (_match: string, quote: string, key: string, separator: string) =>
                separator === ":"
                    ? `${quote}${key}${quote}: ${MASK}`
                    : `${quote}${key}${quote}=${MASK}`
        );

        return redacted;
    }

    /** Shows just enough of a token to tell which one is configured. */
    public static mask(token: string): string {
        if (token.length <= 14) return "*".repeat(token.length);
        return `${token.slice(0, 4)}...${token.slice(-4)} (length: ${token.length})`;
    }
}
