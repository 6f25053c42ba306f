export const DENIED_KEYWORDS = ["DELETE", "DROP", "UPDATE"] as const;

export type DeniedKeyword = (typeof DENIED_KEYWORDS)[number];

export type SafetyResult =
  | { allowed: true }
  | { allowed: false; keywords: DeniedKeyword[]; reason: string };

const KEYWORD_PATTERNS = DENIED_KEYWORDS.map(
  (keyword) => [keyword, new RegExp(`\\b${keyword}\\b`, "i")] as const,
);

/**
 * Check whether a statement may be executed.
 * This is NOT about SQL injection — the agent IS the user here.
 * It keeps the agent from destroying data by accident.
 *
 * Scans the entire text (not just the first token), so a denied keyword inside
 * a CTE, a subquery, a string literal or a comment blocks the statement too.
 * Over-blocking is accepted; the SQL itself is never rewritten.
 */
export function validateQuery(query: string): SafetyResult {
  const keywords: DeniedKeyword[] = [];
  for (const [keyword, re] of KEYWORD_PATTERNS) {
    if (re.test(query)) keywords.push(keyword);
  }

  if (keywords.length === 0) return { allowed: true };

  return {
    allowed: false,
    keywords,
    reason: `${keywords.join(", ")} blocked — DELETE, DROP and UPDATE operations are not allowed.`,
  };
}

/** Leading-keyword check for INSERT, which is executed without fetching rows. */
export function isInsertStatement(query: string): boolean {
  return /^INSERT\b/i.test(query.trim());
}
