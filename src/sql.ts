import { InvalidIdentifierError } from "./errors.js";

const IDENTIFIER_RE = /^[A-Za-z0-9_]+$/;

/**
 * Table names are spliced into statement text, so only plain identifiers are
 * accepted and they are always double-quoted.
 */
export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER_RE.test(name)) throw new InvalidIdentifierError(name);
  return `"${name}"`;
}

/** Double-quotes a name the engine handed back to us (column names may contain anything). */
export function escapeIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Single-quoted SQL string literal. */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
