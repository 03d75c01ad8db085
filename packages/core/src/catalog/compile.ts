import type { IndicatorDocument } from "./schema.js";
import type { Indicator } from "./types.js";

const QUOTE = `['"\`]`;
const STRING_PREFIX = "(?:[rbuf]{1,2})?";
const TYPE_ANNOTATION = "(?::\\s*[\\w.|<>[\\] ]+?\\s*(?==))?";

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compile(source: string, flags: string, where: string, issues: string[]): RegExp | null {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    issues.push(`${where}: invalid pattern (${reason})`);
    return null;
  }
}

/**
 * Turns a validated indicator document into its matcher form. Regex errors are
 * appended to `issues` and yield null.
 */
export function compileIndicator(doc: IndicatorDocument, issues: string[]): Indicator | null {
  const base = { id: doc.id, name: doc.name, weight: doc.weight, factor: doc.factor };
  const where = `indicator ${doc.id}`;

  switch (doc.kind) {
    case "keyword": {
      const alternation = doc.words.map(escapeRegex).join("|");
      const regex = compile(`\\b(?:${alternation})\\b`, doc.case_sensitive ? "" : "i", where, issues);
      return regex ? { ...base, kind: "keyword", regex } : null;
    }
    case "pattern": {
      const regex = compile(doc.pattern, doc.ignore_case ? "i" : "", where, issues);
      return regex ? { ...base, kind: "pattern", regex } : null;
    }
    case "assignment": {
      // Quoted keys cover dict/object literals: 'password': 'x'. An optional
      // annotation covers `password: str = ...` and `password: string = ...`.
      const target = `(?:^|[^\\w])${QUOTE}?(?:${doc.target})${QUOTE}?\\s*${TYPE_ANNOTATION}[:=]\\s*`;
      const inline = compile(`${target}${STRING_PREFIX}${QUOTE}`, "i", where, issues);
      const wrapped = compile(`${target}[(\\[\\\\]?\\s*$`, "i", where, issues);
      return inline && wrapped ? { ...base, kind: "assignment", inline, wrapped } : null;
    }
    case "cooccurrence": {
      const first = compile(doc.first, "", where, issues);
      const second = compile(doc.second, "i", where, issues);
      return first && second
        ? { ...base, kind: "cooccurrence", first, second, window: doc.window }
        : null;
    }
    case "unguarded": {
      const regex = compile(doc.pattern, "", where, issues);
      const absent = compile(doc.absent, "", where, issues);
      return regex && absent
        ? { ...base, kind: "unguarded", regex, absent, within: doc.within }
        : null;
    }
  }
}

/** Matches a line that opens with a string literal, e.g. the second half of a wrapped assignment. */
export const LEADING_STRING_LITERAL = new RegExp(`^\\s*${STRING_PREFIX}${QUOTE}`, "i");
