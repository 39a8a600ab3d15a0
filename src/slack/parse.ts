import type { ReplacementRule, ScopeEntry } from "../core/types.js";

export type SweepRequest = {
  rules: ReplacementRule[];
  /** Empty when the request names no scope; the settings file decides then. */
  scope: ScopeEntry[];
};

const CLAUSE = /replace\s+"([^"]*)"\s+with\s+"([^"]*)"/gi;
const SCOPE = /^[\s,;]*(?:in|across)\s+(.+)$/is;

/** Slack escapes these three characters in message text. */
function unescapeSlack(text: string): string {
  return text.replace(/&lt;/g, "<").replace(/&gt;/g, ">").replace(/&amp;/g, "&");
}

function normalizeQuotes(text: string): string {
  return text.replace(/[“”„‟″]/g, '"');
}

export function stripMentions(text: string): string {
  return text.replace(/<@[^>]+>/g, "").trim();
}

function parseScope(text: string): ScopeEntry[] {
  return text
    .split(/[,\n]|\s+and\s+/)
    .map((part) => part.trim().replace(/[.]+$/, ""))
    .filter(Boolean)
    .map((part) => {
      const slash = part.indexOf("/");
      if (slash === -1) return { project: part };
      const project = part.slice(0, slash).trim();
      const repository = part.slice(slash + 1).trim();
      return repository ? { project, repository } : { project };
    })
    .filter((entry) => entry.project.length > 0);
}

/**
 * Reads `replace "old" with "new" [, replace "a" with "b"] [in Project[/repo], ...]`.
 * Returns null when the text holds no replace clause. Empty search strings are
 * kept so rule validation can report them.
 */
export function parseSweepRequest(raw: string): SweepRequest | null {
  const text = normalizeQuotes(unescapeSlack(stripMentions(raw)));
  const rules: ReplacementRule[] = [];
  let end = 0;

  for (const match of text.matchAll(CLAUSE)) {
    rules.push({ search: match[1] ?? "", replace: match[2] ?? "" });
    end = (match.index ?? 0) + match[0].length;
  }
  if (rules.length === 0) return null;

  const scopeMatch = SCOPE.exec(text.slice(end));
  return { rules, scope: scopeMatch?.[1] ? parseScope(scopeMatch[1]) : [] };
}

export const USAGE = [
  "Send a request like:",
  '`replace "old-host.example.com" with "new-host.example.com" in Platform/api, Web`',
  "Several `replace` clauses can be chained; without `in ...` the configured scope is used.",
].join("\n");
