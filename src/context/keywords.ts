/**
 * Keyword overlap used to rank older turns for deep-history requests.
 * Keyword = lowercase token of [a-z0-9_] with at least 4 chars, not a stopword.
 */

import stopwordList from "./stopwords.json";

const STOP_WORDS: ReadonlySet<string> = new Set(stopwordList);
const TOKEN_RE = /[a-z0-9_]{4,}/g;

export function extractKeywords(text: string): Set<string> {
  const out = new Set<string>();
  for (const token of text.toLowerCase().match(TOKEN_RE) ?? []) {
    if (!STOP_WORDS.has(token)) out.add(token);
  }
  return out;
}

/** Size of the intersection between the content's keywords and the query keywords. */
export function keywordScore(content: string, query: ReadonlySet<string>): number {
  if (query.size === 0) return 0;
  let score = 0;
  for (const k of extractKeywords(content)) {
    if (query.has(k)) score++;
  }
  return score;
}

const DEEP_HISTORY_PHRASES = [
  "earlier",
  "remember",
  "recall",
  "what did i say",
  "what i said",
  "did i tell you",
  "i told you",
  "you said",
  "i said",
  "last time",
  "previously",
  "back then",
  "we talked about",
  "we discussed",
  "forgot",
];

const DEEP_HISTORY_RE = new RegExp(`\\b(?:${DEEP_HISTORY_PHRASES.map((p) => p.replace(/ /g, "\\s+")).join("|")})\\b`);

/** True when the message asks about something said in the past. */
export function isDeepHistoryRequest(text: string): boolean {
  return DEEP_HISTORY_RE.test(text.toLowerCase().replace(/[‘’]/g, "'"));
}
