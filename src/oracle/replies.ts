// ---------------------------------------------------------------------------
// Oracle reply parsing
// ---------------------------------------------------------------------------
// Replies are free text. These helpers pull the structured part out of them:
// a URL, a list of library names, or program source.
// ---------------------------------------------------------------------------

const URL_PATTERN = /https?:\/\/[^\s<>]+/;

const TRAILING_URL_NOISE = new Set([".", "*", "_", "~", "`", "<", ">", "[", "]", "(", ")", "{", "}"]);

/**
 * First http(s) URL in `text`, with trailing markdown and punctuation
 * removed. Returns `null` when there is none.
 */
export function extractFirstUrl(text: string): string | null {
  const match = URL_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  let url = match[0];
  while (url.length > 0 && TRAILING_URL_NOISE.has(url[url.length - 1] ?? "")) {
    url = url.slice(0, -1);
  }
  return url.includes("://") && !url.endsWith("://") ? url : null;
}

// List markers: bullets, numbering ("1." / "2)") and markdown emphasis.
const LEADING_MARKERS = /^\s*(?:[-*+•`]\s*|\d+[.)]\s*)*/;
const TRAILING_MARKERS = /[\s*`]+$/;

/**
 * One library name per non-empty line, list markers stripped, exact
 * duplicates dropped, first-seen order kept.
 */
export function parseLibraryList(text: string): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const name = line.replace(LEADING_MARKERS, "").replace(TRAILING_MARKERS, "");
    if (!name || seen.has(name)) {
      continue;
    }
    seen.add(name);
    names.push(name);
  }
  return names;
}

const DROPPED_LINE_PREFIXES = ["```", "//", "/*", "*/", "*"] as const;

/**
 * Strip fences and comment lines from generated source.
 *
 * Any line whose trimmed form starts with a fence or a comment token is
 * removed, including legitimate lines that happen to start that way (a
 * continued string literal beginning with `//`, a dereference at line start).
 * Kept as the single place that decides this policy.
 */
export function sanitizeSketchSource(reply: string): string {
  return reply
    .split(/\r?\n/)
    .filter((line) => {
      const trimmed = line.trim();
      return !DROPPED_LINE_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
    })
    .join("\n");
}
