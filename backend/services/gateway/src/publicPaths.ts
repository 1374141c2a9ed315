// backend/services/gateway/src/publicPaths.ts

/**
 * Paths that skip API-key admission.
 *
 * Pattern forms:
 *   "/docs/*"             -> "/docs", "/docs/" and anything below "/docs/"
 *   "/users/by-qr/{qrId}" -> one non-empty segment per {param}
 *   "/openapi.json"       -> exact, case-sensitive
 *
 * A path with a "." or ".." segment (raw or percent-encoded) is never public:
 * "/docs/../admin" must not ride on the "/docs/*" prefix.
 */

export type PathMatcher = (path: string) => boolean;

/** Always public, whatever PUBLIC_PATHS says. */
export const ALWAYS_PUBLIC_PATHS = ["/healthz", "/readyz"] as const;

// "." or ".." between separators; %2e is a dot, %2f and %5c are separators.
const DOT_SEGMENT = /(?:^|[/\\])(?:\.|%2e){1,2}(?=[/\\]|$)/i;
const ENCODED_SEPARATOR = /%2f|%5c/gi;

/** True when the raw (undecoded) path has a "." or ".." segment. */
export function hasDotSegment(path: string): boolean {
  return DOT_SEGMENT.test(path.replace(ENCODED_SEPARATOR, "/"));
}

// One segment, never "." or "..".
const PARAM_SEGMENT = "(?!\\.{1,2}(?:/|$))[^/]+";

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function templateToRegex(template: string): RegExp {
  const source = template
    .split(/(\{[^/{}]+\})/)
    .map((part) =>
      /^\{[^/{}]+\}$/.test(part) ? PARAM_SEGMENT : escapeRegex(part)
    )
    .join("");
  return new RegExp(`^${source}$`);
}

export function compilePublicPaths(patterns: readonly string[]): PathMatcher {
  const exact = new Set<string>(ALWAYS_PUBLIC_PATHS);
  const prefixes: string[] = [];
  const templates: RegExp[] = [];

  for (const p of patterns) {
    if (p.endsWith("/*")) {
      const prefix = p.slice(0, -1);
      prefixes.push(prefix);
      if (prefix.length > 1) exact.add(prefix.slice(0, -1));
    } else if (/\{[^/{}]+\}/.test(p)) {
      templates.push(templateToRegex(p));
    } else {
      exact.add(p);
    }
  }

  return (path) =>
    !hasDotSegment(path) &&
    (exact.has(path) ||
      prefixes.some((prefix) => path.startsWith(prefix)) ||
      templates.some((re) => re.test(path)));
}
