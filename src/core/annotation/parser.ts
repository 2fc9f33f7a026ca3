/**
 * Extracts `!Name args` directives from a documentation comment.
 */
import type { RawInvocation } from './types.js';

// `!` must open the line or follow whitespace / the `*` of a comment gutter,
// so prose such as "a != b" or "hello!world" is never read as a directive.
// Arguments start right after the identifier: `!Table(users)` has text `(users)`.
const DIRECTIVE_PATTERN = /(?<=^|[\s*])!([A-Za-z_][A-Za-z0-9_]*)/;
const COMMENT_END = '*/';

/**
 * Parse a comment block into raw directive invocations, in source order.
 * Each directive's argument text runs to the end of its line or to the
 * closing comment marker, whichever comes first.
 */
export function parseDirectives(comment: string): RawInvocation[] {
  // Odd entries are the line breaks, kept so offsets stay exact for \r\n.
  const parts = comment.split(/(\r?\n)/);
  const invocations: RawInvocation[] = [];
  let lineStart = 0;

  for (let i = 0; i < parts.length; i += 2) {
    const line = parts[i];
    const start = lineStart;
    lineStart += line.length + (parts[i + 1] ?? '').length;

    const match = DIRECTIVE_PATTERN.exec(line);
    if (!match) continue;

    let rest = line.slice(match.index + match[0].length);
    const end = rest.indexOf(COMMENT_END);
    if (end !== -1) {
      rest = rest.slice(0, end);
    }

    invocations.push({
      name: match[1],
      argumentText: rest.trim(),
      line: i / 2 + 1,
      offset: start + match.index,
    });
  }

  return invocations;
}

/**
 * Check if a comment contains at least one directive (fast path).
 */
export function hasDirectives(comment: string): boolean {
  return comment.split(/\r?\n/).some((line) => DIRECTIVE_PATTERN.test(line));
}
