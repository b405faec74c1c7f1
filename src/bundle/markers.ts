export const FILE_START = '@FILE_START';
export const FILE_END = '@FILE_END';
export const META_START = '@META_START';
export const META_END = '@META_END';

export type PathMarker = typeof FILE_START | typeof FILE_END;

export interface MarkerOptions {
  /** Line-comment token written before every generated line, e.g. `-- ` for Lua */
  readonly commentPrefix?: string;
}

export function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export function pathMarkerLine(marker: PathMarker, path: string, commentPrefix = ''): string {
  return `${commentPrefix}${marker}: ${path}`;
}

/** Returns the captured path, or null when the line is not this marker. */
export function matchPathMarker(
  line: string,
  marker: PathMarker,
  commentPrefix = '',
): string | null {
  const head = `${commentPrefix}${marker}: `;
  if (!line.startsWith(head)) return null;
  const path = stripCarriageReturn(line.slice(head.length));
  return path.length > 0 ? path : null;
}

export function isBlockMarker(line: string, marker: string, commentPrefix = ''): boolean {
  return stripCarriageReturn(line) === `${commentPrefix}${marker}`;
}

/** Prefixes a generated line, dropping trailing whitespace the prefix would leave on blank lines. */
export function commentLine(text: string, commentPrefix = ''): string {
  return text.length > 0 ? `${commentPrefix}${text}` : commentPrefix.trimEnd();
}

/**
 * Recovers the comment prefix a bundle was written with. The metadata block
 * decides when it is present and closed; otherwise the shortest prefix of a
 * start marker that has a matching end marker further down wins. Falls back
 * to no prefix.
 */
export function detectCommentPrefix(text: string): string {
  const lines = text.split('\n').map(stripCarriageReturn);
  const lastIndex = new Map<string, number>();
  lines.forEach((line, index) => lastIndex.set(line, index));
  const appearsAfter = (line: string, index: number): boolean =>
    (lastIndex.get(line) ?? -1) > index;

  for (const [index, line] of lines.entries()) {
    if (!line.endsWith(META_START)) continue;
    const prefix = line.slice(0, line.length - META_START.length);
    if (appearsAfter(`${prefix}${META_END}`, index)) return prefix;
  }

  const startHead = `${FILE_START}: `;
  let shortest: string | undefined;
  for (const [index, line] of lines.entries()) {
    const at = line.indexOf(startHead);
    if (at < 0) continue;
    const prefix = line.slice(0, at);
    if (shortest !== undefined && prefix.length >= shortest.length) continue;
    const path = line.slice(at + startHead.length);
    if (path.length > 0 && appearsAfter(pathMarkerLine(FILE_END, path, prefix), index)) {
      shortest = prefix;
    }
  }
  return shortest ?? '';
}
