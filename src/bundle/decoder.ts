import type { Document } from '../models/document.js';
import { FILE_END, FILE_START, matchPathMarker } from './markers.js';
import type { MarkerOptions } from './markers.js';

export interface UnterminatedSection {
  readonly path: string;
  /** 1-based line of the start marker */
  readonly line: number;
}

export interface ScanResult {
  readonly documents: Document[];
  readonly unterminated: UnterminatedSection[];
}

/**
 * Line scanner over a bundle.
 *
 * A start marker for P pairs with the nearest following end marker whose path
 * equals P; lines in between, other markers included, are content. Pairs never
 * overlap. A start marker without a partner yields no document and scanning
 * resumes on the following line. Repeated paths keep their first position and
 * their last content.
 */
export function scanBundle(text: string, options: MarkerOptions = {}): ScanResult {
  const prefix = options.commentPrefix ?? '';
  const lines = text.split('\n');

  const offsets: number[] = [];
  let offset = 0;
  for (const line of lines) {
    offsets.push(offset);
    offset += line.length + 1;
  }

  const endLinesByPath = new Map<string, number[]>();
  lines.forEach((line, index) => {
    const path = matchPathMarker(line, FILE_END, prefix);
    if (path === null) return;
    const indices = endLinesByPath.get(path) ?? [];
    indices.push(index);
    endLinesByPath.set(path, indices);
  });

  // Start lines are visited in increasing order, so each path's cursor only moves forward.
  const cursors = new Map<string, number>();
  const nextEndLine = (path: string, after: number): number | undefined => {
    const indices = endLinesByPath.get(path);
    if (!indices) return undefined;
    let cursor = cursors.get(path) ?? 0;
    while (cursor < indices.length && indices[cursor] <= after) cursor++;
    cursors.set(path, cursor);
    return indices[cursor];
  };

  const byPath = new Map<string, Document>();
  const unterminated: UnterminatedSection[] = [];

  let index = 0;
  while (index < lines.length) {
    const path = matchPathMarker(lines[index], FILE_START, prefix);
    if (path === null) {
      index++;
      continue;
    }

    const endIndex = nextEndLine(path, index);
    if (endIndex === undefined) {
      unterminated.push({ path, line: index + 1 });
      index++;
      continue;
    }

    const contentStart = offsets[index] + lines[index].length + 1;
    byPath.set(path, { path, content: text.slice(contentStart, offsets[endIndex]) });
    index = endIndex + 1;
  }

  return { documents: [...byPath.values()], unterminated };
}

export function decodeBundle(text: string, options: MarkerOptions = {}): Document[] {
  return scanBundle(text, options).documents;
}
