import { dedupeDocuments } from '../models/document.js';
import type { BundleDocument } from '../models/document.js';
import { validateLogicalPath } from '../paths.js';
import { center } from '../text.js';
import { formatTree } from '../tree.js';
import { FILE_END, FILE_START, commentLine, pathMarkerLine } from './markers.js';
import type { MarkerOptions } from './markers.js';
import { GENERATOR_NAME, formatMetadataBlock, formatTimestamp } from './metadata.js';
import type { BundleMetadata } from './metadata.js';

export interface EncodeMetadata {
  readonly timestamp: Date;
  readonly sourceDir: string;
  readonly generator?: string;
}

export interface EncodeOptions extends MarkerOptions {
  /** Heading of the banner */
  readonly title?: string;
}

export const DEFAULT_BUNDLE_TITLE = 'Configuration bundle';

const RULE = '='.repeat(80);
const SECTION_RULE = '#'.repeat(76);
const SECTION_WIDTH = 72;
const RECONSTRUCT_HINT = 'confbundle-unflatten <bundle_file> <output_dir>';

function bannerLines(metadata: BundleMetadata, title: string): string[] {
  const tree = formatTree(metadata.files);
  return [
    RULE,
    `  ${title.toUpperCase()}`,
    RULE,
    '',
    '  Single-file bundle of a multi-file configuration tree.',
    '',
    `  Generated: ${metadata.timestamp}`,
    `  Source:    ${metadata.sourceDir}`,
    `  Files:     ${metadata.fileCount}`,
    '',
    '  FILE MARKERS:',
    '    Each original file is wrapped with markers:',
    `      ${FILE_START}: path/to/file`,
    '      ... original file contents ...',
    `      ${FILE_END}:   path/to/file`,
    '',
    '  TO RECONSTRUCT THE ORIGINAL FILES:',
    `    Run: ${RECONSTRUCT_HINT}`,
    '',
    '  ORIGINAL DIRECTORY STRUCTURE:',
    '    ./',
    ...(tree.length > 0 ? tree.map((line) => `    ${line}`) : ['    (empty)']),
    '',
    RULE,
  ];
}

function sectionHeaderLines(title: string): string[] {
  return [SECTION_RULE, `#  ${center(title, SECTION_WIDTH)}  #`, SECTION_RULE];
}

function footerLines(): string[] {
  return [RULE, '  END OF BUNDLE', '', `  To reconstruct: ${RECONSTRUCT_HINT}`, RULE];
}

/**
 * Serializes documents into a single bundle.
 *
 * Each document is wrapped as
 *   @FILE_START: <path>
 *   <content>
 *   @FILE_END: <path>
 * followed by a blank line. A line break is supplied after non-empty content
 * that lacks one so the end marker always starts its own line.
 */
export function encodeBundle(
  documents: readonly BundleDocument[],
  metadata: EncodeMetadata,
  options: EncodeOptions = {},
): string {
  const prefix = options.commentPrefix ?? '';
  const docs = dedupeDocuments(documents);
  for (const doc of docs) {
    validateLogicalPath(doc.path);
  }

  const bundleMetadata: BundleMetadata = {
    generator: metadata.generator ?? GENERATOR_NAME,
    timestamp: formatTimestamp(metadata.timestamp),
    sourceDir: metadata.sourceDir,
    fileCount: docs.length,
    files: docs.map((doc) => doc.path),
  };

  const chunks: string[] = [];
  const emit = (lines: readonly string[]): void => {
    for (const line of lines) {
      chunks.push(`${commentLine(line, prefix)}\n`);
    }
  };

  emit(bannerLines(bundleMetadata, options.title ?? DEFAULT_BUNDLE_TITLE));
  emit(['']);
  chunks.push(...formatMetadataBlock(bundleMetadata, options).map((line) => `${line}\n`));
  emit(['']);

  let currentSection: string | undefined;
  for (const doc of docs) {
    if (doc.section !== undefined && doc.section !== currentSection) {
      emit([...sectionHeaderLines(doc.section), '']);
      currentSection = doc.section;
    }

    chunks.push(`${pathMarkerLine(FILE_START, doc.path, prefix)}\n`);
    chunks.push(doc.content);
    if (doc.content.length > 0 && !doc.content.endsWith('\n')) {
      chunks.push('\n');
    }
    chunks.push(`${pathMarkerLine(FILE_END, doc.path, prefix)}\n`);
    chunks.push('\n');
  }

  emit(footerLines());
  return chunks.join('');
}
