import { z } from 'zod';
import {
  META_END,
  META_START,
  commentLine,
  isBlockMarker,
  stripCarriageReturn,
} from './markers.js';
import type { MarkerOptions } from './markers.js';

export const GENERATOR_NAME = 'confbundle';

export interface BundleMetadata {
  readonly generator: string;
  readonly timestamp: string;
  readonly sourceDir: string;
  readonly fileCount: number;
  readonly files: string[];
}

const MetadataRecordSchema = z.object({
  generator: z.string(),
  timestamp: z.string(),
  source_dir: z.string(),
  file_count: z
    .string()
    .regex(/^\d+$/, 'file_count must be a non-negative integer')
    .transform((value) => Number(value)),
  files: z.string().transform((value) =>
    value
      .split(', ')
      .map((path) => path.trim())
      .filter((path) => path.length > 0),
  ),
});

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatMetadataBlock(metadata: BundleMetadata, options: MarkerOptions = {}): string[] {
  const prefix = options.commentPrefix ?? '';
  const entries: [string, string][] = [
    ['generator', metadata.generator],
    ['timestamp', metadata.timestamp],
    ['source_dir', metadata.sourceDir],
    ['file_count', String(metadata.fileCount)],
    ['files', metadata.files.join(', ')],
  ];
  return [
    commentLine(META_START, prefix),
    ...entries.map(([key, value]) => commentLine(`${key}: ${value}`, prefix).trimEnd()),
    commentLine(META_END, prefix),
  ];
}

/**
 * Reads the raw key/value pairs of the metadata block.
 * Returns undefined when no complete block is present.
 */
export function decodeMetadata(
  text: string,
  options: MarkerOptions = {},
): Record<string, string> | undefined {
  const prefix = options.commentPrefix ?? '';
  const lines = text.split('\n');
  const start = lines.findIndex((line) => isBlockMarker(line, META_START, prefix));
  if (start === -1) return undefined;

  const metadata: Record<string, string> = {};
  for (let i = start + 1; i < lines.length; i++) {
    const line = stripCarriageReturn(lines[i]);
    if (isBlockMarker(line, META_END, prefix)) return metadata;
    if (!line.startsWith(prefix)) continue;

    const body = line.slice(prefix.length);
    const separator = body.indexOf(':');
    if (separator <= 0) continue;

    const key = body.slice(0, separator).trim();
    const value = body.slice(separator + 1);
    metadata[key] = value.startsWith(' ') ? value.slice(1) : value;
  }

  return undefined;
}

export function parseBundleMetadata(
  text: string,
  options: MarkerOptions = {},
): BundleMetadata | undefined {
  const record = decodeMetadata(text, options);
  if (!record) return undefined;

  const parsed = MetadataRecordSchema.safeParse(record);
  if (!parsed.success) return undefined;

  return {
    generator: parsed.data.generator,
    timestamp: parsed.data.timestamp,
    sourceDir: parsed.data.source_dir,
    fileCount: parsed.data.file_count,
    files: parsed.data.files,
  };
}
