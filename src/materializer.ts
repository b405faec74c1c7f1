import * as path from 'node:path';
import type { Document } from './models/document.js';
import { assertSafeRelativePath } from './paths.js';
import type { FileSystemPort } from './ports/file-system.js';
import type { Logger } from './ports/logger.js';
import { countLines, ensureTrailingNewline } from './text.js';

export interface MaterializeResult {
  /** Logical paths written, in order */
  readonly files: string[];
  /** Distinct parent directories, relative to the output root */
  readonly directories: string[];
}

export class Materializer {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly log: Logger,
  ) {}

  /**
   * Writes every document under outputRoot so each file ends with exactly one
   * line break. Paths are all validated before the first write; a failing
   * write leaves the files already written in place.
   */
  async materialize(documents: readonly Document[], outputRoot: string): Promise<MaterializeResult> {
    for (const doc of documents) {
      assertSafeRelativePath(doc.path);
    }

    const files: string[] = [];
    const directories = new Set<string>();

    for (const doc of documents) {
      await this.fs.writeTextFile(path.join(outputRoot, doc.path), ensureTrailingNewline(doc.content));
      directories.add(path.posix.dirname(doc.path.replace(/\\/g, '/')));
      files.push(doc.path);
      this.log.info(`[OK] ${doc.path} (${countLines(doc.content)} lines)`);
    }

    return { files, directories: [...directories] };
  }
}
