import * as path from 'node:path';
import type { BundleDocument } from './models/document.js';
import type { FileSystemPort } from './ports/file-system.js';
import type { Logger } from './ports/logger.js';
import { assertSafeRelativePath } from './paths.js';
import { countLines } from './text.js';

export interface CollectRequest {
  readonly path: string;
  readonly section?: string;
}

export interface SkippedDocument {
  readonly path: string;
  readonly reason: 'not-found';
}

export interface CollectResult {
  readonly documents: BundleDocument[];
  readonly skipped: SkippedDocument[];
}

export class Collector {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly log: Logger,
  ) {}

  /**
   * Reads the requested paths in order, skipping the ones that do not exist
   * under sourceRoot. Paths that would leave sourceRoot are rejected before
   * anything is read.
   */
  async collect(sourceRoot: string, requests: readonly CollectRequest[]): Promise<CollectResult> {
    for (const request of requests) {
      assertSafeRelativePath(request.path);
    }

    const documents: BundleDocument[] = [];
    const skipped: SkippedDocument[] = [];

    for (const request of requests) {
      const content = await this.fs.readTextFile(path.join(sourceRoot, request.path));
      if (content === undefined) {
        this.log.warn(`[SKIP] ${request.path} (not found)`);
        skipped.push({ path: request.path, reason: 'not-found' });
        continue;
      }

      this.log.info(`[OK]   ${request.path} (${countLines(content)} lines)`);
      documents.push(
        request.section === undefined
          ? { path: request.path, content }
          : { path: request.path, content, section: request.section },
      );
    }

    return { documents, skipped };
  }
}
