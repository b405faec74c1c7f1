import * as path from 'node:path';
import { encodeBundle } from './bundle/encoder.js';
import type { Collector, SkippedDocument } from './collector.js';
import { profileRequests } from './config/profile.js';
import type { Profile } from './config/profile.js';
import { MissingInputError } from './exceptions.js';
import type { BundleDocument } from './models/document.js';
import type { FileSystemPort } from './ports/file-system.js';
import type { Logger } from './ports/logger.js';

export interface FlattenRequest {
  readonly sourceDir: string;
  readonly outputFile: string;
  readonly profile: Profile;
  /** Overrides the profile's comment prefix */
  readonly commentPrefix?: string;
  readonly now: Date;
}

export interface FlattenResult {
  readonly bundle: string;
  readonly documents: BundleDocument[];
  readonly skipped: SkippedDocument[];
  readonly lineCount: number;
  readonly byteLength: number;
}

export class FlattenService {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly collector: Collector,
    private readonly log: Logger,
  ) {}

  async flatten(request: FlattenRequest): Promise<FlattenResult> {
    const { sourceDir, outputFile, profile } = request;

    const entryPath = path.join(sourceDir, profile.entryFile);
    if (!(await this.fs.exists(entryPath))) {
      throw new MissingInputError(
        entryPath,
        `${profile.entryFile} not found in config directory: ${sourceDir}`,
      );
    }

    const requests = profileRequests(profile);
    const { documents, skipped } = await this.collector.collect(sourceDir, requests);
    this.log.debug(`Collected ${documents.length} of ${requests.length} requested files`);

    const bundle = encodeBundle(
      documents,
      { timestamp: request.now, sourceDir },
      { commentPrefix: request.commentPrefix ?? profile.commentPrefix, title: profile.title },
    );

    await this.fs.writeTextFile(outputFile, bundle);
    this.log.debug(`Wrote ${outputFile}`);

    return {
      bundle,
      documents,
      skipped,
      lineCount: bundle.split('\n').length - 1,
      byteLength: Buffer.byteLength(bundle, 'utf8'),
    };
  }
}
