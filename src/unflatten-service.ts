import { scanBundle } from './bundle/decoder.js';
import type { UnterminatedSection } from './bundle/decoder.js';
import { detectCommentPrefix } from './bundle/markers.js';
import { decodeMetadata, parseBundleMetadata } from './bundle/metadata.js';
import type { BundleMetadata } from './bundle/metadata.js';
import { EmptyResultError, MissingInputError } from './exceptions.js';
import type { Materializer } from './materializer.js';
import type { Document } from './models/document.js';
import type { FileSystemPort } from './ports/file-system.js';
import type { Logger } from './ports/logger.js';

export interface ReadBundleRequest {
  readonly bundleFile: string;
  /** Detected from the metadata block when omitted */
  readonly commentPrefix?: string;
}

export interface DecodedBundle {
  readonly bundleFile: string;
  readonly commentPrefix: string;
  readonly metadata: Record<string, string> | undefined;
  /** Typed view of the metadata, undefined when the block is missing or malformed */
  readonly bundleMetadata: BundleMetadata | undefined;
  readonly documents: Document[];
  readonly unterminated: UnterminatedSection[];
}

export interface WriteResult {
  readonly files: string[];
  readonly directories: string[];
  /** Every entry under the output directory after writing, directories ending in `/` */
  readonly outputEntries: string[];
}

export type UnflattenResult = DecodedBundle & WriteResult;

export class UnflattenService {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly materializer: Materializer,
    private readonly log: Logger,
  ) {}

  async unflatten(request: ReadBundleRequest & { readonly outputDir: string }): Promise<UnflattenResult> {
    const decoded = await this.read(request);
    const written = await this.write(decoded, request.outputDir);
    return { ...decoded, ...written };
  }

  /** Reads and decodes a bundle; fails when it holds no documents. */
  async read(request: ReadBundleRequest): Promise<DecodedBundle> {
    const { bundleFile } = request;
    const text = await this.fs.readTextFile(bundleFile);
    if (text === undefined) {
      throw new MissingInputError(bundleFile, `Input file not found: ${bundleFile}`);
    }

    const commentPrefix = request.commentPrefix ?? detectCommentPrefix(text);
    this.log.debug(`Comment prefix: ${JSON.stringify(commentPrefix)}`);

    const metadata = decodeMetadata(text, { commentPrefix });
    const bundleMetadata = parseBundleMetadata(text, { commentPrefix });
    if (metadata && !bundleMetadata) {
      this.log.warn('Metadata block is incomplete');
    }
    const { documents, unterminated } = scanBundle(text, { commentPrefix });

    for (const section of unterminated) {
      this.log.warn(`No end marker for ${section.path} (line ${section.line}), not extracted`);
    }

    if (documents.length === 0) {
      throw new EmptyResultError(
        `No files found in bundle: ${bundleFile}. ` +
          'Make sure the file was created by confbundle-flatten.',
      );
    }

    if (bundleMetadata && bundleMetadata.fileCount !== documents.length) {
      this.log.warn(
        `Metadata lists ${bundleMetadata.fileCount} files but ${documents.length} were found`,
      );
    }

    return { bundleFile, commentPrefix, metadata, bundleMetadata, documents, unterminated };
  }

  async write(decoded: DecodedBundle, outputDir: string): Promise<WriteResult> {
    const { files, directories } = await this.materializer.materialize(decoded.documents, outputDir);
    const outputEntries = await this.fs.listTree(outputDir);
    this.log.debug(`Wrote ${files.length} files under ${outputDir}`);
    return { files, directories, outputEntries };
  }
}
