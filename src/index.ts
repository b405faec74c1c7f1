export * from './models/index.js';

export type { FileSystemPort, Logger } from './ports/index.js';

export {
  ConfigError,
  EmptyResultError,
  FileSystemError,
  InvalidDocumentPathError,
  MissingInputError,
  UsageError,
} from './exceptions.js';
export type { FileSystemOperation } from './exceptions.js';

export { encodeBundle, DEFAULT_BUNDLE_TITLE } from './bundle/encoder.js';
export type { EncodeMetadata, EncodeOptions } from './bundle/encoder.js';
export { decodeBundle, scanBundle } from './bundle/decoder.js';
export type { ScanResult, UnterminatedSection } from './bundle/decoder.js';
export {
  decodeMetadata,
  formatTimestamp,
  parseBundleMetadata,
  GENERATOR_NAME,
} from './bundle/metadata.js';
export type { BundleMetadata } from './bundle/metadata.js';
export {
  FILE_END,
  FILE_START,
  META_END,
  META_START,
  detectCommentPrefix,
} from './bundle/markers.js';
export type { MarkerOptions } from './bundle/markers.js';

export { Collector } from './collector.js';
export type { CollectRequest, CollectResult, SkippedDocument } from './collector.js';
export { Materializer } from './materializer.js';
export type { MaterializeResult } from './materializer.js';

export { FlattenService } from './flatten-service.js';
export type { FlattenRequest, FlattenResult } from './flatten-service.js';
export { UnflattenService } from './unflatten-service.js';
export type {
  DecodedBundle,
  ReadBundleRequest,
  UnflattenResult,
  WriteResult,
} from './unflatten-service.js';

export {
  DEFAULT_PROFILE,
  PROFILE_FILE_NAME,
  ProfileSchema,
  loadProfile,
  parseProfile,
  profileRequests,
  resolveProfile,
} from './config/profile.js';
export type { Profile, ProfileSection } from './config/profile.js';
export { loadEnvFile, readEnvConfig } from './config/env.js';
export type { EnvConfig } from './config/env.js';

export { NodeFileSystemAdapter } from './adapters/node-file-system.js';
export { createLogger } from './logger.js';
export { formatTree } from './tree.js';
export { countLines } from './text.js';
export { assertSafeRelativePath, validateLogicalPath } from './paths.js';
