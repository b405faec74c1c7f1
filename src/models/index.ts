export type { BundleDocument, Document } from './document.js';
export { dedupeDocuments } from './document.js';
