export interface Document {
  /** Relative, slash-separated logical path */
  readonly path: string;
  readonly content: string;
}

export interface BundleDocument extends Document {
  /** Cosmetic group title rendered as a section header in the bundle */
  readonly section?: string;
}

/**
 * Collapses repeated paths. The surviving entry keeps the position of the
 * first occurrence and the content of the last one.
 */
export function dedupeDocuments<T extends Document>(documents: readonly T[]): T[] {
  const byPath = new Map<string, T>();
  for (const doc of documents) {
    byPath.set(doc.path, doc);
  }
  return [...byPath.values()];
}
