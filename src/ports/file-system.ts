export interface FileSystemPort {
  /** Resolves to undefined when the file does not exist */
  readTextFile(path: string): Promise<string | undefined>;
  /** Creates missing parent directories */
  writeTextFile(path: string, content: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Relative slash-separated paths of every file below dir, directories included with a trailing slash */
  listTree(dir: string): Promise<string[]>;
}
