import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FileSystemError } from '../exceptions.js';
import type { FileSystemPort } from '../ports/file-system.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class NodeFileSystemAdapter implements FileSystemPort {
  async readTextFile(filePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new FileSystemError('read', filePath, error);
    }
  }

  async writeTextFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new FileSystemError('mkdir', dir, error);
    }
    try {
      await fs.writeFile(filePath, content, 'utf8');
    } catch (error) {
      throw new FileSystemError('write', filePath, error);
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async listTree(dir: string): Promise<string[]> {
    const result: string[] = [];
    await this.walk(dir, '', result);
    return result;
  }

  private async walk(root: string, relative: string, result: string[]): Promise<void> {
    const current = path.join(root, relative);
    let entries: Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      throw new FileSystemError('list', current, error);
    }

    for (const entry of entries) {
      const child = relative ? `${relative}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        result.push(`${child}/`);
        await this.walk(root, child, result);
      } else {
        result.push(child);
      }
    }
  }
}
