import { access, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  writeText(path: string, content: string): Promise<void>;
  writeJSON(path: string, data: unknown): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** File names (not paths) directly inside `dir`; empty when it does not exist. */
  list(dir: string): Promise<string[]>;
  mkdir(path: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export class NodeFileSystem implements FileSystem {
  async readText(filePath: string): Promise<string> {
    return readFile(filePath, 'utf8');
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async writeText(filePath: string, content: string): Promise<void> {
    await writeFile(filePath, content, 'utf8');
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    await this.writeText(filePath, `${JSON.stringify(data, null, 2)}\n`);
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async list(dir: string): Promise<string[]> {
    if (!(await this.exists(dir))) return [];
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name);
  }

  async mkdir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
  }

  async rename(from: string, to: string): Promise<void> {
    await rename(from, to);
  }

  async remove(filePath: string): Promise<void> {
    await rm(filePath, { recursive: true, force: true });
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();

  async readText(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return content;
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async writeText(filePath: string, content: string): Promise<void> {
    this.files.set(filePath, content);
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    this.files.set(filePath, JSON.stringify(data, null, 2));
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async list(dir: string): Promise<string[]> {
    return [...this.files.keys()].filter((k) => path.dirname(k) === dir).map((k) => path.basename(k));
  }

  async mkdir(_path: string): Promise<void> {}

  async rename(from: string, to: string): Promise<void> {
    const content = await this.readText(from);
    this.files.delete(from);
    this.files.set(to, content);
  }

  async remove(filePath: string): Promise<void> {
    this.files.delete(filePath);
  }

  setFile(filePath: string, content: string): void {
    this.files.set(filePath, content);
  }

  getFiles(): Map<string, string> {
    return new Map(this.files);
  }
}
