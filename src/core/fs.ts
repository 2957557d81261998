import { access, mkdir, readFile, rm, writeFile } from 'node:fs/promises';

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  writeText(path: string, content: string): Promise<void>;
  writeJSON(path: string, data: unknown): Promise<void>;
  exists(path: string): Promise<boolean>;
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export class NodeFileSystem implements FileSystem {
  async readText(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async writeText(path: string, content: string): Promise<void> {
    await writeFile(path, content, 'utf8');
  }

  async writeJSON(path: string, data: unknown): Promise<void> {
    await this.writeText(path, JSON.stringify(data, null, 2));
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async remove(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }
}

/** In-memory file system for tests; directories are tracked but not required. */
export class MockFileSystem implements FileSystem {
  private files: Map<string, string>;
  private directories = new Set<string>();

  constructor(seed: Record<string, string> = {}) {
    this.files = new Map(Object.entries(seed));
  }

  async readText(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file '${path}'`), { code: 'ENOENT' });
    }
    return content;
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async writeText(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }

  async writeJSON(path: string, data: unknown): Promise<void> {
    await this.writeText(path, JSON.stringify(data, null, 2));
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.directories.has(path);
  }

  async mkdir(path: string): Promise<void> {
    this.directories.add(path);
  }

  async remove(path: string): Promise<void> {
    this.files.delete(path);
    this.directories.delete(path);
  }

  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  getFiles(): Map<string, string> {
    return new Map(this.files);
  }

  hasDirectory(path: string): boolean {
    return this.directories.has(path);
  }
}
