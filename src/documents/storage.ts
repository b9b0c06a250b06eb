import { mkdir, readFile, rm, writeFile } from "fs/promises";
import path from "path";

export interface DocumentStorage {
  put(key: string, content: Buffer): Promise<void>;
  get(key: string): Promise<Buffer | undefined>;
  remove(key: string): Promise<void>;
}

const SAFE_KEY = /^[\p{L}\p{N}_\-.]+(\/[\p{L}\p{N}_\-.]+)*$/u;

export const assertStorageKey = (key: string): string => {
  if (!SAFE_KEY.test(key) || key.split("/").some((segment) => segment === "." || segment === "..")) {
    throw new Error(`Invalid document storage key "${key}".`);
  }

  return key;
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export class LocalDocumentStorage implements DocumentStorage {
  constructor(private readonly rootDir: string) {}

  async put(key: string, content: Buffer): Promise<void> {
    const target = this.resolve(key);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }

  async get(key: string): Promise<Buffer | undefined> {
    try {
      return await readFile(this.resolve(key));
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }

      throw error;
    }
  }

  async remove(key: string): Promise<void> {
    await rm(this.resolve(key), { force: true });
  }

  private resolve(key: string): string {
    return path.join(this.rootDir, assertStorageKey(key));
  }
}

export class InMemoryDocumentStorage implements DocumentStorage {
  private readonly files = new Map<string, Buffer>();

  async put(key: string, content: Buffer): Promise<void> {
    this.files.set(assertStorageKey(key), Buffer.from(content));
  }

  async get(key: string): Promise<Buffer | undefined> {
    return this.files.get(key);
  }

  async remove(key: string): Promise<void> {
    this.files.delete(key);
  }

  keys(): string[] {
    return [...this.files.keys()];
  }
}
