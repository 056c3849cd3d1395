import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { fileURLToPath, pathToFileURL } from "url";
import { nanoid } from "nanoid";
import type { ObjectPutOptions, ObjectStore } from "../types/index.js";
import { TaskforgeError } from "../core/errors.js";

const MEMORY_SCHEME = "memory://";

function objectKey(options?: ObjectPutOptions): string {
  const key = options?.key ?? nanoid();
  if (!/^[A-Za-z0-9._-]+(\/[A-Za-z0-9._-]+)*$/.test(key) || key.includes("..")) {
    throw new TaskforgeError("Internal", `invalid object key "${key}"`);
  }
  return key;
}

export class InMemoryObjectStore implements ObjectStore {
  private blobs = new Map<string, Buffer>();

  async put(blob: Buffer | string, options?: ObjectPutOptions): Promise<string> {
    const key = objectKey(options);
    this.blobs.set(key, Buffer.from(blob));
    return `${MEMORY_SCHEME}${key}`;
  }

  async get(uri: string): Promise<Buffer> {
    const key = uri.startsWith(MEMORY_SCHEME) ? uri.slice(MEMORY_SCHEME.length) : uri;
    const blob = this.blobs.get(key);
    if (!blob) {
      throw new TaskforgeError("Internal", `object ${uri} not found`);
    }
    return Buffer.from(blob);
  }
}

/**
 * 以目录为根的对象存储，URI 为 file:// 地址，只允许读取根目录内的文件。
 */
export class FileSystemObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = path.resolve(rootDir);
  }

  async put(blob: Buffer | string, options?: ObjectPutOptions): Promise<string> {
    const target = path.join(this.root, objectKey(options));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, blob);
    return pathToFileURL(target).href;
  }

  async get(uri: string): Promise<Buffer> {
    const target = fileURLToPath(uri);
    const relative = path.relative(this.root, target);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new TaskforgeError("Internal", `object ${uri} is outside the store`);
    }
    return readFile(target);
  }
}
