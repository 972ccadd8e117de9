import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

// Blob storage used by the report persistence step
export interface ArtifactStore {
  put(bytes: Uint8Array, key: string): Promise<string>;
  get(uri: string): Promise<Uint8Array>;
  // No-op when the artifact does not exist
  delete(uri: string): Promise<void>;
}

export class ArtifactNotFoundError extends Error {
  constructor(readonly uri: string) {
    super(`artifact ${uri} not found`);
    this.name = "ArtifactNotFoundError";
  }
}

function assertRelativeKey(key: string): void {
  const segments = key.split(/[\\/]/u);
  if (key.length === 0 || isAbsolute(key) || segments.some((segment) => segment === "..")) {
    throw new Error(`invalid artifact key: ${key}`);
  }
}

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel.length > 0 && !rel.startsWith(`..${sep}`) && rel !== ".." && !isAbsolute(rel);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileArtifactStore implements ArtifactStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  async put(bytes: Uint8Array, key: string): Promise<string> {
    assertRelativeKey(key);
    const target = resolve(this.rootDir, key);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, bytes);
    return pathToFileURL(target).href;
  }

  async get(uri: string): Promise<Uint8Array> {
    if (!uri.startsWith("file://")) {
      throw new ArtifactNotFoundError(uri);
    }
    const target = fileURLToPath(uri);
    if (!isInside(this.rootDir, target)) {
      throw new ArtifactNotFoundError(uri);
    }
    try {
      return await readFile(target);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ArtifactNotFoundError(uri);
      }
      throw error;
    }
  }

  async delete(uri: string): Promise<void> {
    if (!uri.startsWith("file://")) {
      return;
    }
    const target = fileURLToPath(uri);
    if (!isInside(this.rootDir, target)) {
      return;
    }
    await rm(target, { force: true });
  }
}

export class InMemoryArtifactStore implements ArtifactStore {
  private readonly blobs = new Map<string, Uint8Array>();

  async put(bytes: Uint8Array, key: string): Promise<string> {
    assertRelativeKey(key);
    const uri = `memory://${key}`;
    this.blobs.set(uri, new Uint8Array(bytes));
    return uri;
  }

  async get(uri: string): Promise<Uint8Array> {
    const bytes = this.blobs.get(uri);
    if (!bytes) {
      throw new ArtifactNotFoundError(uri);
    }
    return new Uint8Array(bytes);
  }

  async delete(uri: string): Promise<void> {
    this.blobs.delete(uri);
  }

  keys(): string[] {
    return [...this.blobs.keys()].sort();
  }
}
