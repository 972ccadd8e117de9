import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  ArtifactNotFoundError,
  FileArtifactStore,
  InMemoryArtifactStore,
} from "../src/artifact-store";

describe("FileArtifactStore", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  function createStore(): FileArtifactStore {
    const dir = mkdtempSync(join(tmpdir(), "factline-artifacts-"));
    dirs.push(dir);
    return new FileArtifactStore(dir);
  }

  it("round-trips bytes through a file URI", async () => {
    const store = createStore();
    const uri = await store.put(new TextEncoder().encode('{"ok":true}'), "reports/job-1/a.json");

    expect(uri.startsWith("file://")).toBe(true);
    expect(uri.endsWith("/reports/job-1/a.json")).toBe(true);
    expect(new TextDecoder().decode(await store.get(uri))).toBe('{"ok":true}');
  });

  it("rejects keys that escape the root", async () => {
    const store = createStore();
    await expect(store.put(new Uint8Array([1]), "../outside.json")).rejects.toThrow(
      "invalid artifact key: ../outside.json",
    );
  });

  it("deletes a stored artifact", async () => {
    const store = createStore();
    const uri = await store.put(new Uint8Array([1]), "reports/job-1/c.json");

    await store.delete(uri);
    await store.delete(uri);

    await expect(store.get(uri)).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("does not read outside the root", async () => {
    const store = createStore();
    await expect(store.get("file:///etc/hostname")).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });
});

describe("InMemoryArtifactStore", () => {
  it("stores copies under memory URIs", async () => {
    const store = new InMemoryArtifactStore();
    const bytes = new Uint8Array([1, 2, 3]);
    const uri = await store.put(bytes, "reports/job-1/b.json");
    bytes[0] = 9;

    expect(uri).toBe("memory://reports/job-1/b.json");
    expect([...(await store.get(uri))]).toEqual([1, 2, 3]);
    await expect(store.get("memory://missing")).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("forgets deleted artifacts", async () => {
    const store = new InMemoryArtifactStore();
    const uri = await store.put(new Uint8Array([1]), "reports/job-1/d.json");

    await store.delete(uri);

    expect(store.keys()).toEqual([]);
  });
});
