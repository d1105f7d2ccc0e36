/**
 * Tests for InMemoryStorage, FileStorage and withStorage.
 *
 * Verifies:
 * - Read before any write, write then read
 * - Handles are released on success and on failure
 * - Closed handles refuse work
 * - FileStorage locking and atomic replacement
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileStorage, InMemoryStorage, withStorage } from "../src/storage.js";
import type { StorageProvider } from "../src/storage.js";
import { BankError } from "../src/types.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

// =============================================================================
// Shared test suite that runs against both implementations
// =============================================================================

function runSharedTests(createProvider: () => StorageProvider) {
  it("reads undefined before anything is written", () => {
    const provider = createProvider();

    expect(withStorage(provider, (handle) => handle.read())).toBeUndefined();
  });

  it("reads back what was written", () => {
    const provider = createProvider();
    withStorage(provider, (handle) => handle.write("first"));
    withStorage(provider, (handle) => handle.write("second"));

    expect(withStorage(provider, (handle) => handle.read())).toBe("second");
  });

  it("releases the handle when the callback throws", () => {
    const provider = createProvider();

    expect(
      thrown(() =>
        withStorage(provider, () => {
          throw new Error("boom");
        }),
      ),
    ).toMatchObject({ message: "boom" });
    expect(withStorage(provider, (handle) => handle.read())).toBeUndefined();
  });

  it("refuses reads and writes after close", () => {
    const handle = createProvider().open();
    handle.close();

    expect(thrown(() => handle.read())).toMatchObject({ code: "STORAGE_CLOSED" });
    expect(thrown(() => handle.write("x"))).toMatchObject({ code: "STORAGE_CLOSED" });
  });

  it("tolerates a second close", () => {
    const handle = createProvider().open();
    handle.close();

    expect(() => handle.close()).not.toThrow();
  });
}

// =============================================================================
// InMemoryStorage
// =============================================================================

describe("InMemoryStorage", () => {
  runSharedTests(() => new InMemoryStorage());

  it("starts from the initial content", () => {
    const storage = new InMemoryStorage("seed");

    expect(withStorage(storage, (handle) => handle.read())).toBe("seed");
  });

  it("counts open handles", () => {
    const storage = new InMemoryStorage();
    const handle = storage.open();

    expect(storage.openHandles).toBe(1);
    handle.close();
    handle.close();
    expect(storage.openHandles).toBe(0);
  });
});

// =============================================================================
// FileStorage
// =============================================================================

describe("FileStorage", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "passbook-storage-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  runSharedTests(() => new FileStorage(join(dir, "bank.json")));

  it("creates missing parent directories", () => {
    const filePath = join(dir, "nested", "deeper", "bank.json");
    withStorage(new FileStorage(filePath), (handle) => handle.write("{}"));

    expect(readFileSync(filePath, "utf-8")).toBe("{}");
  });

  it("holds a lock file only while a handle is open", () => {
    const storage = new FileStorage(join(dir, "bank.json"));
    const handle = storage.open();

    expect(existsSync(storage.lockPath)).toBe(true);
    handle.close();
    expect(existsSync(storage.lockPath)).toBe(false);
  });

  it("refuses a second open while locked", () => {
    const storage = new FileStorage(join(dir, "bank.json"));
    const handle = storage.open();

    const err = thrown(() => storage.open());

    expect(err).toBeInstanceOf(BankError);
    expect(err).toMatchObject({ code: "STORAGE_LOCKED" });
    handle.close();
  });

  it("treats a leftover lock file as locked", () => {
    const storage = new FileStorage(join(dir, "bank.json"));
    writeFileSync(storage.lockPath, "");

    expect(thrown(() => storage.open())).toMatchObject({ code: "STORAGE_LOCKED" });
  });

  it("passes through failures other than an existing lock", () => {
    const storage = new FileStorage(join(dir, "b".repeat(251)));

    const err = thrown(() => storage.open());

    expect(err).not.toBeInstanceOf(BankError);
    expect(err).toMatchObject({ code: "ENAMETOOLONG" });
  });

  it("leaves no temporary file behind after a write", () => {
    const filePath = join(dir, "bank.json");
    withStorage(new FileStorage(filePath), (handle) => handle.write("content"));

    expect(existsSync(`${filePath}.tmp`)).toBe(false);
    expect(readFileSync(filePath, "utf-8")).toBe("content");
  });

  it("persists across provider instances", () => {
    const filePath = join(dir, "bank.json");
    withStorage(new FileStorage(filePath), (handle) => handle.write("kept"));

    expect(withStorage(new FileStorage(filePath), (handle) => handle.read())).toBe("kept");
  });
});
