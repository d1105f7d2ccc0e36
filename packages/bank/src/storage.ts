/**
 * @passbook/bank — Storage providers.
 *
 * A provider hands out a handle; the handle is released when the work
 * is done, whether it succeeded or threw. withStorage() is the only
 * place callers should open one.
 *
 * Implementations:
 * - InMemoryStorage — a string in memory, for tests
 * - FileStorage — a single JSON file guarded by a lock file
 */

import {
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { BankError } from "./types.js";

// =============================================================================
// Interfaces
// =============================================================================

export interface StorageHandle {
  /** Stored content, or undefined when nothing has been saved yet */
  read(): string | undefined;

  /** Replace the stored content */
  write(content: string): void;

  close(): void;
}

export interface StorageProvider {
  open(): StorageHandle;
}

/**
 * Open a handle, run `fn`, and always close the handle afterwards.
 */
export function withStorage<T>(provider: StorageProvider, fn: (handle: StorageHandle) => T): T {
  const handle = provider.open();
  try {
    return fn(handle);
  } finally {
    handle.close();
  }
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemoryStorage implements StorageProvider {
  private _content: string | undefined;
  private _openHandles = 0;

  constructor(initial?: string) {
    this._content = initial;
  }

  /** Current stored content */
  get content(): string | undefined {
    return this._content;
  }

  /** Handles opened and not yet closed */
  get openHandles(): number {
    return this._openHandles;
  }

  open(): StorageHandle {
    let closed = false;
    const assertOpen = (): void => {
      if (closed) {
        throw new BankError("STORAGE_CLOSED", "Storage handle is closed");
      }
    };

    this._openHandles++;
    return {
      read: () => {
        assertOpen();
        return this._content;
      },
      write: (content) => {
        assertOpen();
        this._content = content;
      },
      close: () => {
        if (closed) return;
        closed = true;
        this._openHandles--;
      },
    };
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

/**
 * Stores the bank as one file. While a handle is open a sibling
 * `<file>.lock` exists; a second open fails with STORAGE_LOCKED.
 * Writes go to `<file>.tmp` and are renamed over the target.
 */
export class FileStorage implements StorageProvider {
  private readonly _filePath: string;

  constructor(filePath: string) {
    this._filePath = filePath;
  }

  get filePath(): string {
    return this._filePath;
  }

  get lockPath(): string {
    return `${this._filePath}.lock`;
  }

  open(): StorageHandle {
    mkdirSync(dirname(this._filePath), { recursive: true });

    let fd: number;
    try {
      fd = openSync(this.lockPath, "wx");
    } catch (err) {
      if (!isAlreadyExists(err)) {
        throw err;
      }
      throw new BankError(
        "STORAGE_LOCKED",
        `${this._filePath} is in use. Remove ${this.lockPath} if no other session is running`,
        { cause: err },
      );
    }

    let closed = false;
    const assertOpen = (): void => {
      if (closed) {
        throw new BankError("STORAGE_CLOSED", "Storage handle is closed");
      }
    };

    return {
      read: () => {
        assertOpen();
        if (!existsSync(this._filePath)) {
          return undefined;
        }
        return readFileSync(this._filePath, "utf-8");
      },
      write: (content) => {
        assertOpen();
        const tmpPath = `${this._filePath}.tmp`;
        writeFileSync(tmpPath, content, "utf-8");
        renameSync(tmpPath, this._filePath);
      },
      close: () => {
        if (closed) return;
        closed = true;
        closeSync(fd);
        unlinkSync(this.lockPath);
      },
    };
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}
