import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { z } from "zod";

export interface DocumentStore {
  /** Reads a document, writing `defaultValue` first when it does not exist yet. */
  load(key: string, defaultValue: unknown): Promise<unknown>;
  save(key: string, document: unknown): Promise<void>;
}

// fs errors may come from another realm; no instanceof check
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

/**
 * One pretty-printed JSON file per key under `baseDir`.
 * Each write goes to its own `<file>.<uuid>.tmp` and is renamed into place.
 */
export class JsonDocumentStore implements DocumentStore {
  constructor(private readonly baseDir: string) {}

  private pathFor(key: string): string {
    return path.join(this.baseDir, `${key}.json`);
  }

  async load(key: string, defaultValue: unknown): Promise<unknown> {
    const filePath = this.pathFor(key);
    try {
      const raw = await fs.readFile(filePath, "utf-8");
      return JSON.parse(raw);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        await this.save(key, defaultValue);
        return defaultValue;
      }
      throw error;
    }
  }

  async save(key: string, document: unknown): Promise<void> {
    const filePath = this.pathFor(key);
    const tmpPath = `${filePath}.${crypto.randomUUID()}.tmp`;
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(document, null, 2), "utf-8");
    await fs.rename(tmpPath, filePath);
  }
}

/**
 * Typed view over a single document. Reads and `mutate` cycles (load -> fn ->
 * save) share one promise chain per collection, so they never interleave
 * inside this process and a missing document is created exactly once. A
 * mutation that throws, or that leaves the document as it found it, writes
 * nothing. `fn` must not call back into the same collection.
 */
export class Collection<T> {
  private chain: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: DocumentStore,
    readonly key: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly defaultValue: () => T,
  ) {}

  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const run = this.chain.catch(() => undefined).then(task);
    this.chain = run;
    return run;
  }

  private async load(): Promise<T> {
    const raw = await this.store.load(this.key, this.defaultValue());
    return this.schema.parse(raw);
  }

  read(): Promise<T> {
    return this.enqueue(() => this.load());
  }

  mutate<R>(fn: (document: T) => R | Promise<R>): Promise<R> {
    return this.enqueue(async () => {
      const document = await this.load();
      const before = JSON.stringify(document);
      const result = await fn(document);
      if (JSON.stringify(document) !== before) {
        await this.store.save(this.key, document);
      }
      return result;
    });
  }
}
