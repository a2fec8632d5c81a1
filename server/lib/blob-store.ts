import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { isErrnoException } from "./document-store";

/** Whitespace becomes `_`; anything but ASCII letters, digits, dots, dashes and underscores is dropped. */
export function secureFilename(filename: string): string {
  const ascii = filename.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");
  const base = ascii.split(/[\\/]/).pop() ?? "";
  return base
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+/, "");
}

export function extensionOf(filename: string): string | undefined {
  const dot = filename.lastIndexOf(".");
  if (dot < 0 || dot === filename.length - 1) return undefined;
  return filename.slice(dot + 1).toLowerCase();
}

export function isAllowedFile(filename: string, allowed: ReadonlySet<string>): boolean {
  const ext = extensionOf(filename);
  return ext !== undefined && allowed.has(ext);
}

export class BlobStore {
  constructor(readonly dir: string) {}

  /** Saves `bytes` under `<uuid>_<sanitized name>` and returns that name. */
  async store(bytes: Buffer, suggestedName: string): Promise<string> {
    const safe = secureFilename(suggestedName) || "arquivo";
    const generatedName = `${crypto.randomUUID()}_${safe}`;
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(path.join(this.dir, generatedName), bytes);
    return generatedName;
  }

  /** Absolute path of a stored blob, or undefined when the name is unsafe or absent. */
  async locate(generatedName: string): Promise<string | undefined> {
    // Security: prevent directory traversal
    if (
      !generatedName ||
      generatedName.includes("..") ||
      generatedName.includes("/") ||
      generatedName.includes("\\")
    ) {
      return undefined;
    }

    const filePath = path.join(this.dir, generatedName);
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile() ? filePath : undefined;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return undefined;
      throw error;
    }
  }

  async fetch(generatedName: string): Promise<Buffer | undefined> {
    const filePath = await this.locate(generatedName);
    return filePath ? fs.readFile(filePath) : undefined;
  }
}
