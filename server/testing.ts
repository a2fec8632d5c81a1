import fs from "fs/promises";
import os from "os";
import path from "path";
import type { Principal } from "../shared/schema";

export interface TestDataDir {
  dir: string;
  cleanup: () => Promise<void>;
}

/** Unique temporary directory per test, removed by `cleanup`. */
export async function createTestDataDir(prefix = "test"): Promise<TestDataDir> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `journal-portal-${prefix}-`));
  return {
    dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };
}

export function principal(username: string, role: string, permissions: string[] = []): Principal {
  return { username, role, permissions };
}
