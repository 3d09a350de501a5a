import { constants as fsConstants } from "node:fs";
import { access, statfs } from "node:fs/promises";
import { delimiter, isAbsolute, join, resolve } from "node:path";
import type { HostInspector } from "./types.ts";

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class NodeHostInspector implements HostInspector {
  /** @param searchPath PATH-style list of directories to search. */
  constructor(private readonly searchPath: string = process.env["PATH"] ?? "") {}

  async findExecutable(name: string): Promise<string | null> {
    const trimmed = name.trim();
    if (trimmed === "") return null;

    if (trimmed.includes("/")) {
      const candidate = isAbsolute(trimmed) ? trimmed : resolve(trimmed);
      return (await isExecutable(candidate)) ? candidate : null;
    }

    for (const dir of this.searchPath.split(delimiter)) {
      if (dir === "") continue;
      const candidate = join(dir, trimmed);
      if (await isExecutable(candidate)) return candidate;
    }
    return null;
  }

  async freeDiskBytes(path: string): Promise<number> {
    const stats = await statfs(path);
    return stats.bavail * stats.bsize;
  }
}
