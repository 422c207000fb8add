// Disk-backed FileSystem over node:fs

import { readFileSync, writeFileSync, existsSync, statSync } from "node:fs";
import { resolve } from "node:path";
import { Errors, wrapError, type FileSystem } from "@keystone/core";

export class NodeFileSystem implements FileSystem {
  private baseDir?: string;

  /** Relative paths resolve against `baseDir` (or the process cwd). */
  constructor(baseDir?: string) {
    this.baseDir = baseDir;
  }

  private path(path: string): string {
    return this.baseDir ? resolve(this.baseDir, path) : resolve(path);
  }

  read(path: string): string {
    const full = this.path(path);
    if (!existsSync(full)) {
      throw Errors.fileNotFound(path);
    }
    if (statSync(full).isDirectory()) {
      throw Errors.notAFile(path);
    }
    try {
      return readFileSync(full, "utf8");
    } catch (error) {
      throw wrapError(error, path);
    }
  }

  write(path: string, content: string): void {
    try {
      writeFileSync(this.path(path), content, "utf8");
    } catch (error) {
      throw wrapError(error, path);
    }
  }

  exists(path: string): boolean {
    return existsSync(this.path(path));
  }
}
