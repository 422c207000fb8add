// In-memory file system for tools and tests

import { Errors, type FileSystem } from "@keystone/core";

function parentOf(normalized: string): string {
  const slash = normalized.lastIndexOf("/");
  return slash <= 0 ? "/" : normalized.slice(0, slash);
}

/**
 * Flat map of absolute paths to file contents plus the set of directories
 * that exist. Relative paths resolve from the root.
 */
export class MemoryFileSystem implements FileSystem {
  private files: Map<string, string> = new Map();
  private directories: Set<string> = new Set(["/"]);

  /** Seed files by path; missing parent directories are created */
  constructor(files: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(files)) {
      this.writeFile(path, content, { createParents: true });
    }
  }

  // Absolute form with ".", ".." and duplicate slashes resolved
  normalizePath(path: string): string {
    const parts: string[] = [];
    for (const part of path.split("/")) {
      if (part === "" || part === ".") continue;
      if (part === "..") {
        parts.pop();
      } else {
        parts.push(part);
      }
    }
    return "/" + parts.join("/");
  }

  read(path: string): string {
    const normalized = this.normalizePath(path);
    const content = this.files.get(normalized);
    if (content !== undefined) return content;
    if (this.directories.has(normalized)) {
      throw Errors.notAFile(path);
    }
    throw Errors.fileNotFound(path);
  }

  write(path: string, content: string): void {
    this.writeFile(path, content);
  }

  exists(path: string): boolean {
    const normalized = this.normalizePath(path);
    return this.files.has(normalized) || this.directories.has(normalized);
  }

  writeFile(path: string, content: string, options: { createParents?: boolean } = {}): void {
    const normalized = this.normalizePath(path);
    if (this.directories.has(normalized)) {
      throw Errors.notAFile(path);
    }

    const parent = parentOf(normalized);
    if (options.createParents) {
      this.mkdir(parent, { recursive: true });
    }
    if (!this.directories.has(parent)) {
      throw Errors.invalidPath(path);
    }
    this.files.set(normalized, content);
  }

  mkdir(path: string, options: { recursive?: boolean } = {}): void {
    const normalized = this.normalizePath(path);

    if (options.recursive) {
      let current = "";
      for (const part of normalized.split("/").filter((p) => p.length > 0)) {
        current += "/" + part;
        if (this.files.has(current)) {
          throw Errors.notADirectory(current);
        }
        this.directories.add(current);
      }
      return;
    }

    if (!this.directories.has(parentOf(normalized))) {
      throw Errors.invalidPath(path);
    }
    if (this.exists(normalized)) {
      throw Errors.pathExists(path);
    }
    this.directories.add(normalized);
  }
}
