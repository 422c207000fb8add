// Synchronous file access used by registries and writers.
// Implementations throw FileSystemError on failure.

export interface FileSystem {
  read(path: string): string;
  write(path: string, content: string): void;
  exists(path: string): boolean;
}
