// File system exports
export { MemoryFileSystem } from "./vfs";
export { NodeFileSystem } from "./node-file-system";
