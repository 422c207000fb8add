import { describe, it, expect, beforeEach } from "vitest";
import { ErrorCode, FileSystemError } from "@keystone/core";
import { MemoryFileSystem } from "./";

describe("MemoryFileSystem", () => {
  let fs: MemoryFileSystem;

  beforeEach(() => {
    fs = new MemoryFileSystem();
  });

  it("seeds files and their directories from the constructor", () => {
    const seeded = new MemoryFileSystem({ "prefabs/orc.prefab": "Orc { }" });

    expect(seeded.read("/prefabs/orc.prefab")).toBe("Orc { }");
    expect(seeded.exists("/prefabs")).toBe(true);
  });

  it("normalizes relative paths from the root", () => {
    expect(fs.normalizePath("levels//./one.scene")).toBe("/levels/one.scene");
    expect(fs.normalizePath("/a/b/../../..")).toBe("/");
  });

  describe("mkdir", () => {
    it("creates nested directories one at a time", () => {
      fs.mkdir("/a");
      fs.mkdir("/a/b");
      expect(fs.exists("/a/b")).toBe(true);
    });

    it("creates missing parents when recursive", () => {
      fs.mkdir("/x/y/z", { recursive: true });
      expect(fs.exists("/x/y")).toBe(true);
      expect(fs.exists("/x/y/z")).toBe(true);
    });

    it("throws when creating an existing directory", () => {
      fs.mkdir("/test");
      expect(() => fs.mkdir("/test")).toThrow("Path already exists: /test");
    });

    it("refuses to create a directory below a file", () => {
      fs.write("/note.txt", "hi");
      expect(() => fs.mkdir("/note.txt/sub", { recursive: true })).toThrow("Not a directory: /note.txt");
    });
  });

  describe("write and read", () => {
    it("creates, overwrites and reads a file", () => {
      fs.write("/a.prefab", "A { }");
      fs.write("/a.prefab", "B { }");
      expect(fs.read("/a.prefab")).toBe("B { }");
    });

    it("reads through equivalent spellings of a path", () => {
      fs.mkdir("/levels");
      fs.write("levels/one.scene", "A { }");

      expect(fs.read("/levels/one.scene")).toBe("A { }");
      expect(fs.read("./../levels//one.scene")).toBe("A { }");
    });

    it("throws FileSystemError for a missing file", () => {
      let caught: unknown;
      try {
        fs.read("/missing.prefab");
      } catch (e) {
        caught = e;
      }

      expect(caught).toBeInstanceOf(FileSystemError);
      if (caught instanceof FileSystemError) {
        expect(caught.code).toBe(ErrorCode.FILE_NOT_FOUND);
        expect(caught.path).toBe("/missing.prefab");
      }
    });

    it("throws when reading or overwriting a directory", () => {
      fs.mkdir("/dir");
      expect(() => fs.read("/dir")).toThrow("Not a file: /dir");
      expect(() => fs.write("/dir", "x")).toThrow("Not a file: /dir");
    });

    it("throws when the parent directory is missing", () => {
      expect(() => fs.write("/nope/a.txt", "x")).toThrow("Invalid path: /nope/a.txt");
    });
  });
});
