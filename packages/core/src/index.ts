// @keystone/core - shared types for prefab and scene tooling

export * from "./tokens";
export * from "./values";
export * from "./ast";
export * from "./errors";
export * from "./diagnostics";
export * from "./file-system";
