// @keystone/engine - reflection, spawning and scene lifecycle

export * from "./reflect";
export * from "./world";
export * from "./prefab";
export * from "./scene";
export * from "./vfs";
export * from "./signals";
