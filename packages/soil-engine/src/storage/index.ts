export * from "./types.js";
export * from "./memory-storage.js";
export * from "./json-file-storage.js";
