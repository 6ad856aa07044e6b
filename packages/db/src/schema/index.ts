export * from "./blobs.js";
export * from "./chunks.js";
export * from "./columns.js";
