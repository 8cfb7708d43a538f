/**
 * Store Module - Public API
 */

export type { StateFile } from "./schema.js";
export type { StoreError } from "./errors.js";
export type { FileStateStore } from "./service.js";

export { StateFileSchema } from "./schema.js";
export { formatStoreError } from "./errors.js";
export { createFileStateStore } from "./service.js";
