export { createTempRoot, removeDir, withTempDir, withTempFileStore } from "./fs.js";
export type { BlobOperation, BlobCall } from "./recording-store.js";
export { RecordingBlobStore } from "./recording-store.js";
