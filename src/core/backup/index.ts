/**
 * Backup module exports
 */

export {
  BackupManager,
  type BackupManagerOptions,
  SAFETY_SNAPSHOT_DESCRIPTION,
} from "./manager";
export { compressionRatio, metadataPathFor, readSidecar, type Sidecar, writeSidecar } from "./metadata";
export { getPruneCandidates, type SnapshotFile } from "./retention";
export {
  type CompressResult,
  compressFile,
  decompressFile,
  type InspectResult,
  inspectSnapshot,
} from "./snapshot-writer";
