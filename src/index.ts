export { DirFs } from "./fs/dir-fs/dir-fs.js";
export { MapFs } from "./fs/map-fs/map-fs.js";
export {
  isVfsError,
  VfsError,
  type VfsErrorCode,
  type VfsErrorOptions,
} from "./fs/errors.js";
export type {
  HostEntryKind,
  HostStorage,
} from "./fs/host-storage/host-storage.js";
export { NodeHostStorage } from "./fs/host-storage/node-host-storage.js";
export type {
  BufferEncoding,
  ContentLocation,
  DirectoryEntry,
  DirFsOptions,
  Entry,
  EntryType,
  ExistingFilePolicy,
  FileContent,
  FileEntry,
  InitialFiles,
  MapFsOptions,
  VfsLogger,
  VirtualFs,
} from "./fs/interface.js";
export {
  comparePaths,
  normalizePath,
  parentPath,
  resolvePath,
  ROOT,
} from "./fs/path.js";
