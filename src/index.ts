export { createFsBindings } from "@/bindings/fs"
export { createMemoryBindings, type MemoryBindings, type MemoryOperation } from "@/bindings/memory"
export {
  CodecFormat,
  CodecVersion,
  decode,
  decodeDirectory,
  decodeCollection,
  decodeRequest,
  type DecodedCollection,
  encode,
  encodeDirectory,
  encodeRequest,
  toEncodedTree,
  type EncodedTreeNode,
} from "@/lib/codec"
export { AppError, type ErrorKind, isAppError } from "@/lib/errors"
export { createCollectionLocks, type CollectionLocks } from "@/lib/locks"
export {
  ancestryOf,
  entryNameOf,
  entryPathOf,
  find,
  isDescendantOf,
  iterSubtree,
  nextVisible,
  pathOf,
  prevVisible,
  visibleNodes,
} from "@/lib/tree"
export { formatByteSize, sanitizeFileName } from "@/lib/utils"
export * from "@/state"
export * from "@/types"
