import type {
  CollectionNode,
  NodeKind,
  RequestField,
  RequestFieldValues,
  RequestHeaderInput,
  RequestSnapshot,
  ResponseSummary,
  TreeState,
} from "@/types/tree"

/**
 * An open collection. The tree is normalized: `nodes` holds every node reachable from `rootId`.
 */
export interface CollectionCacheState extends TreeState {
  id: string
  /** Directory name of the collection below the collections dir */
  path: string
  description: string
  /** Nodes changed since the last successful flush */
  dirty: Record<string, true>
  /** Deleted nodes that still exist on disk, with their entry path */
  tombstones: Record<string, string>
  /** Entry path of each node as of the last load or flush, relative to `path` */
  persisted: Record<string, string>
  /** Whether the collection has ever been written or was loaded from disk */
  stored: boolean
  /** Focused node; not persisted */
  selectedId: string | null
  /** Expanded directories; not persisted */
  expanded: Record<string, true>
  flushing: boolean
}

export interface CollectionsState {
  cache: Record<string, CollectionCacheState>
}

export type CollectionSorting = "recent" | "name" | "size"
export const CollectionSortings: readonly CollectionSorting[] = ["recent", "name", "size"]

export interface CollectionMeta {
  name: string
  path: string
  sizeBytes: number
  modified: Date
}

export interface CreateNodeOptions {
  /** Index in the parent's children. Appends when omitted. */
  position?: number
  /** Initial request fields, ignored for directories */
  request?: Partial<RequestFieldValues>
}

export interface UpdateResult {
  /** False when the new value equals the current one */
  changed: boolean
  /** The request has a body its method conventionally does not send */
  bodyIgnored: boolean
}

export interface CollectionsStateApi {
  /**
   * Initialize a new, empty collection. Nothing is written until the first flush.
   * @param name - Display name, also used to derive the directory name
   * @param description
   */
  createCollection(name: string, description?: string): Promise<CollectionCacheState>

  /**
   * Load a persisted collection. Returns the already open collection for the same path.
   * @throws AppError `DecodeError` when a file is malformed, `FileNotFound` when the path does not exist
   */
  openCollection(path: string): Promise<CollectionCacheState>

  /**
   * Create a new collection from a document produced by `exportCollection`
   */
  importCollection(data: Uint8Array, name?: string): Promise<CollectionCacheState>

  exportCollection(collectionId: string): Uint8Array

  /**
   * Persisted collections in the collections directory
   */
  listCollections(sorting?: CollectionSorting): Promise<CollectionMeta[]>

  /**
   * Close (discarding changes) and remove a collection from disk
   */
  deleteCollection(collectionId: string): Promise<void>

  /**
   * @throws AppError `CollectionNotOpen`
   */
  getCollection(collectionId: string): CollectionCacheState

  createNode(
    collectionId: string,
    parentId: string,
    kind: NodeKind,
    name: string,
    options?: CreateNodeOptions,
  ): Promise<string>

  renameNode(collectionId: string, nodeId: string, name: string): Promise<void>

  moveNode(collectionId: string, nodeId: string, parentId: string, position?: number): Promise<void>

  /**
   * Reorder a directory's children. Unknown ids are ignored, unlisted children keep their order at the end.
   */
  reorderChildren(collectionId: string, parentId: string, orderedIds: string[]): Promise<void>

  deleteNode(collectionId: string, nodeId: string): Promise<void>

  updateRequest<K extends RequestField>(
    collectionId: string,
    requestId: string,
    field: K,
    value: RequestFieldValues[K],
  ): Promise<UpdateResult>

  updateDescription(collectionId: string, description: string): Promise<void>

  addHeader(collectionId: string, requestId: string, header: RequestHeaderInput): Promise<UpdateResult>
  updateHeader(
    collectionId: string,
    requestId: string,
    index: number,
    patch: Partial<RequestHeaderInput>,
  ): Promise<UpdateResult>
  removeHeader(collectionId: string, requestId: string, index: number): Promise<UpdateResult>

  /**
   * Cache the latest response against a request. Never marks anything dirty.
   */
  attachResponse(collectionId: string, requestId: string, response: ResponseSummary): void
  clearResponse(collectionId: string, requestId: string): void

  /** Move focus. The sync engine's `navigate` applies the forced flush first. */
  select(collectionId: string, nodeId: string | null): void
  setExpanded(collectionId: string, directoryId: string, expanded: boolean): void

  ///
  /// Queries
  ///
  isDirty(collectionId: string, nodeId: string): boolean
  anyDirty(collectionId: string): boolean
  getNode(collectionId: string, nodeId: string): CollectionNode | undefined
  /** Immutable view of a request for the HTTP executor */
  getRequestSnapshot(collectionId: string, requestId: string): RequestSnapshot
  pathOf(collectionId: string, nodeId: string): string[]
  iterSubtree(collectionId: string, nodeId?: string): Generator<CollectionNode, void, undefined>
  listVisible(collectionId: string): CollectionNode[]
  nextVisible(collectionId: string, fromId: string | null): string | null
  prevVisible(collectionId: string, fromId: string | null): string | null
}

export interface CollectionsStateSlice {
  collectionsState: CollectionsState
  collectionsApi: CollectionsStateApi
}

/**
 * Derived collection-level dirty flag
 */
export const isCollectionDirty = (collection: Pick<CollectionCacheState, "dirty" | "tombstones">): boolean =>
  Object.keys(collection.dirty).length > 0 || Object.keys(collection.tombstones).length > 0

export const nextSorting = (sorting: CollectionSorting): CollectionSorting =>
  CollectionSortings[(CollectionSortings.indexOf(sorting) + 1) % CollectionSortings.length]

export const prevSorting = (sorting: CollectionSorting): CollectionSorting =>
  CollectionSortings[(CollectionSortings.indexOf(sorting) + CollectionSortings.length - 1) % CollectionSortings.length]
