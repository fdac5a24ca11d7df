import { isEqual } from "es-toolkit"
import { z } from "zod"

import { decodeCollection, encode, findSiblingCollision } from "@/lib/codec"
import { AppError } from "@/lib/errors"
import {
  find,
  isDescendantOf,
  iterSubtree,
  nextVisible,
  pathOf,
  prevVisible,
  visibleNodes,
} from "@/lib/tree"
import { assert, nextId, sanitizeFileName } from "@/lib/utils"
import { listCollectionMetas, loadCollectionTree, sortCollectionMetas } from "@/state/middleware/layout"
import type { ApplicationSliceCreator, StoreContext } from "@/types/application"
import {
  type CollectionCacheState,
  type CollectionsStateApi,
  type CollectionsStateSlice,
  isCollectionDirty,
  type UpdateResult,
} from "@/types/collections"
import {
  type CollectionNode,
  type DirectoryNode,
  isDirectory,
  isRequest,
  methodAllowsBody,
  type NodeKind,
  type RequestNode,
  type TreeState,
  zRequestFields,
} from "@/types/tree"

///
/// Validation helpers. Each throws an AppError and is called before the tree is touched.
///

const requireNode = (collection: TreeState, nodeId: string, caller: string): CollectionNode => {
  const node = find(collection, nodeId)
  if (!node) {
    throw new AppError("NodeNotFound", `${caller} called with unknown node.id: ${nodeId}`, { nodeId })
  }
  return node
}

const requireDirectory = (collection: TreeState, nodeId: string, caller: string): DirectoryNode => {
  const node = requireNode(collection, nodeId, caller)
  if (!isDirectory(node)) {
    throw new AppError("InvalidParent", `${caller}: "${node.name}" is not a directory`, { nodeId })
  }
  return node
}

const requireRequest = (collection: TreeState, nodeId: string, caller: string): RequestNode => {
  const node = requireNode(collection, nodeId, caller)
  if (!isRequest(node)) {
    throw new AppError("NotARequest", `${caller}: "${node.name}" is not a request`, { nodeId })
  }
  return node
}

const validateName = (name: string, caller: string): string => {
  const trimmed = name.trim()
  if (trimmed.length === 0) {
    throw new AppError("InvalidName", `${caller}: name cannot be empty`)
  }
  return trimmed
}

const assertNoSiblingCollision = (
  collection: TreeState,
  parent: DirectoryNode,
  candidate: { kind: NodeKind; name: string },
  caller: string,
  ignoreId?: string,
) => {
  const siblings = parent.children.flatMap((childId) => {
    const child = childId === ignoreId ? undefined : find(collection, childId)
    return child ? [child] : []
  })
  const collision = findSiblingCollision(siblings, candidate)
  if (collision) {
    throw new AppError(
      "NameCollision",
      `${caller}: "${candidate.name}" collides with "${collision.name}" in "${parent.name}"`,
      { parentId: parent.id, name: candidate.name },
    )
  }
}

const zRequestPatch = z.object(zRequestFields).partial()
type RequestPatch = z.infer<typeof zRequestPatch>

const parseRequestPatch = (input: unknown, caller: string): RequestPatch => {
  const parsed = zRequestPatch.safeParse(input)
  if (!parsed.success) {
    const [issue] = parsed.error.issues
    const field = issue.path.map(String).join(".")
    throw new AppError(
      issue.path[0] === "headers" ? "InvalidHeader" : "InvalidValue",
      `${caller}: ${field}: ${issue.message}`,
      { field },
    )
  }
  return parsed.data
}

/**
 * Apply validated fields to a request draft
 * @returns whether anything changed
 */
const applyRequestPatch = (request: RequestNode, patch: RequestPatch): boolean => {
  let changed = false
  if (patch.method !== undefined && patch.method !== request.method) {
    request.method = patch.method
    changed = true
  }
  if (patch.url !== undefined && patch.url !== request.url) {
    request.url = patch.url
    changed = true
  }
  if (patch.headers !== undefined && !isEqual(patch.headers, request.headers)) {
    request.headers = patch.headers
    changed = true
  }
  if (patch.body !== undefined && patch.body !== request.body) {
    request.body = patch.body
    changed = true
  }
  if (patch.bodyType !== undefined && patch.bodyType !== request.bodyType) {
    request.bodyType = patch.bodyType
    changed = true
  }
  if (patch.authMethod !== undefined && patch.authMethod !== request.authMethod) {
    request.authMethod = patch.authMethod
    changed = true
  }
  return changed
}

const markDirty = (collection: CollectionCacheState, ...nodeIds: string[]) => {
  for (const nodeId of nodeIds) {
    collection.dirty[nodeId] = true
  }
}

const clampPosition = (position: number | undefined, length: number) =>
  position === undefined ? length : Math.max(0, Math.min(Math.trunc(position), length))

export const createDirectoryNode = (id: string, name: string, parentId: string | null): DirectoryNode => ({
  kind: "directory",
  id,
  name,
  parentId,
  children: [],
})

/**
 * A freshly initialized or imported collection: everything is dirty, nothing is on disk
 */
const createUnsavedCollection = (path: string, tree: TreeState, description: string): CollectionCacheState => ({
  id: nextId(),
  path,
  description,
  rootId: tree.rootId,
  nodes: tree.nodes,
  dirty: Object.fromEntries(Object.keys(tree.nodes).map((nodeId) => [nodeId, true as const])),
  tombstones: {},
  persisted: {},
  stored: false,
  selectedId: null,
  expanded: {},
  flushing: false,
})

// Collection ids never contain ":"
const LifecycleLockId = "collections:lifecycle"

export const createCollectionsSlice =
  (context: StoreContext): ApplicationSliceCreator<CollectionsStateSlice> =>
  (set, get) => {
    const { bindings, locks, settings } = context

    const openCollections = () => get().collectionsState.cache

    const getCollectionOrThrow = (collectionId: string, caller: string): CollectionCacheState => {
      const cache = openCollections()
      if (!Object.hasOwn(cache, collectionId)) {
        throw new AppError("CollectionNotOpen", `${caller} called with unopened collection.id: ${collectionId}`, {
          collectionId,
        })
      }
      return cache[collectionId]
    }

    /**
     * Run one mutation under the collection lock. The recipe validates before it changes
     * anything; a throw leaves the state untouched.
     */
    const mutate = <T>(
      collectionId: string,
      caller: string,
      recipe: (collection: CollectionCacheState) => T,
    ): Promise<T> =>
      locks.runExclusive(
        collectionId,
        () => {
          getCollectionOrThrow(collectionId, caller)
          const outcome: T[] = []
          set((app) => {
            outcome.push(recipe(app.collectionsState.cache[collectionId]))
          })
          assert(outcome.length === 1, `${caller} produced no result`)
          return outcome[0]
        },
        settings.lockTimeoutMs,
      )

    /**
     * Create, open and import check the cache, await storage, then add. They run one at a time so two
     * calls never bind the same directory to two collections.
     */
    const lifecycle = <T>(task: () => Promise<T>): Promise<T> =>
      locks.runExclusive(LifecycleLockId, task, settings.lockTimeoutMs)

    const uniqueCollectionPath = async (name: string): Promise<string> => {
      const base = sanitizeFileName(name) || "collection"
      const taken = new Set(Object.values(openCollections()).map((collection) => collection.path))
      let candidate = base
      for (let suffix = 2; taken.has(candidate) || (await bindings.exists(candidate)); suffix += 1) {
        candidate = `${base}-${suffix}`
      }
      return candidate
    }

    const addCollection = (collection: CollectionCacheState): CollectionCacheState => {
      set((app) => {
        app.collectionsState.cache[collection.id] = collection
      })
      return get().collectionsState.cache[collection.id]
    }

    const updateRequestWith = (
      collectionId: string,
      requestId: string,
      caller: string,
      build: (request: RequestNode) => unknown,
    ): Promise<UpdateResult> =>
      mutate(collectionId, caller, (collection) => {
        const request = requireRequest(collection, requestId, caller)
        const patch = parseRequestPatch(build(request), caller)
        const changed = applyRequestPatch(request, patch)
        if (changed) {
          markDirty(collection, request.id)
        }
        return { changed, bodyIgnored: request.body !== "" && !methodAllowsBody(request.method) }
      })

    const requireHeaderIndex = (request: RequestNode, index: number, caller: string) => {
      if (!Number.isInteger(index) || index < 0 || index >= request.headers.length) {
        throw new AppError("InvalidValue", `${caller}: no header at index ${index}`, { index: String(index) })
      }
    }

    const collectionsApi: CollectionsStateApi = {
      async createCollection(name: string, description = "") {
        const rootName = validateName(name, "createCollection")
        return lifecycle(async () => {
          const path = await uniqueCollectionPath(rootName)
          const rootId = nextId()
          const tree: TreeState = { rootId, nodes: { [rootId]: createDirectoryNode(rootId, rootName, null) } }
          console.debug(`[Collections] Created collection "${rootName}" at ${path}`)
          return addCollection(createUnsavedCollection(path, tree, description))
        })
      },

      openCollection(path: string) {
        return lifecycle(async () => {
          const existing = Object.values(openCollections()).find((collection) => collection.path === path)
          if (existing) {
            return existing
          }

          const loaded = await loadCollectionTree(bindings, path)
          console.debug(`[Collections] Opened collection ${path} with ${Object.keys(loaded.tree.nodes).length} nodes`)
          return addCollection({
            id: nextId(),
            path,
            description: loaded.description,
            rootId: loaded.tree.rootId,
            nodes: loaded.tree.nodes,
            dirty: {},
            tombstones: {},
            persisted: loaded.persisted,
            stored: true,
            selectedId: null,
            expanded: {},
            flushing: false,
          })
        })
      },

      async importCollection(data: Uint8Array, name?: string) {
        const { tree, description } = decodeCollection(data, "<import>")
        const root = tree.nodes[tree.rootId]
        if (name !== undefined) {
          root.name = validateName(name, "importCollection")
        }
        return lifecycle(async () => {
          const path = await uniqueCollectionPath(root.name)
          return addCollection(createUnsavedCollection(path, tree, description))
        })
      },

      exportCollection(collectionId: string) {
        return encode(getCollectionOrThrow(collectionId, "exportCollection"))
      },

      async listCollections(sorting = "recent") {
        return sortCollectionMetas(await listCollectionMetas(bindings), sorting)
      },

      async deleteCollection(collectionId: string) {
        await locks.runExclusive(
          collectionId,
          async () => {
            const collection = getCollectionOrThrow(collectionId, "deleteCollection")
            await bindings.remove(collection.path)
            set((app) => {
              delete app.collectionsState.cache[collectionId]
            })
            console.info(`[Collections] Deleted collection ${collection.path}`)
          },
          settings.lockTimeoutMs,
        )
        locks.release(collectionId)
      },

      getCollection(collectionId: string) {
        return getCollectionOrThrow(collectionId, "getCollection")
      },

      createNode(collectionId, parentId, kind, name, options = {}) {
        return mutate(collectionId, "createNode", (collection) => {
          const parent = requireDirectory(collection, parentId, "createNode")
          const nodeName = validateName(name, "createNode")
          assertNoSiblingCollision(collection, parent, { kind, name: nodeName }, "createNode")

          const id = nextId()
          let node: CollectionNode
          if (kind === "directory") {
            node = createDirectoryNode(id, nodeName, parent.id)
          } else {
            const init = parseRequestPatch(options.request ?? {}, "createNode")
            node = {
              kind: "request",
              id,
              name: nodeName,
              parentId: parent.id,
              method: init.method ?? "GET",
              url: init.url ?? "",
              headers: init.headers ?? [],
              body: init.body ?? "",
              bodyType: init.bodyType ?? "text",
              authMethod: init.authMethod ?? "none",
            }
          }

          collection.nodes[id] = node
          parent.children.splice(clampPosition(options.position, parent.children.length), 0, id)
          markDirty(collection, id, parent.id)
          return id
        })
      },

      renameNode(collectionId, nodeId, name) {
        return mutate(collectionId, "renameNode", (collection) => {
          const node = requireNode(collection, nodeId, "renameNode")
          const nodeName = validateName(name, "renameNode")
          if (node.name === nodeName) {
            return
          }
          if (node.parentId !== null) {
            const parent = requireDirectory(collection, node.parentId, "renameNode")
            assertNoSiblingCollision(collection, parent, { kind: node.kind, name: nodeName }, "renameNode", node.id)
            // The parent manifest lists entry names
            markDirty(collection, parent.id)
          }
          node.name = nodeName
          markDirty(collection, node.id)
        })
      },

      moveNode(collectionId, nodeId, parentId, position) {
        return mutate(collectionId, "moveNode", (collection) => {
          const node = requireNode(collection, nodeId, "moveNode")
          if (node.parentId === null) {
            throw new AppError("InvalidParent", "moveNode: cannot move the collection root", { nodeId })
          }
          if (parentId === nodeId || isDescendantOf(collection, parentId, nodeId)) {
            throw new AppError("CyclicMove", `moveNode: cannot move "${node.name}" into itself or its descendant`, {
              nodeId,
              parentId,
            })
          }
          const target = requireDirectory(collection, parentId, "moveNode")
          const source = requireDirectory(collection, node.parentId, "moveNode")

          if (source.id === target.id) {
            if (position === undefined) {
              return
            }
            const order = source.children.filter((childId) => childId !== nodeId)
            order.splice(clampPosition(position, order.length), 0, nodeId)
            if (!isEqual(order, source.children)) {
              source.children = order
              markDirty(collection, source.id)
            }
            return
          }

          assertNoSiblingCollision(collection, target, node, "moveNode")
          const subtree = Array.from(iterSubtree(collection, nodeId), (child) => child.id)

          source.children = source.children.filter((childId) => childId !== nodeId)
          target.children.splice(clampPosition(position, target.children.length), 0, nodeId)
          node.parentId = target.id
          markDirty(collection, source.id, target.id, ...subtree)
        })
      },

      reorderChildren(collectionId, parentId, orderedIds) {
        return mutate(collectionId, "reorderChildren", (collection) => {
          const parent = requireDirectory(collection, parentId, "reorderChildren")
          const allowed = orderedIds.filter((id, index) => parent.children.includes(id) && orderedIds.indexOf(id) === index)
          const remaining = parent.children.filter((id) => !allowed.includes(id))
          const order = [...allowed, ...remaining]
          if (!isEqual(order, parent.children)) {
            parent.children = order
            markDirty(collection, parent.id)
          }
        })
      },

      deleteNode(collectionId, nodeId) {
        return mutate(collectionId, "deleteNode", (collection) => {
          const node = requireNode(collection, nodeId, "deleteNode")
          if (node.parentId === null) {
            throw new AppError("DeleteRoot", "deleteNode: cannot delete the collection root", { nodeId })
          }
          const parent = requireDirectory(collection, node.parentId, "deleteNode")
          const subtree = Array.from(iterSubtree(collection, nodeId), (child) => child.id)

          parent.children = parent.children.filter((childId) => childId !== nodeId)
          for (const id of subtree) {
            const persistedPath = collection.persisted[id]
            if (persistedPath !== undefined) {
              collection.tombstones[id] = persistedPath
              delete collection.persisted[id]
            }
            delete collection.nodes[id]
            delete collection.dirty[id]
            delete collection.expanded[id]
          }
          if (collection.selectedId !== null && subtree.includes(collection.selectedId)) {
            collection.selectedId = null
          }
          markDirty(collection, parent.id)
        })
      },

      updateRequest(collectionId, requestId, field, value) {
        return updateRequestWith(collectionId, requestId, "updateRequest", () => ({ [field]: value }))
      },

      updateDescription(collectionId, description) {
        return mutate(collectionId, "updateDescription", (collection) => {
          if (collection.description !== description) {
            collection.description = description
            markDirty(collection, collection.rootId)
          }
        })
      },

      addHeader(collectionId, requestId, header) {
        return updateRequestWith(collectionId, requestId, "addHeader", (request) => ({
          headers: [...request.headers, header],
        }))
      },

      updateHeader(collectionId, requestId, index, patch) {
        return updateRequestWith(collectionId, requestId, "updateHeader", (request) => {
          requireHeaderIndex(request, index, "updateHeader")
          return {
            headers: request.headers.map((header, i) => (i === index ? { ...header, ...patch } : header)),
          }
        })
      },

      removeHeader(collectionId, requestId, index) {
        return updateRequestWith(collectionId, requestId, "removeHeader", (request) => {
          requireHeaderIndex(request, index, "removeHeader")
          return { headers: request.headers.filter((_, i) => i !== index) }
        })
      },

      attachResponse(collectionId, requestId, response) {
        requireRequest(getCollectionOrThrow(collectionId, "attachResponse"), requestId, "attachResponse")
        set((app) => {
          const request = app.collectionsState.cache[collectionId].nodes[requestId]
          if (isRequest(request)) {
            request.lastResponse = response
          }
        })
      },

      clearResponse(collectionId, requestId) {
        requireRequest(getCollectionOrThrow(collectionId, "clearResponse"), requestId, "clearResponse")
        set((app) => {
          const request = app.collectionsState.cache[collectionId].nodes[requestId]
          if (isRequest(request)) {
            delete request.lastResponse
          }
        })
      },

      select(collectionId, nodeId) {
        const collection = getCollectionOrThrow(collectionId, "select")
        if (nodeId !== null) {
          requireNode(collection, nodeId, "select")
        }
        set((app) => {
          app.collectionsState.cache[collectionId].selectedId = nodeId
        })
      },

      setExpanded(collectionId, directoryId, expanded) {
        requireDirectory(getCollectionOrThrow(collectionId, "setExpanded"), directoryId, "setExpanded")
        set((app) => {
          const collection = app.collectionsState.cache[collectionId]
          if (expanded) {
            collection.expanded[directoryId] = true
          } else {
            delete collection.expanded[directoryId]
          }
        })
      },

      isDirty(collectionId, nodeId) {
        return Object.hasOwn(getCollectionOrThrow(collectionId, "isDirty").dirty, nodeId)
      },

      anyDirty(collectionId) {
        return isCollectionDirty(getCollectionOrThrow(collectionId, "anyDirty"))
      },

      getNode(collectionId, nodeId) {
        return find(getCollectionOrThrow(collectionId, "getNode"), nodeId)
      },

      getRequestSnapshot(collectionId, requestId) {
        const request = requireRequest(
          getCollectionOrThrow(collectionId, "getRequestSnapshot"),
          requestId,
          "getRequestSnapshot",
        )
        const { id, name, method, url, headers, body, bodyType, authMethod } = request
        return Object.freeze({ id, name, method, url, headers, body, bodyType, authMethod })
      },

      pathOf(collectionId, nodeId) {
        return pathOf(getCollectionOrThrow(collectionId, "pathOf"), nodeId)
      },

      iterSubtree(collectionId, nodeId) {
        const collection = getCollectionOrThrow(collectionId, "iterSubtree")
        return iterSubtree(collection, nodeId ?? collection.rootId)
      },

      listVisible(collectionId) {
        const collection = getCollectionOrThrow(collectionId, "listVisible")
        return visibleNodes(collection, new Set(Object.keys(collection.expanded)))
      },

      nextVisible(collectionId, fromId) {
        const collection = getCollectionOrThrow(collectionId, "nextVisible")
        return nextVisible(collection, new Set(Object.keys(collection.expanded)), fromId)
      },

      prevVisible(collectionId, fromId) {
        const collection = getCollectionOrThrow(collectionId, "prevVisible")
        return prevVisible(collection, new Set(Object.keys(collection.expanded)), fromId)
      },
    }

    return {
      collectionsState: {
        cache: {},
      },
      collectionsApi,
    }
  }
