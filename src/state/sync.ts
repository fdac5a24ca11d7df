import { throttle } from "es-toolkit"

import { encodeDirectory, encodeRequest } from "@/lib/codec"
import { AppError, isAppError, toAppError } from "@/lib/errors"
import { ancestryOf, entryPathOf, find, iterSubtree } from "@/lib/tree"
import { createDirectoryNode } from "@/state/collections"
import { joinPath, loadCollectionTree, manifestPathOf } from "@/state/middleware/layout"
import type { ApplicationSliceCreator, StoreContext } from "@/types/application"
import { type CollectionCacheState, isCollectionDirty } from "@/types/collections"
import type { FlushFailure, FlushReason, FlushResult, SyncStateApi, SyncStateSlice } from "@/types/sync"
import { isFlushSuccess } from "@/types/sync"
import { isDirectory, isRequest } from "@/types/tree"

const isWithinPath = (path: string, directory: string) => path === directory || path.startsWith(`${directory}/`)

const replacePrefix = (paths: Record<string, string>, from: string, to: string) => {
  for (const [id, path] of Object.entries(paths)) {
    if (isWithinPath(path, from)) {
      paths[id] = `${to}${path.slice(from.length)}`
    }
  }
}

const parentPathOf = (path: string) => {
  const index = path.lastIndexOf("/")
  return index < 0 ? "" : path.slice(0, index)
}

const baseNameOf = (path: string) => path.slice(path.lastIndexOf("/") + 1)

const MovingPrefix = ".moving-"

const hasNewKeys = (previous: Record<string, unknown> | undefined, current: Record<string, unknown>) =>
  Object.keys(current).some((key) => !previous || !Object.hasOwn(previous, key))

/**
 * Write one flush pass for a snapshot of a collection. Never throws for I/O failures:
 * they are reported in the result and leave the affected nodes dirty.
 */
async function writeSnapshot(
  context: StoreContext,
  snapshot: CollectionCacheState,
  result: FlushResult,
): Promise<{ written: Set<string>; removedTombstones: Set<string>; persisted: Record<string, string> }> {
  const { bindings } = context
  const fullPath = (entryPath: string) => joinPath(snapshot.path, entryPath)
  const fail = (failure: Omit<FlushFailure, "error">, e: unknown) => {
    const error = toAppError(e, fullPath(failure.path))
    console.warn(`[SyncEngine] ${failure.operation} failed for ${fullPath(failure.path)}: ${error.message}`)
    result.failed.push({ ...failure, error })
  }

  const persisted: Record<string, string> = { ...snapshot.persisted }
  const written = new Set<string>()
  const removedTombstones = new Set<string>()
  const failedTombstonePaths: string[] = []

  // 1. Deleted nodes, parents before children so a removed directory covers its contents
  //
  const tombstones = Object.entries(snapshot.tombstones).sort(([, a], [, b]) => a.length - b.length)
  const removedPaths: string[] = []
  for (const [id, path] of tombstones) {
    if (removedPaths.some((removed) => isWithinPath(path, removed))) {
      removedTombstones.add(id)
      continue
    }
    try {
      await bindings.remove(fullPath(path))
      removedTombstones.add(id)
      removedPaths.push(path)
      result.removed.push(path)
    } catch (e) {
      failedTombstonePaths.push(path)
      fail({ id, path, operation: "remove" }, e)
    }
  }

  // 2. Renamed and moved nodes: first aside to a temporary name, then to the final path,
  // so swapped names never collide
  //
  const order = Array.from(iterSubtree(snapshot, snapshot.rootId))
  const relocating = order.filter(
    (node) =>
      Object.hasOwn(snapshot.dirty, node.id) &&
      persisted[node.id] !== undefined &&
      persisted[node.id] !== entryPathOf(snapshot, node.id),
  )
  const failedRelocations = new Set<string>()
  const staged: Array<{ id: string; from: string; entryName: string }> = []

  for (const node of relocating) {
    const from = persisted[node.id]
    const entryName = baseNameOf(from)
    const temp = joinPath(parentPathOf(from), `${MovingPrefix}${node.id}`)
    if (from === temp) {
      // Left aside by an earlier flush
      staged.push({ id: node.id, from, entryName })
      continue
    }
    try {
      await bindings.rename(fullPath(from), fullPath(temp))
      replacePrefix(persisted, from, temp)
      staged.push({ id: node.id, from: snapshot.persisted[node.id] ?? from, entryName })
    } catch (e) {
      if (isAppError(e, "FileNotFound")) {
        // Gone already, e.g. inside a removed directory; rewrite from memory
        delete persisted[node.id]
        continue
      }
      failedRelocations.add(node.id)
      fail({ id: node.id, path: from, operation: "move" }, e)
    }
  }

  // Put a node that cannot reach its new path back under its old name, inside wherever its parent is now
  const restore = async (id: string, entryName: string) => {
    const temp = persisted[id]
    const back = joinPath(parentPathOf(temp), entryName)
    if (back === temp) {
      return
    }
    try {
      await bindings.rename(fullPath(temp), fullPath(back))
      replacePrefix(persisted, temp, back)
    } catch (e) {
      fail({ id, path: temp, operation: "move" }, e)
    }
  }

  for (const { id, from, entryName } of staged) {
    if (ancestryOf(snapshot, id).some((ancestorId) => ancestorId !== id && failedRelocations.has(ancestorId))) {
      await restore(id, entryName)
      continue
    }
    const temp = persisted[id]
    const to = entryPathOf(snapshot, id)
    try {
      await bindings.rename(fullPath(temp), fullPath(to))
      replacePrefix(persisted, temp, to)
      result.moved.push({ from, to })
    } catch (e) {
      failedRelocations.add(id)
      fail({ id, path: to, operation: "move" }, e)
      await restore(id, entryName)
    }
  }

  // 3. Content of dirty nodes, in pre-order so directories exist before their children
  //
  const occupiedBy = (path: string, id: string) =>
    Object.entries(persisted).some(([otherId, otherPath]) => otherId !== id && otherPath === path)
  const blocked = new Set<string>()

  for (const node of order) {
    if (node.parentId !== null && blocked.has(node.parentId)) {
      blocked.add(node.id)
      continue
    }
    if (failedRelocations.has(node.id)) {
      blocked.add(node.id)
      continue
    }
    if (!Object.hasOwn(snapshot.dirty, node.id)) {
      continue
    }

    const path = entryPathOf(snapshot, node.id)
    if (occupiedBy(path, node.id) || failedTombstonePaths.some((removed) => isWithinPath(path, removed))) {
      blocked.add(node.id)
      fail({ id: node.id, path, operation: "write" }, new AppError("FileAlreadyExists", "path is still in use"))
      continue
    }

    try {
      if (isDirectory(node)) {
        if (node.children.some((childId) => failedRelocations.has(childId))) {
          // Keep listing the old entry names until the child has moved
          await bindings.mkdir(fullPath(path))
          persisted[node.id] = path
          continue
        }
        await bindings.mkdir(fullPath(path))
        const description = node.id === snapshot.rootId ? snapshot.description : undefined
        await bindings.writeFile(manifestPathOf(fullPath(path)), encodeDirectory(node, snapshot, description))
      } else {
        await bindings.writeFile(fullPath(path), encodeRequest(node))
      }
      persisted[node.id] = path
      written.add(node.id)
      result.written.push(node.id)
    } catch (e) {
      if (isDirectory(node)) {
        blocked.add(node.id)
      }
      fail({ id: node.id, path, operation: "write" }, e)
    }
  }

  return { written, removedTombstones, persisted }
}

export const createSyncSlice =
  (context: StoreContext): ApplicationSliceCreator<SyncStateSlice> =>
  (set, get, store) => {
    const { bindings, locks, settings } = context
    const autoSyncs = new Map<string, ReturnType<typeof throttle>>()
    let stopped = false

    const getCollectionOrThrow = (collectionId: string, caller: string): CollectionCacheState => {
      const cache = get().collectionsState.cache
      if (!Object.hasOwn(cache, collectionId)) {
        throw new AppError("CollectionNotOpen", `${caller} called with unopened collection.id: ${collectionId}`, {
          collectionId,
        })
      }
      return cache[collectionId]
    }

    const setFlushing = (collectionId: string, flushing: boolean) => {
      set((app) => {
        const collection = app.collectionsState.cache[collectionId]
        if (collection) {
          collection.flushing = flushing
        }
      })
    }

    // Caller holds the collection lock
    const flushLocked = async (collectionId: string, reason: FlushReason): Promise<FlushResult> => {
      const snapshot = getCollectionOrThrow(collectionId, "flush")
      const result: FlushResult = {
        collectionId,
        reason,
        skipped: false,
        written: [],
        removed: [],
        moved: [],
        failed: [],
      }
      if (!isCollectionDirty(snapshot)) {
        result.skipped = true
        return result
      }

      setFlushing(collectionId, true)
      try {
        const { written, removedTombstones, persisted } = await writeSnapshot(context, snapshot, result)
        set((app) => {
          const collection = app.collectionsState.cache[collectionId]
          if (!collection) {
            return
          }
          for (const id of written) {
            delete collection.dirty[id]
          }
          for (const id of removedTombstones) {
            delete collection.tombstones[id]
          }
          collection.persisted = Object.fromEntries(
            Object.entries(persisted).filter(([id]) => Object.hasOwn(collection.nodes, id)),
          )
          collection.stored = collection.stored || written.has(collection.rootId)
        })
      } finally {
        setFlushing(collectionId, false)
      }

      const summary = `${result.written.length} written, ${result.removed.length} removed, ${result.moved.length} moved`
      if (isFlushSuccess(result)) {
        console.info(`[SyncEngine] Flushed ${snapshot.path} (${reason}): ${summary}`)
      } else {
        console.warn(`[SyncEngine] Partially flushed ${snapshot.path} (${reason}): ${summary}, ${result.failed.length} failed`)
      }
      return result
    }

    const cancelAutoSync = (collectionId: string) => {
      autoSyncs.get(collectionId)?.cancel()
      autoSyncs.delete(collectionId)
    }

    const scheduleAutoSync = (collectionId: string) => {
      let autoSync = autoSyncs.get(collectionId)
      if (!autoSync) {
        autoSync = throttle(() => {
          console.debug(`[SyncEngine] Auto sync triggered for ${collectionId}`)
          syncApi.flush(collectionId, "autosync").catch((e: unknown) => {
            console.warn(`[SyncEngine] Auto sync of ${collectionId} failed`, e)
          })
        }, settings.autoSync.intervalMs)
        autoSyncs.set(collectionId, autoSync)
      }
      autoSync()
    }

    if (settings.autoSync.enabled) {
      store.subscribe(
        (app) => app.collectionsState.cache,
        (cache, previous) => {
          for (const [collectionId, collection] of Object.entries(cache)) {
            const before = Object.hasOwn(previous, collectionId) ? previous[collectionId] : undefined
            const changed = hasNewKeys(before?.dirty, collection.dirty) || hasNewKeys(before?.tombstones, collection.tombstones)
            if (changed && !stopped) {
              scheduleAutoSync(collectionId)
            }
          }
          for (const collectionId of Array.from(autoSyncs.keys())) {
            if (!Object.hasOwn(cache, collectionId)) {
              cancelAutoSync(collectionId)
            }
          }
        },
      )
    }

    const syncApi: SyncStateApi = {
      flush(collectionId, reason = "save") {
        return locks.runExclusive(collectionId, () => flushLocked(collectionId, reason), settings.lockTimeoutMs)
      },

      save(collectionId) {
        return syncApi.flush(collectionId, "save")
      },

      async navigate(collectionId, nodeId) {
        const collection = getCollectionOrThrow(collectionId, "navigate")
        const fromId = collection.selectedId
        let result: FlushResult | null = null
        if (fromId !== null && fromId !== nodeId) {
          const from = find(collection, fromId)
          if (isRequest(from) && Object.hasOwn(collection.dirty, from.id)) {
            console.debug(`[SyncEngine] Leaving dirty request "${from.name}", flushing ${collection.path}`)
            result = await syncApi.flush(collectionId, "navigation")
          }
        }
        get().collectionsApi.select(collectionId, nodeId)
        return result
      },

      async discardChanges(collectionId) {
        await locks.runExclusive(
          collectionId,
          async () => {
            const collection = getCollectionOrThrow(collectionId, "discardChanges")
            if (collection.stored) {
              const loaded = await loadCollectionTree(bindings, collection.path)
              set((app) => {
                const draft = app.collectionsState.cache[collectionId]
                draft.rootId = loaded.tree.rootId
                draft.nodes = loaded.tree.nodes
                draft.description = loaded.description
                draft.persisted = loaded.persisted
                draft.dirty = {}
                draft.tombstones = {}
                draft.selectedId = null
                draft.expanded = {}
              })
            } else {
              // Nothing on disk to go back to: an empty root that still needs writing
              const root = collection.nodes[collection.rootId]
              set((app) => {
                const draft = app.collectionsState.cache[collectionId]
                draft.nodes = { [root.id]: createDirectoryNode(root.id, root.name, null) }
                draft.description = ""
                draft.dirty = { [root.id]: true }
                draft.tombstones = {}
                draft.persisted = {}
                draft.selectedId = null
                draft.expanded = {}
              })
            }
            cancelAutoSync(collectionId)
            console.info(`[SyncEngine] Discarded changes to ${collection.path}`)
          },
          settings.lockTimeoutMs,
        )
      },

      async closeCollection(collectionId, options = {}) {
        await locks.runExclusive(
          collectionId,
          async () => {
            const collection = getCollectionOrThrow(collectionId, "closeCollection")
            if (isCollectionDirty(collection)) {
              if (options.onDirty === "flush") {
                const result = await flushLocked(collectionId, "close")
                if (!isFlushSuccess(result)) {
                  throw new AppError(
                    "FlushFailed",
                    `closeCollection: ${result.failed.length} change(s) to ${collection.path} could not be written`,
                    { collectionId },
                  )
                }
              } else if (options.onDirty !== "discard") {
                throw new AppError("UnsavedChanges", `closeCollection: ${collection.path} has unsaved changes`, {
                  collectionId,
                })
              }
            }
            set((app) => {
              delete app.collectionsState.cache[collectionId]
            })
          },
          settings.lockTimeoutMs,
        )
        cancelAutoSync(collectionId)
        locks.release(collectionId)
      },

      async shutdown() {
        stopped = true
        for (const collectionId of Array.from(autoSyncs.keys())) {
          cancelAutoSync(collectionId)
        }

        const collectionIds = Object.keys(get().collectionsState.cache)
        const settled = await Promise.allSettled(collectionIds.map((id) => syncApi.flush(id, "shutdown")))
        const errors = settled.filter((r): r is PromiseRejectedResult => r.status === "rejected")
        if (errors.length > 0) {
          throw new AggregateError(
            errors.map((e) => e.reason),
            "One or more collections failed to flush on shutdown",
          )
        }
        return settled.flatMap((r) => (r.status === "fulfilled" ? [r.value] : []))
      },

      status(collectionId) {
        const collection = getCollectionOrThrow(collectionId, "status")
        if (collection.flushing) {
          return "flushing"
        }
        return isCollectionDirty(collection) ? "dirty" : "clean"
      },

      whenIdle(collectionId) {
        return locks.runExclusive(collectionId, () => undefined, settings.lockTimeoutMs)
      },
    }

    return {
      syncApi,
    }
  }
