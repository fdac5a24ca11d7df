import { decodeDirectory, decodeRequest, findSiblingCollision } from "@/lib/codec"
import { AppError, isAppError } from "@/lib/errors"
import { nextId } from "@/lib/utils"
import type { DirectoryEntry, FileSystemBindings } from "@/types/bindings"
import type { CollectionMeta, CollectionSorting } from "@/types/collections"
import type { CollectionNode, DirectoryNode, RequestNode, TreeState } from "@/types/tree"

// On-disk layout: one directory per collection and per Directory node, each with a manifest
// listing its children in order; one json file per Request.
export const ManifestFileName = ".directory.json"
export const RequestFileExtension = ".json"

export const joinPath = (...segments: string[]): string => segments.filter((segment) => segment !== "").join("/")

export const manifestPathOf = (directoryPath: string): string => joinPath(directoryPath, ManifestFileName)

export interface LoadedCollection {
  tree: TreeState
  description: string
  /** Entry path of each node relative to the collection directory */
  persisted: Record<string, string>
}

const isHidden = (name: string) => name.startsWith(".")

/**
 * Read a persisted collection below `collectionPath`, assigning fresh ids
 *
 * @throws AppError `DecodeError` for malformed files, or the I/O error of the failed read
 */
export async function loadCollectionTree(
  bindings: FileSystemBindings,
  collectionPath: string,
): Promise<LoadedCollection> {
  const nodes: Record<string, CollectionNode> = {}
  const persisted: Record<string, string> = {}
  let description = ""

  const loadRequest = async (entryPath: string, parentId: string): Promise<RequestNode> => {
    const location = joinPath(collectionPath, entryPath)
    const file = decodeRequest(await bindings.readFile(location), location)
    const node: RequestNode = { kind: "request", id: nextId(), parentId, ...file }
    nodes[node.id] = node
    persisted[node.id] = entryPath
    return node
  }

  const loadDirectory = async (entryPath: string, parentId: string | null, fallbackName: string) => {
    const location = joinPath(collectionPath, entryPath)
    const entries = await bindings.readDir(location)
    const hasManifest = entries.some((entry) => entry.kind === "file" && entry.name === ManifestFileName)
    const manifest = hasManifest
      ? decodeDirectory(await bindings.readFile(manifestPathOf(location)), manifestPathOf(location))
      : null

    const node: DirectoryNode = {
      kind: "directory",
      id: nextId(),
      name: manifest?.name ?? fallbackName,
      parentId,
      children: [],
    }
    nodes[node.id] = node
    persisted[node.id] = entryPath
    if (parentId === null) {
      description = manifest?.description ?? ""
    }

    const onDisk = new Map<string, DirectoryEntry>(
      entries.filter((entry) => !isHidden(entry.name)).map((entry) => [entry.name, entry]),
    )
    const listed = (manifest?.children ?? []).filter((name) => {
      if (!onDisk.has(name)) {
        console.warn(`[Layout] ${location}: listed entry "${name}" is missing, skipping`)
        return false
      }
      return true
    })
    const unlisted = Array.from(onDisk.keys())
      .filter((name) => !listed.includes(name))
      .sort()

    const siblings: CollectionNode[] = []
    for (const name of [...listed, ...unlisted]) {
      const entry = onDisk.get(name)
      if (!entry) {
        continue
      }
      const childPath = joinPath(entryPath, name)
      let child: CollectionNode
      if (entry.kind === "directory") {
        child = await loadDirectory(childPath, node.id, name)
      } else if (name.endsWith(RequestFileExtension)) {
        child = await loadRequest(childPath, node.id)
      } else {
        console.debug(`[Layout] ${location}: ignoring ${name}`)
        continue
      }
      const collision = findSiblingCollision(siblings, child)
      if (collision) {
        throw new AppError(
          "DecodeError",
          `${joinPath(collectionPath, childPath)}: name "${child.name}" collides with "${collision.name}"`,
          { location: joinPath(collectionPath, childPath) },
        )
      }
      siblings.push(child)
      node.children.push(child.id)
    }
    return node
  }

  const root = await loadDirectory("", null, collectionPath)
  return { tree: { rootId: root.id, nodes }, description, persisted }
}

/**
 * Total size of all files below `path`
 */
const sizeOf = async (bindings: FileSystemBindings, path: string): Promise<number> => {
  let total = 0
  for (const entry of await bindings.readDir(path)) {
    const entryPath = joinPath(path, entry.name)
    total += entry.kind === "directory" ? await sizeOf(bindings, entryPath) : (await bindings.stat(entryPath)).sizeBytes
  }
  return total
}

/**
 * Latest modification time of the collection: its manifest, or the directory itself
 */
const modifiedOf = async (bindings: FileSystemBindings, path: string): Promise<Date> => {
  try {
    return (await bindings.stat(manifestPathOf(path))).modified
  } catch (e) {
    if (isAppError(e, "FileNotFound")) {
      return (await bindings.stat(path)).modified
    }
    throw e
  }
}

const readCollectionName = async (bindings: FileSystemBindings, path: string): Promise<string> => {
  try {
    const manifestPath = manifestPathOf(path)
    return decodeDirectory(await bindings.readFile(manifestPath), manifestPath).name
  } catch (e) {
    if (isAppError(e, ["FileNotFound", "DecodeError"])) {
      return path
    }
    throw e
  }
}

/**
 * Describe every collection directory found at the root of `bindings`
 */
export async function listCollectionMetas(bindings: FileSystemBindings): Promise<CollectionMeta[]> {
  let entries: DirectoryEntry[]
  try {
    entries = await bindings.readDir("")
  } catch (e) {
    if (isAppError(e, "FileNotFound")) {
      return []
    }
    throw e
  }

  return Promise.all(
    entries
      .filter((entry) => entry.kind === "directory" && !isHidden(entry.name))
      .map(async (entry) => ({
        name: await readCollectionName(bindings, entry.name),
        path: entry.name,
        sizeBytes: await sizeOf(bindings, entry.name),
        modified: await modifiedOf(bindings, entry.name),
      })),
  )
}

const comparators: Record<CollectionSorting, (a: CollectionMeta, b: CollectionMeta) => number> = {
  recent: (a, b) => b.modified.getTime() - a.modified.getTime(),
  name: (a, b) => a.name.localeCompare(b.name),
  size: (a, b) => b.sizeBytes - a.sizeBytes,
}

export const sortCollectionMetas = (metas: CollectionMeta[], sorting: CollectionSorting): CollectionMeta[] =>
  [...metas].sort(comparators[sorting])
