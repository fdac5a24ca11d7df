import { AppError } from "@/lib/errors"
import { sanitizeFileName } from "@/lib/utils"
import { type CollectionNode, type DirectoryNode, isDirectory, type TreeState } from "@/types/tree"

const lookup = (tree: TreeState, id: string): CollectionNode | undefined =>
  Object.hasOwn(tree.nodes, id) ? tree.nodes[id] : undefined

/**
 * Ids from the root down to `id`, inclusive. Empty if `id` is not attached to the root.
 */
export const ancestryOf = (tree: TreeState, id: string): string[] => {
  const ancestry: string[] = []
  const safety = Object.keys(tree.nodes).length + 1
  let current = lookup(tree, id)
  while (current) {
    ancestry.unshift(current.id)
    if (current.parentId === null) {
      return current.id === tree.rootId ? ancestry : []
    }
    if (ancestry.length > safety) {
      return []
    }
    current = lookup(tree, current.parentId)
  }
  return []
}

/**
 * Look up a node reachable from the collection root
 */
export const find = (tree: TreeState, id: string): CollectionNode | undefined =>
  ancestryOf(tree, id).length > 0 ? lookup(tree, id) : undefined

export const findDirectory = (tree: TreeState, id: string): DirectoryNode | undefined => {
  const node = find(tree, id)
  return isDirectory(node) ? node : undefined
}

/**
 * Names from the root to the node, root included
 */
export const pathOf = (tree: TreeState, id: string): string[] => {
  const ancestry = ancestryOf(tree, id)
  if (ancestry.length === 0) {
    throw new AppError("NodeNotFound", `pathOf called with unknown node.id: ${id}`, { id })
  }
  return ancestry.map((nodeId) => tree.nodes[nodeId].name)
}

/**
 * Pre-order traversal of the subtree rooted at `id`. Each call starts a new traversal.
 */
export function* iterSubtree(tree: TreeState, id: string): Generator<CollectionNode, void, undefined> {
  const start = find(tree, id)
  if (!start) {
    return
  }
  const stack: CollectionNode[] = [start]
  while (stack.length > 0) {
    const node = stack.pop()
    if (!node) {
      break
    }
    yield node
    if (isDirectory(node)) {
      for (let i = node.children.length - 1; i >= 0; i -= 1) {
        const child = lookup(tree, node.children[i])
        if (child) {
          stack.push(child)
        }
      }
    }
  }
}

/**
 * True when `id` lies strictly below `ancestorId`
 */
export const isDescendantOf = (tree: TreeState, id: string, ancestorId: string): boolean =>
  id !== ancestorId && ancestryOf(tree, id).includes(ancestorId)

/**
 * File system entry name for a node: directories map to a folder, requests to a json file
 */
export const entryNameOf = (node: Pick<CollectionNode, "kind" | "name">): string =>
  node.kind === "request" ? `${sanitizeFileName(node.name)}.json` : sanitizeFileName(node.name)

/**
 * Relative entry path of a node below the collection root directory. The root itself is "".
 */
export const entryPathOf = (tree: TreeState, id: string): string => {
  const ancestry = ancestryOf(tree, id)
  if (ancestry.length === 0) {
    throw new AppError("NodeNotFound", `entryPathOf called with unknown node.id: ${id}`, { id })
  }
  return ancestry
    .slice(1)
    .map((nodeId) => entryNameOf(tree.nodes[nodeId]))
    .join("/")
}

/**
 * Pre-order listing below the root, skipping the contents of directories that are not expanded
 */
export const visibleNodes = (tree: TreeState, expanded: ReadonlySet<string>): CollectionNode[] => {
  const visible: CollectionNode[] = []
  const visit = (directory: DirectoryNode) => {
    for (const childId of directory.children) {
      const child = lookup(tree, childId)
      if (!child) {
        continue
      }
      visible.push(child)
      if (isDirectory(child) && expanded.has(child.id)) {
        visit(child)
      }
    }
  }
  const root = findDirectory(tree, tree.rootId)
  if (root) {
    visit(root)
  }
  return visible
}

export const nextVisible = (tree: TreeState, expanded: ReadonlySet<string>, currentId: string | null): string | null => {
  const visible = visibleNodes(tree, expanded)
  if (visible.length === 0) {
    return null
  }
  const index = visible.findIndex((node) => node.id === currentId)
  if (index < 0) {
    return visible[0].id
  }
  return visible[Math.min(index + 1, visible.length - 1)].id
}

export const prevVisible = (tree: TreeState, expanded: ReadonlySet<string>, currentId: string | null): string | null => {
  const visible = visibleNodes(tree, expanded)
  if (visible.length === 0) {
    return null
  }
  const index = visible.findIndex((node) => node.id === currentId)
  if (index < 0) {
    return visible[0].id
  }
  return visible[Math.max(index - 1, 0)].id
}
