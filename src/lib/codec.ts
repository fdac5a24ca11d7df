import { z } from "zod"

import { AppError } from "@/lib/errors"
import { entryNameOf, find } from "@/lib/tree"
import { nextId } from "@/lib/utils"
import {
  type CollectionNode,
  type DirectoryNode,
  isDirectory,
  type RequestHeader,
  type RequestNode,
  type TreeState,
  zAuthMethod,
  zBodyType,
  zHttpMethod,
  zRequestHeader,
} from "@/types/tree"

export const CodecFormat = "reqtree" as const
export const CodecVersion = 1

/**
 * A single request as stored in its own file
 */
export const zRequestFile = z.object({
  name: z.string().trim().min(1),
  method: zHttpMethod,
  url: z.string().default(""),
  headers: z.array(zRequestHeader).default([]),
  body: z.string().default(""),
  bodyType: zBodyType.default("text"),
  authMethod: zAuthMethod.default("none"),
})
export type RequestFile = z.infer<typeof zRequestFile>

/**
 * A directory manifest: display name and ordered child entry names
 */
export const zDirectoryFile = z.object({
  name: z.string().trim().min(1),
  description: z.string().optional(),
  children: z.array(z.string()).default([]),
})
export type DirectoryFile = z.infer<typeof zDirectoryFile>

export type EncodedTreeNode =
  | { type: "directory"; name: string; description?: string; children: EncodedTreeNode[] }
  | ({ type: "request" } & RequestFile)

const zEncodedRequest = zRequestFile.extend({ type: z.literal("request") })

export const zEncodedTreeNode: z.ZodType<EncodedTreeNode> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({
      type: z.literal("directory"),
      name: z.string().trim().min(1),
      description: z.string().optional(),
      children: z.array(zEncodedTreeNode).default([]),
    }),
    zEncodedRequest,
  ]),
)

type DocumentKind = "request" | "directory" | "tree"

const zEnvelope = <S extends z.ZodType>(kind: DocumentKind, content: S) =>
  z.object({
    format: z.literal(CodecFormat),
    version: z.literal(CodecVersion, { error: (issue) => `unsupported format version ${String(issue.input)}` }),
    kind: z.literal(kind),
    content,
  })

const zRequestDocument = zEnvelope("request", zRequestFile)
const zDirectoryDocument = zEnvelope("directory", zDirectoryFile)
const zTreeDocument = zEnvelope("tree", zEncodedTreeNode)

///
/// Encoding
///

const textEncoder = new TextEncoder()
const textDecoder = new TextDecoder("utf-8", { fatal: true })

const toBytes = (kind: DocumentKind, content: unknown): Uint8Array =>
  textEncoder.encode(`${JSON.stringify({ format: CodecFormat, version: CodecVersion, kind, content }, null, 2)}\n`)

// Fixed key order keeps output byte-stable
const encodeHeaders = (headers: readonly RequestHeader[]) =>
  headers.map(({ name, value, enabled }) => ({ name, value, enabled }))

const requestContent = (node: RequestNode) => ({
  name: node.name,
  method: node.method,
  url: node.url,
  headers: encodeHeaders(node.headers),
  body: node.body,
  bodyType: node.bodyType,
  authMethod: node.authMethod,
})

export const encodeRequest = (node: RequestNode): Uint8Array => toBytes("request", requestContent(node))

export const encodeDirectory = (node: DirectoryNode, tree: TreeState, description?: string): Uint8Array => {
  const children = node.children.flatMap((childId) => {
    const child = find(tree, childId)
    return child ? [entryNameOf(child)] : []
  })
  return toBytes("directory", description ? { name: node.name, description, children } : { name: node.name, children })
}

const encodeTreeNode = (tree: TreeState, node: CollectionNode): EncodedTreeNode => {
  if (!isDirectory(node)) {
    return { type: "request", ...requestContent(node) }
  }
  return {
    type: "directory",
    name: node.name,
    children: node.children.flatMap((childId) => {
      const child = find(tree, childId)
      return child ? [encodeTreeNode(tree, child)] : []
    }),
  }
}

/**
 * Encode the subtree rooted at `id` (the whole tree by default) as one document.
 * A collection description is kept on the root.
 */
export const encode = (tree: TreeState & { description?: string }, id: string = tree.rootId): Uint8Array => {
  const node = find(tree, id)
  if (!node) {
    throw new AppError("NodeNotFound", `encode called with unknown node.id: ${id}`, { id })
  }
  const encoded = encodeTreeNode(tree, node)
  if (encoded.type === "directory" && id === tree.rootId && tree.description) {
    const { name, children } = encoded
    return toBytes("tree", { type: "directory", name, description: tree.description, children })
  }
  return toBytes("tree", encoded)
}

///
/// Decoding
///

const formatIssuePath = (path: readonly PropertyKey[]): string =>
  path.reduce<string>((text, segment) => {
    if (typeof segment === "number") {
      return `${text}[${segment}]`
    }
    return text ? `${text}.${String(segment)}` : String(segment)
  }, "")

const decodeError = (location: string, message: string, cause?: unknown) =>
  new AppError("DecodeError", `${location}: ${message}`, { location }, cause ? { cause } : undefined)

const parseDocument = <S extends z.ZodType>(schema: S, bytes: Uint8Array, location: string): z.output<S> => {
  let json: unknown
  try {
    json = JSON.parse(textDecoder.decode(bytes))
  } catch (e) {
    throw decodeError(location, `invalid JSON: ${e instanceof Error ? e.message : String(e)}`, e)
  }

  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    console.debug(`[Codec] Failed to decode ${location}:\n${z.prettifyError(parsed.error)}`)
    const [issue] = parsed.error.issues
    const where = formatIssuePath(issue.path)
    throw decodeError(location, where ? `${where}: ${issue.message}` : issue.message, parsed.error)
  }
  return parsed.data
}

export const decodeRequest = (bytes: Uint8Array, location = "<request>"): RequestFile =>
  parseDocument(zRequestDocument, bytes, location).content

export const decodeDirectory = (bytes: Uint8Array, location = "<directory>"): DirectoryFile =>
  parseDocument(zDirectoryDocument, bytes, location).content

/**
 * Case-insensitive on-disk names must be unique among siblings as well as display names
 */
export const findSiblingCollision = (
  siblings: ReadonlyArray<Pick<CollectionNode, "kind" | "name">>,
  candidate: Pick<CollectionNode, "kind" | "name">,
): Pick<CollectionNode, "kind" | "name"> | undefined => {
  const entry = entryNameOf(candidate).toLowerCase()
  return siblings.find((sibling) => sibling.name === candidate.name || entryNameOf(sibling).toLowerCase() === entry)
}

/**
 * Build a fresh TreeState, assigning new ids, from a decoded tree document
 */
export const buildTree = (encoded: EncodedTreeNode, location = "<tree>"): TreeState => {
  if (encoded.type !== "directory") {
    throw decodeError(location, "root must be a directory")
  }

  const nodes: Record<string, CollectionNode> = {}
  const build = (item: EncodedTreeNode, parentId: string | null, where: string): CollectionNode => {
    const id = nextId()
    if (item.type === "request") {
      if (parentId === null) {
        throw decodeError(location, `${where}: a request cannot be the root`)
      }
      const node: RequestNode = {
        kind: "request",
        id,
        parentId,
        name: item.name,
        method: item.method,
        url: item.url,
        headers: item.headers,
        body: item.body,
        bodyType: item.bodyType,
        authMethod: item.authMethod,
      }
      nodes[id] = node
      return node
    }

    const node: DirectoryNode = { kind: "directory", id, name: item.name, parentId, children: [] }
    nodes[id] = node
    const siblings: CollectionNode[] = []
    item.children.forEach((child, index) => {
      const built = build(child, id, `${where}.children[${index}]`)
      const collision = findSiblingCollision(siblings, built)
      if (collision) {
        throw decodeError(location, `${where}.children[${index}]: name "${built.name}" collides with "${collision.name}"`)
      }
      siblings.push(built)
      node.children.push(built.id)
    })
    return node
  }

  const root = build(encoded, null, "content")
  return { rootId: root.id, nodes }
}

export interface DecodedCollection {
  tree: TreeState
  /** Root description, empty when the document has none */
  description: string
}

/**
 * Decode a tree document produced by `encode`, along with its description
 */
export const decodeCollection = (bytes: Uint8Array, location = "<tree>"): DecodedCollection => {
  const content = parseDocument(zTreeDocument, bytes, location).content
  return {
    tree: buildTree(content, location),
    description: content.type === "directory" ? (content.description ?? "") : "",
  }
}

/**
 * Decode a tree document produced by `encode`. Ids are freshly assigned.
 */
export const decode = (bytes: Uint8Array, location = "<tree>"): TreeState => decodeCollection(bytes, location).tree

/**
 * Convert a subtree back into the shape `encode` writes, for comparing trees without ids
 */
export const toEncodedTree = (tree: TreeState, id: string = tree.rootId): EncodedTreeNode | undefined => {
  const node = find(tree, id)
  return node ? encodeTreeNode(tree, node) : undefined
}

