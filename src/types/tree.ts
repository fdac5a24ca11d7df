import { z } from "zod"

/**
 * Schema & type defining valid HTTP methods
 */
export const zHttpMethod = z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS", "TRACE"])
export type HttpMethod = z.infer<typeof zHttpMethod>

/**
 * Methods that conventionally carry no request body
 */
export const BodylessMethods: ReadonlySet<HttpMethod> = new Set(["GET", "HEAD", "OPTIONS", "TRACE", "DELETE"])

export const methodAllowsBody = (method: HttpMethod): boolean => !BodylessMethods.has(method)

/**
 * How the executor authenticates the request
 */
export const zAuthMethod = z.enum(["none", "bearer"])
export type AuthMethod = z.infer<typeof zAuthMethod>

/**
 * How the body is interpreted when sent
 */
export const zBodyType = z.enum(["text", "json"])
export type BodyType = z.infer<typeof zBodyType>

/**
 * Schema & type for a single request header entry
 */
export const zRequestHeader = z.object({
  /**
   * Header name. Duplicates are permitted, each entry is sent separately
   */
  name: z.string().trim().min(1, "header name cannot be empty"),
  /**
   * Header value
   */
  value: z.string().default(""),
  /**
   * Whether the header is sent
   */
  enabled: z.boolean().default(true),
})
export type RequestHeader = z.infer<typeof zRequestHeader>
export type RequestHeaderInput = z.input<typeof zRequestHeader>

/**
 * Cached outcome of the last execution of a request. Never persisted.
 */
export interface ResponseSummary {
  status: number
  statusText: string
  sizeBytes: number
  durationMs: number
  headers: Array<[string, string]>
  body: string
  receivedAt: string
}

export type NodeKind = "directory" | "request"

export interface DirectoryNode {
  kind: "directory"
  id: string
  name: string
  /** Containing directory, or null for the collection root */
  parentId: string | null
  /** Child ids in display order */
  children: string[]
}

export interface RequestNode {
  kind: "request"
  id: string
  name: string
  parentId: string
  method: HttpMethod
  url: string
  headers: RequestHeader[]
  /** Empty means no body */
  body: string
  bodyType: BodyType
  authMethod: AuthMethod
  lastResponse?: ResponseSummary
}

export type CollectionNode = DirectoryNode | RequestNode

/**
 * The normalized collection tree. Nodes reference their parent by id only.
 */
export interface TreeState {
  rootId: string
  nodes: Record<string, CollectionNode>
}

/**
 * Editable request fields and the value type each accepts
 */
export interface RequestFieldValues {
  method: HttpMethod
  url: string
  headers: RequestHeaderInput[]
  body: string
  bodyType: BodyType
  authMethod: AuthMethod
}
export type RequestField = keyof RequestFieldValues

export const zRequestFields = {
  method: zHttpMethod,
  url: z.string(),
  headers: z.array(zRequestHeader),
  body: z.string(),
  bodyType: zBodyType,
  authMethod: zAuthMethod,
} satisfies { [K in RequestField]: z.ZodType }

/**
 * What the HTTP executor reads from a request
 */
export type RequestSnapshot = Readonly<Pick<RequestNode, "id" | "name" | "method" | "url" | "headers" | "body" | "bodyType" | "authMethod">>

export const isDirectory = (node: CollectionNode | undefined): node is DirectoryNode => node?.kind === "directory"
export const isRequest = (node: CollectionNode | undefined): node is RequestNode => node?.kind === "request"
