import { describe, expect, it } from "vitest"
import { toEncodedTree } from "@/lib/codec"
import { catchAppError, createTestStore } from "@/test/test-store"
import type { ResponseSummary } from "@/types/tree"

const textEncoder = new TextEncoder()

const response: ResponseSummary = {
  status: 200,
  statusText: "OK",
  sizeBytes: 2,
  durationMs: 12,
  headers: [["content-type", "application/json"]],
  body: "{}",
  receivedAt: "2024-01-01T00:00:00.000Z",
}

// My API
// └─ Auth
//    └─ Login (POST)
const setup = async () => {
  const context = createTestStore()
  const { collectionsApi } = context
  const collection = await collectionsApi.createCollection("My API", "Test collection")
  const collectionId = collection.id
  const rootId = collection.rootId
  const authId = await collectionsApi.createNode(collectionId, rootId, "directory", "Auth")
  const loginId = await collectionsApi.createNode(collectionId, authId, "request", "Login", {
    request: { method: "POST", url: "https://example.test/login" },
  })
  const childrenOf = (id: string) => {
    const node = collectionsApi.getNode(collectionId, id)
    return node?.kind === "directory" ? node.children : []
  }
  const dirtyIds = () => Object.keys(collectionsApi.getCollection(collectionId).dirty).sort()
  return { ...context, collectionId, rootId, authId, loginId, childrenOf, dirtyIds }
}

/** Same as setup, with everything flushed */
const setupClean = async () => {
  const context = await setup()
  await context.syncApi.save(context.collectionId)
  return context
}

// ----------------------------------------------------------------------------
// Collections
// ----------------------------------------------------------------------------

describe("createCollection", () => {
  it("starts with a dirty root and nothing on disk", async () => {
    const { collectionsApi, bindings } = createTestStore()
    const collection = await collectionsApi.createCollection("My API")

    expect(collection.path).toBe("My API")
    expect(collection.stored).toBe(false)
    expect(collectionsApi.pathOf(collection.id, collection.rootId)).toEqual(["My API"])
    expect(collectionsApi.isDirty(collection.id, collection.rootId)).toBe(true)
    expect(collectionsApi.anyDirty(collection.id)).toBe(true)
    expect(bindings.files()).toEqual([])
  })

  it("picks a free directory name", async () => {
    const { collectionsApi, bindings } = createTestStore()
    await bindings.mkdir("Users")

    const first = await collectionsApi.createCollection("Users")
    const second = await collectionsApi.createCollection("Users")
    const sanitized = await collectionsApi.createCollection("v1.0/api")

    expect(first.path).toBe("Users-2")
    expect(second.path).toBe("Users-3")
    expect(sanitized.path).toBe("v1_0_api")
  })

  it("rejects an empty name", async () => {
    const { collectionsApi } = createTestStore()
    expect((await catchAppError(() => collectionsApi.createCollection("   "))).kind).toBe("InvalidName")
  })

  it("never hands one directory to two concurrent creations", async () => {
    const { collectionsApi } = createTestStore()

    const [first, second] = await Promise.all([
      collectionsApi.createCollection("Same"),
      collectionsApi.createCollection("Same"),
    ])

    expect([first.path, second.path]).toEqual(["Same", "Same-2"])
    expect(first.id).not.toBe(second.id)
  })
})

describe("getCollection", () => {
  it("throws CollectionNotOpen for an unknown id", async () => {
    const { collectionsApi } = createTestStore()
    const error = await catchAppError(() => collectionsApi.getCollection("nope"))
    expect(error.kind).toBe("CollectionNotOpen")
    expect(error.message).toBe("getCollection called with unopened collection.id: nope")
  })
})

describe("openCollection", () => {
  it("returns the collection that is already open for a path", async () => {
    const { collectionsApi, collectionId } = await setupClean()
    const reopened = await collectionsApi.openCollection("My API")
    expect(reopened.id).toBe(collectionId)
  })

  it("loads a clean collection written by another store", async () => {
    const { bindings } = await setupClean()
    const { collectionsApi } = createTestStore({}, bindings)

    const opened = await collectionsApi.openCollection("My API")

    expect(opened.stored).toBe(true)
    expect(opened.description).toBe("Test collection")
    expect(collectionsApi.anyDirty(opened.id)).toBe(false)
    expect([...collectionsApi.iterSubtree(opened.id)].map((node) => node.name)).toEqual(["My API", "Auth", "Login"])
  })

  it("fails for a missing path", async () => {
    const { collectionsApi } = createTestStore()
    expect((await catchAppError(() => collectionsApi.openCollection("missing"))).kind).toBe("FileNotFound")
  })

  it("opens a path once when called concurrently", async () => {
    const { bindings } = await setupClean()
    const { collectionsApi, store } = createTestStore({}, bindings)

    const [first, second] = await Promise.all([
      collectionsApi.openCollection("My API"),
      collectionsApi.openCollection("My API"),
    ])

    expect(second.id).toBe(first.id)
    expect(Object.keys(store.getState().collectionsState.cache)).toEqual([first.id])
  })
})

describe("export / import", () => {
  it("copies the tree into a new unsaved collection", async () => {
    const { collectionsApi, collectionId } = await setupClean()

    const copy = await collectionsApi.importCollection(collectionsApi.exportCollection(collectionId), "Copy")

    expect(copy.path).toBe("Copy")
    expect(copy.stored).toBe(false)
    expect(Object.keys(copy.dirty)).toHaveLength(3)
    expect(toEncodedTree(copy)).toEqual({ ...toEncodedTree(collectionsApi.getCollection(collectionId)), name: "Copy" })
    expect(copy.description).toBe("Test collection")
  })

  it("gives concurrent imports their own directories", async () => {
    const { collectionsApi, collectionId } = await setup()
    const data = collectionsApi.exportCollection(collectionId)

    const copies = await Promise.all([collectionsApi.importCollection(data), collectionsApi.importCollection(data)])

    expect(copies.map((copy) => copy.path)).toEqual(["My API-2", "My API-3"])
  })

  it("keeps the exported name when none is given", async () => {
    const { collectionsApi, collectionId } = await setup()
    const copy = await collectionsApi.importCollection(collectionsApi.exportCollection(collectionId))
    expect(copy.nodes[copy.rootId].name).toBe("My API")
    expect(copy.path).toBe("My API-2")
  })

  it("rejects malformed documents", async () => {
    const { collectionsApi } = createTestStore()
    const error = await catchAppError(() => collectionsApi.importCollection(textEncoder.encode("[]")))
    expect(error.kind).toBe("DecodeError")
    expect(error.message.startsWith("<import>: ")).toBe(true)
  })
})

describe("listCollections / deleteCollection", () => {
  it("lists stored collections and deletes them from disk", async () => {
    const { collectionsApi, syncApi, bindings, collectionId } = await setupClean()
    const other = await collectionsApi.createCollection("Billing")
    await syncApi.save(other.id)

    const names = (await collectionsApi.listCollections("name")).map((meta) => meta.name)
    expect(names).toEqual(["Billing", "My API"])

    await collectionsApi.deleteCollection(collectionId)

    expect(bindings.files()).toEqual(["Billing/.directory.json"])
    expect((await catchAppError(() => collectionsApi.getCollection(collectionId))).kind).toBe("CollectionNotOpen")
  })
})

// ----------------------------------------------------------------------------
// Tree mutations
// ----------------------------------------------------------------------------

describe("createNode", () => {
  it("appends by default and inserts at a clamped position", async () => {
    const { collectionsApi, collectionId, rootId, authId, childrenOf } = await setup()

    const first = await collectionsApi.createNode(collectionId, rootId, "request", "Ping", { position: 0 })
    const last = await collectionsApi.createNode(collectionId, rootId, "request", "Health", { position: 99 })

    expect(childrenOf(rootId)).toEqual([first, authId, last])
  })

  it("fills request defaults and marks the node and its parent dirty", async () => {
    const { collectionsApi, syncApi, collectionId, authId, dirtyIds } = await setupClean()

    const id = await collectionsApi.createNode(collectionId, authId, "request", "Logout")

    expect(collectionsApi.getRequestSnapshot(collectionId, id)).toEqual({
      id,
      name: "Logout",
      method: "GET",
      url: "",
      headers: [],
      body: "",
      bodyType: "text",
      authMethod: "none",
    })
    expect(dirtyIds()).toEqual([authId, id].sort())
    expect(syncApi.status(collectionId)).toBe("dirty")
  })

  it("trims names and rejects empty ones", async () => {
    const { collectionsApi, collectionId, rootId } = await setup()
    const id = await collectionsApi.createNode(collectionId, rootId, "directory", "  Users  ")
    expect(collectionsApi.getNode(collectionId, id)?.name).toBe("Users")
    expect((await catchAppError(() => collectionsApi.createNode(collectionId, rootId, "request", ""))).kind).toBe(
      "InvalidName",
    )
  })

  it("requires an existing directory as parent", async () => {
    const { collectionsApi, collectionId, loginId } = await setup()
    expect((await catchAppError(() => collectionsApi.createNode(collectionId, loginId, "request", "x"))).kind).toBe(
      "InvalidParent",
    )
    const error = await catchAppError(() => collectionsApi.createNode(collectionId, "nope", "request", "x"))
    expect(error.kind).toBe("NodeNotFound")
    expect(error.message).toBe("createNode called with unknown node.id: nope")
  })

  it("rejects names that collide with a sibling, leaving the tree untouched", async () => {
    const { collectionsApi, collectionId, authId, childrenOf } = await setup()
    const before = collectionsApi.getCollection(collectionId)

    const error = await catchAppError(() => collectionsApi.createNode(collectionId, authId, "request", "login"))

    expect(error.kind).toBe("NameCollision")
    expect(error.message).toBe('createNode: "login" collides with "Login" in "Auth"')
    expect(collectionsApi.getCollection(collectionId)).toBe(before)
    expect(childrenOf(authId)).toHaveLength(1)
  })

  it("validates initial request fields", async () => {
    const { collectionsApi, collectionId, authId } = await setup()
    const error = await catchAppError(() =>
      collectionsApi.createNode(collectionId, authId, "request", "Bad", { request: { headers: [{ name: " " }] } }),
    )
    expect(error.kind).toBe("InvalidHeader")
  })

  it("never reuses the id of a deleted node", async () => {
    const { collectionsApi, collectionId, authId, loginId } = await setup()
    await collectionsApi.deleteNode(collectionId, loginId)
    const recreated = await collectionsApi.createNode(collectionId, authId, "request", "Login")
    expect(recreated).not.toBe(loginId)
  })
})

describe("renameNode", () => {
  it("marks the node and its parent dirty", async () => {
    const { collectionsApi, collectionId, authId, loginId, dirtyIds } = await setupClean()

    await collectionsApi.renameNode(collectionId, loginId, "Sign in")

    expect(collectionsApi.pathOf(collectionId, loginId)).toEqual(["My API", "Auth", "Sign in"])
    expect(dirtyIds()).toEqual([authId, loginId].sort())
  })

  it("does nothing when the name is unchanged", async () => {
    const { collectionsApi, collectionId, loginId } = await setupClean()
    await collectionsApi.renameNode(collectionId, loginId, " Login ")
    expect(collectionsApi.anyDirty(collectionId)).toBe(false)
  })

  it("renames the root without a parent to update", async () => {
    const { collectionsApi, collectionId, rootId, dirtyIds } = await setupClean()
    await collectionsApi.renameNode(collectionId, rootId, "Renamed API")
    expect(dirtyIds()).toEqual([rootId])
  })

  it("rejects a sibling collision", async () => {
    const { collectionsApi, collectionId, rootId, authId } = await setup()
    await collectionsApi.createNode(collectionId, rootId, "directory", "Users")
    expect((await catchAppError(() => collectionsApi.renameNode(collectionId, authId, "USERS"))).kind).toBe(
      "NameCollision",
    )
  })
})

describe("moveNode", () => {
  it("moves a subtree and marks everything it touches", async () => {
    const { collectionsApi, syncApi, collectionId, rootId, authId, loginId, childrenOf, dirtyIds } = await setup()
    const v1Id = await collectionsApi.createNode(collectionId, rootId, "directory", "V1")
    await syncApi.save(collectionId)

    await collectionsApi.moveNode(collectionId, authId, v1Id)

    expect(childrenOf(rootId)).toEqual([v1Id])
    expect(childrenOf(v1Id)).toEqual([authId])
    expect(collectionsApi.pathOf(collectionId, loginId)).toEqual(["My API", "V1", "Auth", "Login"])
    expect(dirtyIds()).toEqual([rootId, v1Id, authId, loginId].sort())
  })

  it("reorders within the same parent when given a position", async () => {
    const { collectionsApi, collectionId, rootId, authId, childrenOf } = await setup()
    const usersId = await collectionsApi.createNode(collectionId, rootId, "directory", "Users")
    const pingId = await collectionsApi.createNode(collectionId, rootId, "request", "Ping")

    await collectionsApi.moveNode(collectionId, authId, rootId, 2)
    expect(childrenOf(rootId)).toEqual([usersId, pingId, authId])

    await collectionsApi.moveNode(collectionId, authId, rootId)
    expect(childrenOf(rootId)).toEqual([usersId, pingId, authId])
  })

  it("refuses to move the root", async () => {
    const { collectionsApi, collectionId, rootId, authId } = await setup()
    expect((await catchAppError(() => collectionsApi.moveNode(collectionId, rootId, authId))).kind).toBe(
      "InvalidParent",
    )
  })

  it("refuses to move a directory into itself or below itself", async () => {
    const { collectionsApi, collectionId, rootId, authId } = await setup()
    const innerId = await collectionsApi.createNode(collectionId, authId, "directory", "Inner")
    const before = collectionsApi.getCollection(collectionId)

    expect((await catchAppError(() => collectionsApi.moveNode(collectionId, authId, authId))).kind).toBe("CyclicMove")
    expect((await catchAppError(() => collectionsApi.moveNode(collectionId, authId, innerId))).kind).toBe("CyclicMove")
    expect(collectionsApi.getCollection(collectionId)).toBe(before)
    expect(collectionsApi.pathOf(collectionId, innerId)).toEqual(["My API", "Auth", "Inner"])
    expect(collectionsApi.getNode(collectionId, rootId)?.kind).toBe("directory")
  })

  it("requires a directory target without a name clash", async () => {
    const { collectionsApi, collectionId, rootId, authId, loginId } = await setup()
    const pingId = await collectionsApi.createNode(collectionId, rootId, "request", "Ping")
    await collectionsApi.createNode(collectionId, rootId, "request", "Login")

    expect((await catchAppError(() => collectionsApi.moveNode(collectionId, authId, pingId))).kind).toBe(
      "InvalidParent",
    )
    expect((await catchAppError(() => collectionsApi.moveNode(collectionId, loginId, rootId))).kind).toBe(
      "NameCollision",
    )
  })
})

describe("reorderChildren", () => {
  it("puts listed children first and keeps the rest in order", async () => {
    const { collectionsApi, collectionId, rootId, authId, childrenOf } = await setup()
    const usersId = await collectionsApi.createNode(collectionId, rootId, "directory", "Users")
    const pingId = await collectionsApi.createNode(collectionId, rootId, "request", "Ping")

    await collectionsApi.reorderChildren(collectionId, rootId, [pingId, "unknown", authId, pingId])

    expect(childrenOf(rootId)).toEqual([pingId, authId, usersId])
  })
})

describe("deleteNode", () => {
  it("removes the whole subtree and tombstones what was stored", async () => {
    const { collectionsApi, collectionId, rootId, authId, loginId, dirtyIds } = await setupClean()

    await collectionsApi.deleteNode(collectionId, authId)

    const collection = collectionsApi.getCollection(collectionId)
    expect(collectionsApi.getNode(collectionId, authId)).toBeUndefined()
    expect(collectionsApi.getNode(collectionId, loginId)).toBeUndefined()
    expect(collection.tombstones).toEqual({ [authId]: "Auth", [loginId]: "Auth/Login.json" })
    expect(dirtyIds()).toEqual([rootId])
    expect(collectionsApi.isDirty(collectionId, authId)).toBe(false)
    expect(collectionsApi.anyDirty(collectionId)).toBe(true)
  })

  it("forgets unsaved nodes without a tombstone", async () => {
    const { collectionsApi, collectionId, authId, loginId } = await setup()
    collectionsApi.select(collectionId, loginId)

    await collectionsApi.deleteNode(collectionId, authId)

    const collection = collectionsApi.getCollection(collectionId)
    expect(collection.tombstones).toEqual({})
    expect(collection.selectedId).toBeNull()
    expect(Object.keys(collection.nodes)).toEqual([collection.rootId])
  })

  it("refuses to delete the root", async () => {
    const { collectionsApi, collectionId, rootId } = await setup()
    expect((await catchAppError(() => collectionsApi.deleteNode(collectionId, rootId))).kind).toBe("DeleteRoot")
  })
})

// ----------------------------------------------------------------------------
// Request edits
// ----------------------------------------------------------------------------

describe("updateRequest", () => {
  it("marks the request dirty only when the value changes", async () => {
    const { collectionsApi, collectionId, loginId, dirtyIds } = await setupClean()

    const same = await collectionsApi.updateRequest(collectionId, loginId, "url", "https://example.test/login")
    expect(same).toEqual({ changed: false, bodyIgnored: false })
    expect(collectionsApi.anyDirty(collectionId)).toBe(false)

    const changed = await collectionsApi.updateRequest(collectionId, loginId, "url", "https://example.test/v2/login")
    expect(changed).toEqual({ changed: true, bodyIgnored: false })
    expect(dirtyIds()).toEqual([loginId])
  })

  it("updates the auth method and body type", async () => {
    const { collectionsApi, collectionId, loginId, dirtyIds } = await setupClean()

    expect(await collectionsApi.updateRequest(collectionId, loginId, "authMethod", "bearer")).toEqual({
      changed: true,
      bodyIgnored: false,
    })
    expect(await collectionsApi.updateRequest(collectionId, loginId, "bodyType", "text")).toEqual({
      changed: false,
      bodyIgnored: false,
    })

    const { authMethod, bodyType } = collectionsApi.getRequestSnapshot(collectionId, loginId)
    expect({ authMethod, bodyType }).toEqual({ authMethod: "bearer", bodyType: "text" })
    expect(dirtyIds()).toEqual([loginId])
  })

  it("flags a body the method does not send, but keeps it", async () => {
    const { collectionsApi, collectionId, loginId } = await setup()
    await collectionsApi.updateRequest(collectionId, loginId, "body", '{"user":"test-user"}')

    const result = await collectionsApi.updateRequest(collectionId, loginId, "method", "GET")

    expect(result).toEqual({ changed: true, bodyIgnored: true })
    expect(collectionsApi.getRequestSnapshot(collectionId, loginId).body).toBe('{"user":"test-user"}')
  })

  it("rejects directories and invalid headers", async () => {
    const { collectionsApi, collectionId, authId, loginId } = await setup()
    expect((await catchAppError(() => collectionsApi.updateRequest(collectionId, authId, "url", "x"))).kind).toBe(
      "NotARequest",
    )
    const error = await catchAppError(() =>
      collectionsApi.updateRequest(collectionId, loginId, "headers", [{ name: "", value: "x" }]),
    )
    expect(error.kind).toBe("InvalidHeader")
    expect(error.message).toBe("updateRequest: headers.0.name: header name cannot be empty")
  })
})

describe("headers", () => {
  it("adds, updates and removes headers", async () => {
    const { collectionsApi, collectionId, loginId } = await setup()
    const headersOf = () => collectionsApi.getRequestSnapshot(collectionId, loginId).headers

    await collectionsApi.addHeader(collectionId, loginId, { name: "  Accept ", value: "application/json" })
    await collectionsApi.addHeader(collectionId, loginId, { name: "Accept", value: "text/plain" })
    expect(headersOf()).toEqual([
      { name: "Accept", value: "application/json", enabled: true },
      { name: "Accept", value: "text/plain", enabled: true },
    ])

    await collectionsApi.updateHeader(collectionId, loginId, 1, { enabled: false })
    expect(headersOf()[1]).toEqual({ name: "Accept", value: "text/plain", enabled: false })

    await collectionsApi.removeHeader(collectionId, loginId, 0)
    expect(headersOf()).toEqual([{ name: "Accept", value: "text/plain", enabled: false }])
  })

  it("accepts an empty value but not an empty name", async () => {
    const { collectionsApi, collectionId, loginId } = await setup()
    await collectionsApi.addHeader(collectionId, loginId, { name: "X-Empty" })
    expect(collectionsApi.getRequestSnapshot(collectionId, loginId).headers).toEqual([
      { name: "X-Empty", value: "", enabled: true },
    ])
    expect((await catchAppError(() => collectionsApi.updateHeader(collectionId, loginId, 0, { name: " " }))).kind).toBe(
      "InvalidHeader",
    )
  })

  it("rejects an index out of range", async () => {
    const { collectionsApi, collectionId, loginId } = await setup()
    const error = await catchAppError(() => collectionsApi.removeHeader(collectionId, loginId, 5))
    expect(error.kind).toBe("InvalidValue")
    expect(error.message).toBe("removeHeader: no header at index 5")
  })
})

describe("responses", () => {
  it("caches the last response without marking anything dirty", async () => {
    const { collectionsApi, collectionId, loginId } = await setupClean()

    collectionsApi.attachResponse(collectionId, loginId, response)

    const node = collectionsApi.getNode(collectionId, loginId)
    expect(node?.kind === "request" && node.lastResponse?.status).toBe(200)
    expect(collectionsApi.anyDirty(collectionId)).toBe(false)

    collectionsApi.clearResponse(collectionId, loginId)
    const cleared = collectionsApi.getNode(collectionId, loginId)
    expect(cleared?.kind === "request" && cleared.lastResponse).toBeUndefined()
  })

  it("is not part of the request snapshot", async () => {
    const { collectionsApi, collectionId, loginId } = await setup()
    collectionsApi.attachResponse(collectionId, loginId, response)

    const snapshot = collectionsApi.getRequestSnapshot(collectionId, loginId)
    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(Object.keys(snapshot).sort()).toEqual(["body", "headers", "id", "method", "name", "url"])
  })
})

// ----------------------------------------------------------------------------
// Navigation
// ----------------------------------------------------------------------------

describe("visible navigation", () => {
  it("follows expanded directories", async () => {
    const { collectionsApi, collectionId, rootId, authId, loginId } = await setup()
    const pingId = await collectionsApi.createNode(collectionId, rootId, "request", "Ping")

    expect(collectionsApi.listVisible(collectionId).map((node) => node.id)).toEqual([authId, pingId])

    collectionsApi.setExpanded(collectionId, authId, true)
    expect(collectionsApi.listVisible(collectionId).map((node) => node.id)).toEqual([authId, loginId, pingId])
    expect(collectionsApi.nextVisible(collectionId, authId)).toBe(loginId)
    expect(collectionsApi.prevVisible(collectionId, pingId)).toBe(loginId)

    collectionsApi.setExpanded(collectionId, authId, false)
    expect(collectionsApi.nextVisible(collectionId, authId)).toBe(pingId)
  })

  it("only expands directories and selects existing nodes", async () => {
    const { collectionsApi, collectionId, loginId } = await setup()
    expect((await catchAppError(() => collectionsApi.setExpanded(collectionId, loginId, true))).kind).toBe(
      "InvalidParent",
    )
    expect((await catchAppError(() => collectionsApi.select(collectionId, "nope"))).kind).toBe("NodeNotFound")
  })
})
