import { AppError, type ErrorKind } from "@/lib/errors"
import type { DirectoryEntry, EntryStat, FileSystemBindings } from "@/types/bindings"

export type MemoryOperation =
  | { op: "write"; path: string }
  | { op: "remove"; path: string }
  | { op: "rename"; path: string; to: string }
  | { op: "mkdir"; path: string }

interface MemoryFile {
  data: Uint8Array
  modified: Date
}

export interface MemoryBindings extends FileSystemBindings {
  /** Every mutating call, in order */
  readonly operations: MemoryOperation[]
  /** Make the next matching calls reject with `kind` until cleared */
  fail(op: MemoryOperation["op"], path: string, kind?: ErrorKind): void
  clearFailures(): void
  /** Paths of all files, sorted */
  files(): string[]
  readText(path: string): string
}

const normalize = (path: string): string =>
  path
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".")
    .join("/")

const parentOf = (path: string): string => {
  const index = path.lastIndexOf("/")
  return index < 0 ? "" : path.slice(0, index)
}

const isWithin = (path: string, directory: string) => directory === "" || path === directory || path.startsWith(`${directory}/`)

/**
 * In-process FileSystemBindings, used for dry runs and tests
 */
export function createMemoryBindings(root = "memory://"): MemoryBindings {
  const files = new Map<string, MemoryFile>()
  const directories = new Set<string>([""])
  const failures = new Map<string, ErrorKind>()
  const operations: MemoryOperation[] = []

  const notFound = (path: string) => new AppError("FileNotFound", `${path}: no such file or directory`, { path })

  const check = (op: MemoryOperation["op"], path: string) => {
    const kind = failures.get(`${op}:${path}`)
    if (kind) {
      throw new AppError(kind, `${path}: injected ${op} failure`, { path })
    }
  }

  const ensureDirectory = (path: string) => {
    let current = path
    while (!directories.has(current)) {
      if (files.has(current)) {
        throw new AppError("InvalidPath", `${current}: not a directory`, { path: current })
      }
      directories.add(current)
      current = parentOf(current)
    }
  }

  return {
    root,
    operations,

    fail(op, path, kind = "IoError") {
      failures.set(`${op}:${normalize(path)}`, kind)
    },

    clearFailures() {
      failures.clear()
    },

    files() {
      return Array.from(files.keys()).sort()
    },

    readText(path) {
      const file = files.get(normalize(path))
      if (!file) {
        throw notFound(path)
      }
      return new TextDecoder().decode(file.data)
    },

    async readFile(relative) {
      const path = normalize(relative)
      const file = files.get(path)
      if (!file) {
        throw directories.has(path)
          ? new AppError("InvalidPath", `${path}: is a directory`, { path })
          : notFound(path)
      }
      return file.data.slice()
    },

    async writeFile(relative, data) {
      const path = normalize(relative)
      check("write", path)
      if (directories.has(path)) {
        throw new AppError("InvalidPath", `${path}: is a directory`, { path })
      }
      ensureDirectory(parentOf(path))
      files.set(path, { data: data.slice(), modified: new Date() })
      operations.push({ op: "write", path })
    },

    async remove(relative) {
      const path = normalize(relative)
      check("remove", path)
      for (const key of Array.from(files.keys())) {
        if (isWithin(key, path)) {
          files.delete(key)
        }
      }
      for (const key of Array.from(directories)) {
        if (key !== "" && isWithin(key, path)) {
          directories.delete(key)
        }
      }
      operations.push({ op: "remove", path })
    },

    async rename(fromRelative, toRelative) {
      const from = normalize(fromRelative)
      const to = normalize(toRelative)
      check("rename", from)
      if (files.has(from)) {
        if (directories.has(to)) {
          throw new AppError("InvalidPath", `${to}: is a directory`, { path: to })
        }
        ensureDirectory(parentOf(to))
        const file = files.get(from)
        files.delete(from)
        if (file) {
          files.set(to, file)
        }
      } else if (directories.has(from) && from !== "") {
        if (files.has(to) || directories.has(to)) {
          throw new AppError("FileAlreadyExists", `${to}: already exists`, { path: to })
        }
        ensureDirectory(parentOf(to))
        const moved = (key: string) => `${to}${key.slice(from.length)}`
        for (const key of Array.from(directories)) {
          if (isWithin(key, from)) {
            directories.delete(key)
            directories.add(moved(key))
          }
        }
        for (const [key, file] of Array.from(files)) {
          if (isWithin(key, from)) {
            files.delete(key)
            files.set(moved(key), file)
          }
        }
      } else {
        throw notFound(from)
      }
      operations.push({ op: "rename", path: from, to })
    },

    async mkdir(relative) {
      const path = normalize(relative)
      check("mkdir", path)
      ensureDirectory(path)
      operations.push({ op: "mkdir", path })
    },

    async readDir(relative): Promise<DirectoryEntry[]> {
      const path = normalize(relative)
      if (!directories.has(path)) {
        throw files.has(path) ? new AppError("InvalidPath", `${path}: not a directory`, { path }) : notFound(path)
      }
      const prefix = path === "" ? "" : `${path}/`
      const entries: DirectoryEntry[] = []
      for (const key of directories) {
        if (key !== path && key.startsWith(prefix) && !key.slice(prefix.length).includes("/")) {
          entries.push({ name: key.slice(prefix.length), kind: "directory" })
        }
      }
      for (const key of files.keys()) {
        if (key.startsWith(prefix) && !key.slice(prefix.length).includes("/")) {
          entries.push({ name: key.slice(prefix.length), kind: "file" })
        }
      }
      return entries.sort((a, b) => a.name.localeCompare(b.name))
    },

    async stat(relative): Promise<EntryStat> {
      const path = normalize(relative)
      const file = files.get(path)
      if (file) {
        return { kind: "file", sizeBytes: file.data.byteLength, modified: file.modified }
      }
      if (directories.has(path)) {
        return { kind: "directory", sizeBytes: 0, modified: new Date(0) }
      }
      throw notFound(path)
    },

    async exists(relative) {
      const path = normalize(relative)
      return files.has(path) || directories.has(path)
    },
  }
}
