import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"

import { AppError, toAppError } from "@/lib/errors"
import { generateUniqueId } from "@/lib/utils"
import type { DirectoryEntry, EntryStat, FileSystemBindings } from "@/types/bindings"

/**
 * FileSystemBindings backed by the local file system below `root`
 */
export function createFsBindings(root: string): FileSystemBindings {
  const base = path.resolve(root)

  const resolve = (relative: string): string => {
    const target = path.resolve(base, relative)
    if (target !== base && !target.startsWith(`${base}${path.sep}`)) {
      throw new AppError("InvalidPath", `Path escapes the data directory: ${relative}`, { path: relative })
    }
    return target
  }

  const call = async <T>(relative: string, fn: (target: string) => Promise<T>): Promise<T> => {
    const target = resolve(relative)
    try {
      return await fn(target)
    } catch (e) {
      throw toAppError(e, relative)
    }
  }

  return {
    root: base,

    readFile: (relative) => call(relative, async (target) => new Uint8Array(await readFile(target))),

    writeFile: (relative, data) =>
      call(relative, async (target) => {
        await mkdir(path.dirname(target), { recursive: true })
        const temp = path.join(path.dirname(target), `.${path.basename(target)}.${generateUniqueId(6)}.tmp`)
        try {
          await writeFile(temp, data)
          await rename(temp, target)
        } catch (e) {
          await rm(temp, { force: true })
          throw e
        }
      }),

    remove: (relative) => call(relative, (target) => rm(target, { recursive: true, force: true })),

    rename: async (from, to) => {
      const target = resolve(to)
      await call(from, async (source) => {
        await mkdir(path.dirname(target), { recursive: true })
        await rename(source, target)
      })
    },

    mkdir: (relative) =>
      call(relative, async (target) => {
        await mkdir(target, { recursive: true })
      }),

    readDir: (relative) =>
      call(relative, async (target): Promise<DirectoryEntry[]> => {
        const entries = await readdir(target, { withFileTypes: true })
        return entries
          .filter((entry) => entry.isFile() || entry.isDirectory())
          .map((entry) => ({ name: entry.name, kind: entry.isDirectory() ? ("directory" as const) : ("file" as const) }))
      }),

    stat: (relative) =>
      call(relative, async (target): Promise<EntryStat> => {
        const info = await stat(target)
        return {
          kind: info.isDirectory() ? "directory" : "file",
          sizeBytes: info.size,
          modified: info.mtime,
        }
      }),

    exists: async (relative) => {
      try {
        await call(relative, (target) => stat(target))
        return true
      } catch (e) {
        if (e instanceof AppError && e.kind === "FileNotFound") {
          return false
        }
        throw e
      }
    },
  }
}
