import { z } from "zod"

import { isAppError } from "@/lib/errors"
import type { FileSystemBindings } from "@/types/bindings"

export interface FileStorage<S> {
  load: (fileName: string) => Promise<S | null>
  save: (fileName: string, data: S) => Promise<void>
}

export const zFileHeaderSchema = z.object({
  version: z.number(),
  updated: z.iso.datetime(),
})

export function ZodFileStorage<S extends z.ZodType>(schema: S) {
  return z.object({
    header: zFileHeaderSchema,
    content: schema,
  })
}

// Wrapper storage type for initial file content parsing
const zStorageFileSchema = ZodFileStorage(z.unknown())

export interface StorageOptions<S> {
  bindings: FileSystemBindings
  version: number
  schema: z.ZodType<S>
  writeable?: boolean
}

const textEncoder = new TextEncoder()
const textDecoder = new TextDecoder()

/**
 * createStorage<S> - Validated FileStorage implementation based on a Zod schema
 */
export function createStorage<Schema>(options: StorageOptions<Schema>): FileStorage<Schema> {
  const { bindings, version, schema, writeable = true } = options

  const tryLoad = async (fileName: string): Promise<unknown> => {
    let bytes: Uint8Array
    try {
      bytes = await bindings.readFile(fileName)
    } catch (e) {
      if (isAppError(e, "FileNotFound")) {
        // Allow the caller to use its defaults
        return null
      }
      console.error(`[Storage] Failed to load file ${fileName}`, e)
      throw e
    }
    try {
      return JSON.parse(textDecoder.decode(bytes))
    } catch (e) {
      console.error(`[Storage] File ${fileName} is not valid JSON`, e)
      return null
    }
  }

  const api: FileStorage<Schema> = {
    load: async (fileName: string) => {
      // 1. Load and parse the file, leaving the content unknown until the header checks out
      //
      const fileData = await tryLoad(fileName)
      if (fileData == null) {
        return null
      }

      const parsedFile = zStorageFileSchema.safeParse(fileData)
      if (!parsedFile.success) {
        console.error(`[Storage] Failed to parse file ${fileName}:`, z.prettifyError(parsedFile.error))
        return null
      }

      const { header, content } = parsedFile.data
      if (header.version !== version) {
        console.debug(`[Storage] File ${fileName} has version ${header.version}, reading it as version ${version}`)
      }

      // 2. Parse the content against the output schema
      //
      const parsedState = schema.safeParse(content)
      if (!parsedState.success) {
        console.error(`[Storage] Failed to parse file ${fileName} content:\n${z.prettifyError(parsedState.error)}`)
        return null
      }

      return parsedState.data
    },

    save: async (fileName: string, content: Schema) => {
      if (!writeable) {
        return
      }

      const file = {
        header: {
          version,
          updated: new Date().toISOString(),
        },
        content,
      }
      await bindings.writeFile(fileName, textEncoder.encode(`${JSON.stringify(file, null, 2)}\n`))
    },
  }

  return api
}
