import os from "node:os"
import path from "node:path"

import { toMerged } from "es-toolkit"
import { z } from "zod"

import { createFsBindings } from "@/bindings/fs"
import { createStorage, type FileStorage } from "@/state/middleware/storage"
import type { FileSystemBindings } from "@/types/bindings"
import { type Settings, type SettingsFile, type SettingsInput, zSettings, zSettingsFile } from "@/types/settings"

export const AppName = "reqtree"
export const SettingsFileName = "settings.json"

const SettingsVersion = 1

export const createSettingsStorage = (bindings: FileSystemBindings, writeable = true): FileStorage<SettingsFile> =>
  createStorage({
    bindings,
    version: SettingsVersion,
    schema: zSettingsFile,
    writeable,
  })

type Env = Record<string, string | undefined>

/**
 * REQTREE_DATA_DIR, then $XDG_DATA_HOME/reqtree, then ~/.local/share/reqtree
 */
export const resolveDataDir = (env: Env = process.env): string => {
  if (env.REQTREE_DATA_DIR) {
    return path.resolve(env.REQTREE_DATA_DIR)
  }
  const dataHome = env.XDG_DATA_HOME || path.join(os.homedir(), ".local", "share")
  return path.join(dataHome, AppName)
}

export const collectionsDirOf = (settings: Settings): string =>
  settings.collectionsDir ?? path.join(settings.dataDir, "collections")

const isTruthy = (value: string) => ["1", "true", "yes", "on"].includes(value.trim().toLowerCase())

const fromEnv = (env: Env): SettingsFile => {
  const settings: SettingsFile = {}
  if (env.REQTREE_COLLECTIONS_DIR) {
    settings.collectionsDir = path.resolve(env.REQTREE_COLLECTIONS_DIR)
  }
  if (env.REQTREE_DRY_RUN) {
    settings.dryRun = isTruthy(env.REQTREE_DRY_RUN)
  }
  return settings
}

export interface LoadSettingsOptions {
  env?: Env
  overrides?: Partial<SettingsInput>
  /** Where settings.json is read from. Defaults to the data directory. */
  bindings?: FileSystemBindings
}

/**
 * Resolve settings from defaults, settings.json, the environment and explicit overrides, in increasing precedence
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const { env = process.env, overrides = {} } = options
  const dataDir = overrides.dataDir ?? resolveDataDir(env)
  const bindings = options.bindings ?? createFsBindings(dataDir)

  const file = (await createSettingsStorage(bindings, false).load(SettingsFileName)) ?? {}
  const merged = toMerged(toMerged(file, fromEnv(env)), overrides)

  const parsed = zSettings.safeParse({ ...merged, dataDir })
  if (!parsed.success) {
    console.error(`[Settings] Invalid settings, using defaults:\n${z.prettifyError(parsed.error)}`)
    return zSettings.parse({ dataDir })
  }
  console.debug(`[Settings] Loaded settings from ${bindings.root}`)
  return parsed.data
}

/**
 * Persist everything except dataDir to settings.json
 */
export async function saveSettings(settings: Settings, bindings?: FileSystemBindings): Promise<void> {
  const { dataDir, ...content } = settings
  await createSettingsStorage(bindings ?? createFsBindings(dataDir)).save(SettingsFileName, content)
}
