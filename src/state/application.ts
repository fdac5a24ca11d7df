import { subscribeWithSelector } from "zustand/middleware"
import { immer } from "zustand/middleware/immer"
import { createStore } from "zustand/vanilla"

import { createFsBindings } from "@/bindings/fs"
import { createMemoryBindings } from "@/bindings/memory"
import { createCollectionLocks } from "@/lib/locks"
import { createCollectionsSlice } from "@/state/collections"
import { collectionsDirOf, type LoadSettingsOptions, loadSettings } from "@/state/settings"
import { createSyncSlice } from "@/state/sync"
import type { ApplicationState, StoreContext } from "@/types/application"
import type { FileSystemBindings } from "@/types/bindings"
import type { Settings } from "@/types/settings"

export interface ApplicationStoreOptions {
  settings: Settings
  /** Storage for collections. Defaults to the collections directory, or memory for dry runs. */
  bindings?: FileSystemBindings
}

export const createApplicationStore = (options: ApplicationStoreOptions) => {
  const { settings } = options
  const bindings =
    options.bindings ?? (settings.dryRun ? createMemoryBindings() : createFsBindings(collectionsDirOf(settings)))
  if (settings.dryRun) {
    console.info("[Application] Dry run: collections are kept in memory only")
  }

  const context: StoreContext = {
    bindings,
    locks: createCollectionLocks(settings.lockTimeoutMs),
    settings,
  }

  return createStore<ApplicationState>()(
    immer(
      subscribeWithSelector((set, get, store) => ({
        ...createCollectionsSlice(context)(set, get, store),
        ...createSyncSlice(context)(set, get, store),
      })),
    ),
  )
}

export type ApplicationStore = ReturnType<typeof createApplicationStore>

/**
 * Resolve settings and create the store they describe
 */
export const openApplication = async (options: LoadSettingsOptions = {}): Promise<ApplicationStore> =>
  createApplicationStore({ settings: await loadSettings(options) })

///
/// Stable API references
///
export const collectionsApi = (store: ApplicationStore) => store.getState().collectionsApi
export const syncApi = (store: ApplicationStore) => store.getState().syncApi
