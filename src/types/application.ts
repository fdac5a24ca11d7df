import type { StateCreator } from "zustand/vanilla"

import type { CollectionLocks } from "@/lib/locks"
import type { FileSystemBindings } from "@/types/bindings"
import type { CollectionsStateSlice } from "@/types/collections"
import type { Settings } from "@/types/settings"
import type { SyncStateSlice } from "@/types/sync"

export type ApplicationState = CollectionsStateSlice & SyncStateSlice

export type ApplicationMutators = [["zustand/immer", never], ["zustand/subscribeWithSelector", never]]

export type ApplicationSliceCreator<Slice> = StateCreator<ApplicationState, ApplicationMutators, [], Slice>

/**
 * Shared services handed to every slice
 */
export interface StoreContext {
  /** Rooted at the collections directory */
  bindings: FileSystemBindings
  locks: CollectionLocks
  settings: Settings
}
