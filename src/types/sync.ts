import type { AppError } from "@/lib/errors"

export type SyncStatus = "clean" | "dirty" | "flushing"

export type FlushReason = "save" | "navigation" | "autosync" | "shutdown" | "close"

export interface FlushFailure {
  /** Node the operation was for, absent for leftover temporary entries */
  id?: string
  path: string
  operation: "remove" | "move" | "write"
  error: AppError
}

export interface FlushResult {
  collectionId: string
  reason: FlushReason
  /** Nothing was dirty, storage was not touched */
  skipped: boolean
  /** Ids written */
  written: string[]
  /** Paths removed */
  removed: string[]
  /** Paths relocated, as `from -> to` pairs */
  moved: Array<{ from: string; to: string }>
  failed: FlushFailure[]
}

export const isFlushSuccess = (result: FlushResult): boolean => result.failed.length === 0

export interface CloseOptions {
  /** What to do with unsaved changes. Without it, closing a dirty collection throws `UnsavedChanges`. */
  onDirty?: "flush" | "discard"
}

export interface SyncStateApi {
  /**
   * Write dirty nodes and remove deleted ones. A clean collection is not touched.
   * I/O failures are reported in the result and leave the affected nodes dirty.
   */
  flush(collectionId: string, reason?: FlushReason): Promise<FlushResult>

  /** Explicit save */
  save(collectionId: string): Promise<FlushResult>

  /**
   * Move focus to `nodeId`. When focus leaves a dirty request, the collection is flushed first.
   * @returns The forced flush result, or null when no flush was needed
   */
  navigate(collectionId: string, nodeId: string | null): Promise<FlushResult | null>

  /**
   * Drop unsaved changes and reload the collection from disk
   */
  discardChanges(collectionId: string): Promise<void>

  closeCollection(collectionId: string, options?: CloseOptions): Promise<void>

  /**
   * Stop automatic syncing and flush every open collection
   */
  shutdown(): Promise<FlushResult[]>

  status(collectionId: string): SyncStatus

  /** Resolves once every queued mutation and flush for the collection has finished */
  whenIdle(collectionId: string): Promise<void>
}

export interface SyncStateSlice {
  syncApi: SyncStateApi
}
