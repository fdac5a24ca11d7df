export interface DirectoryEntry {
  name: string
  kind: "file" | "directory"
}

export interface EntryStat {
  kind: "file" | "directory"
  sizeBytes: number
  modified: Date
}

/**
 * Storage medium for collections and settings. Paths are relative, `/` separated, and
 * resolved against the root the bindings were created with.
 *
 * All methods reject with an AppError.
 */
export interface FileSystemBindings {
  readonly root: string
  readFile(path: string): Promise<Uint8Array>
  /** Replace the file's content atomically, creating parent directories as needed */
  writeFile(path: string, data: Uint8Array): Promise<void>
  /** Remove a file or a directory tree. Missing paths are not an error. */
  remove(path: string): Promise<void>
  rename(from: string, to: string): Promise<void>
  mkdir(path: string): Promise<void>
  readDir(path: string): Promise<DirectoryEntry[]>
  stat(path: string): Promise<EntryStat>
  exists(path: string): Promise<boolean>
}
