import { z } from "zod"

/**
 * Background synchronization of dirty collections
 */
export const zAutoSyncSettings = z.object({
  // flush dirty collections on a timer
  enabled: z.boolean().default(true),
  // minimum milliseconds between automatic flushes of one collection
  intervalMs: z.number().int().min(0).default(5000),
})

export const zSettings = z.object({
  // root of all persisted data
  dataDir: z.string().min(1),
  // where collections live; defaults to <dataDir>/collections
  collectionsDir: z.string().min(1).optional(),
  autoSync: zAutoSyncSettings.prefault({}),
  // how long a mutation or flush waits for a busy collection
  lockTimeoutMs: z.number().int().positive().default(2000),
  // keep every write in memory, never touching the disk
  dryRun: z.boolean().default(false),
})

export type Settings = z.infer<typeof zSettings>
export type SettingsInput = z.input<typeof zSettings>

/**
 * settings.json content: every field optional, missing fields fall back to the defaults above
 */
export const zSettingsFile = z.object({
  collectionsDir: z.string().min(1).optional(),
  autoSync: z
    .object({
      enabled: z.boolean().optional(),
      intervalMs: z.number().int().min(0).optional(),
    })
    .optional(),
  lockTimeoutMs: z.number().int().positive().optional(),
  dryRun: z.boolean().optional(),
})
export type SettingsFile = z.infer<typeof zSettingsFile>
