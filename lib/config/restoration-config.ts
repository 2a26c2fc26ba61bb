/**
 * State Restoration Configuration
 *
 * Controlled via environment variables, with a localStorage override for each
 * key so a single browser session can flip behaviour without a rebuild:
 * - NEXT_PUBLIC_STATE_RESTORATION=0              disable restoration entirely
 * - NEXT_PUBLIC_STATE_RESTORATION_STORAGE=local  session | local | memory
 * - NEXT_PUBLIC_STATE_RESTORATION_KEY=my-app     storage key of the root blob
 * - NEXT_PUBLIC_STATE_RESTORATION_DELAY_MS=50    delay before a dirty frame is saved
 * - NEXT_PUBLIC_STATE_RESTORATION_ASSERTIONS=1   force protocol assertions on/off
 */

import { z } from "zod"

const ENABLED_VALUES = new Set(["enabled", "true", "1", "on", "yes"])
const DISABLED_VALUES = new Set(["disabled", "false", "0", "off", "no"])

export const RestorationStorageKind = z.enum(["session", "local", "memory"])
export type RestorationStorageKind = z.infer<typeof RestorationStorageKind>

export interface RestorationConfig {
  enabled: boolean
  storage: RestorationStorageKind
  storageKey: string
  serializationDelayMs: number
  assertions: boolean
}

export const DEFAULT_STORAGE_KEY = "state-restoration:root"

const DelaySchema = z.coerce.number().int().min(0).max(60_000)

function readFlag(name: string): string | undefined {
  if (typeof window !== "undefined") {
    try {
      const stored = window.localStorage.getItem(name)
      if (stored) {
        return stored
      }
    } catch {
      // storage can be unavailable (privacy mode); env value still applies
    }
  }
  const fromEnv = process.env[name]
  return fromEnv === "" ? undefined : fromEnv
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback
  const normalized = raw.trim().toLowerCase()
  if (ENABLED_VALUES.has(normalized)) return true
  if (DISABLED_VALUES.has(normalized)) return false
  return fallback
}

export function getRestorationConfig(): RestorationConfig {
  const storage = RestorationStorageKind.safeParse(
    readFlag("NEXT_PUBLIC_STATE_RESTORATION_STORAGE")?.trim().toLowerCase(),
  )
  const delay = DelaySchema.safeParse(readFlag("NEXT_PUBLIC_STATE_RESTORATION_DELAY_MS"))
  const storageKey = readFlag("NEXT_PUBLIC_STATE_RESTORATION_KEY")?.trim()

  return {
    enabled: parseBoolean(readFlag("NEXT_PUBLIC_STATE_RESTORATION"), true),
    storage: storage.success ? storage.data : "session",
    storageKey: storageKey ? storageKey : DEFAULT_STORAGE_KEY,
    serializationDelayMs: delay.success ? delay.data : 0,
    assertions: parseBoolean(
      readFlag("NEXT_PUBLIC_STATE_RESTORATION_ASSERTIONS"),
      process.env.NODE_ENV !== "production",
    ),
  }
}

export function areRestorationAssertionsEnabled(): boolean {
  return getRestorationConfig().assertions
}
