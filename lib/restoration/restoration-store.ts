/**
 * Where the encoded restoration tree lives between launches.
 *
 * sessionStorage is the default: it survives reloads, tab discards and
 * "reopen closed tab", and is scoped to the tab like OS-level state
 * restoration is scoped to an app instance.
 */

import type { RestorationConfig } from "../config/restoration-config"

export interface RestorationStore {
  load(): Promise<string | null>
  save(encoded: string): Promise<void>
  clear(): Promise<void>
}

export class MemoryRestorationStore implements RestorationStore {
  private encoded: string | null

  constructor(initial: string | null = null) {
    this.encoded = initial
  }

  /** Last blob saved, for inspection in tests and devtools. */
  get snapshot(): string | null {
    return this.encoded
  }

  async load(): Promise<string | null> {
    return this.encoded
  }

  async save(encoded: string): Promise<void> {
    this.encoded = encoded
  }

  async clear(): Promise<void> {
    this.encoded = null
  }
}

/** The subset of the DOM Storage interface the store needs. */
export type StorageArea = Pick<Storage, "getItem" | "setItem" | "removeItem">

export class WebStorageRestorationStore implements RestorationStore {
  constructor(
    private readonly storage: StorageArea,
    private readonly key: string,
  ) {}

  async load(): Promise<string | null> {
    return this.storage.getItem(this.key)
  }

  async save(encoded: string): Promise<void> {
    // setItem throws QuotaExceededError when full; callers decide how to report it.
    this.storage.setItem(this.key, encoded)
  }

  async clear(): Promise<void> {
    this.storage.removeItem(this.key)
  }
}

function resolveStorageArea(kind: "session" | "local"): StorageArea | null {
  if (typeof window === "undefined") return null
  try {
    return kind === "session" ? window.sessionStorage : window.localStorage
  } catch {
    // Accessing storage throws when it is blocked (sandboxed iframes, privacy settings)
    return null
  }
}

/**
 * Builds the store named by the configuration, falling back to memory when
 * Web Storage is unavailable (server rendering, blocked storage).
 */
export function createRestorationStore(config: Pick<RestorationConfig, "storage" | "storageKey">): RestorationStore {
  if (config.storage === "memory") {
    return new MemoryRestorationStore()
  }
  const area = resolveStorageArea(config.storage)
  if (!area) {
    console.warn(
      `[RestorationStore] ${config.storage}Storage is not available; restoration data will only live in memory.`,
    )
    return new MemoryRestorationStore()
  }
  return new WebStorageRestorationStore(area, config.storageKey)
}
