/**
 * Restoration Manager
 *
 * Owns the root of the restoration tree. Loads it from a RestorationStore on
 * first use, swaps it out when new restoration data arrives, and writes the
 * tree back (debounced to one save per frame) whenever a bucket changes.
 */

import { getRestorationConfig, type RestorationConfig } from "../config/restoration-config"
import { debugLog } from "../utils/debug-logger"
import { ChangeNotifier } from "./change-notifier"
import { RestorationBucket, type RestorationBucketManager } from "./restoration-bucket"
import { decodeRestorationData, encodeRestorationData, type RawBucketData } from "./restoration-codec"
import { createRestorationStore, type RestorationStore } from "./restoration-store"

export interface RestorationUpdate {
  enabled: boolean
  data: RawBucketData | null
}

export type FrameScheduler = (callback: () => void) => void

export interface RestorationManagerOptions {
  store?: RestorationStore
  config?: Partial<RestorationConfig>
  /** Runs a callback at the end of the current frame. Defaults to a timer. */
  scheduleFrame?: FrameScheduler
}

export class RestorationManager extends ChangeNotifier implements RestorationBucketManager {
  private readonly store: RestorationStore
  private readonly config: RestorationConfig
  private readonly scheduleFrame: FrameScheduler

  private root: RestorationBucket | null = null
  private rootIsValid = false
  private pendingRoot: Promise<RestorationBucket | null> | null = null
  private replacing = false

  private readonly bucketsNeedingSerialization = new Set<RestorationBucket>()
  private serializationScheduled = false
  // Ordering only: each save starts after the previous one settled. Failures
  // surface through the promise doSerialization returns.
  private saveChain: Promise<void> = Promise.resolve()

  constructor(options: RestorationManagerOptions = {}) {
    super()
    this.config = { ...getRestorationConfig(), ...options.config }
    this.store = options.store ?? createRestorationStore(this.config)
    const delay = this.config.serializationDelayMs
    this.scheduleFrame = options.scheduleFrame ?? ((callback) => void setTimeout(callback, delay))
  }

  /**
   * The root bucket, loaded from the store the first time it is requested.
   * Resolves to null when restoration is disabled.
   */
  get rootBucket(): Promise<RestorationBucket | null> {
    if (this.rootIsValid) {
      return Promise.resolve(this.root)
    }
    if (!this.pendingRoot) {
      this.pendingRoot = this.loadRootBucket().finally(() => {
        this.pendingRoot = null
      })
    }
    return this.pendingRoot
  }

  /** Synchronous view of the root: undefined until the first load completes. */
  get currentRootBucket(): RestorationBucket | null | undefined {
    return this.rootIsValid ? this.root : undefined
  }

  get isRootBucketValid(): boolean {
    return this.rootIsValid
  }

  /**
   * True between the arrival of new restoration data and the end of the
   * frame in which owners re-claim their buckets from the new tree.
   */
  get isReplacing(): boolean {
    return this.replacing
  }

  /**
   * Re-reads the store and applies its contents as new restoration data, as
   * if the host had pushed an update.
   */
  async reload(): Promise<void> {
    const data = await this.readStore()
    this.handleRestorationUpdate({ enabled: this.config.enabled, data })
  }

  handleRestorationUpdate(update: RestorationUpdate): void {
    this.replacing = this.rootIsValid && update.enabled
    if (this.replacing) {
      this.scheduleFrame(() => this.endReplacement())
    }
    const oldRoot = this.root
    this.root = update.enabled ? RestorationBucket.root(this, update.data) : null
    this.rootIsValid = true

    void debugLog({
      component: "RestorationManager",
      action: "restoration_update",
      metadata: { enabled: update.enabled, hasData: update.data !== null, replacing: this.replacing },
    })

    if (oldRoot !== this.root) {
      this.notifyListeners()
      oldRoot?.dispose()
    }
  }

  endReplacement(): void {
    this.replacing = false
  }

  scheduleSerializationFor(bucket: RestorationBucket): void {
    this.bucketsNeedingSerialization.add(bucket)
    if (!this.serializationScheduled) {
      this.serializationScheduled = true
      this.scheduleFrame(() => {
        this.doSerialization().catch((error: unknown) => {
          console.error("[RestorationManager] Failed to save restoration data:", error)
        })
      })
    }
  }

  unscheduleSerializationFor(bucket: RestorationBucket): void {
    this.bucketsNeedingSerialization.delete(bucket)
  }

  /**
   * Serializes pending changes immediately instead of waiting for the frame
   * callback, and waits for the store to accept them. Use before the page is
   * hidden (pagehide / visibilitychange).
   */
  async flushData(): Promise<void> {
    if (this.serializationScheduled) {
      await this.doSerialization()
    } else {
      await this.saveChain
    }
  }

  /** Forgets everything stored, leaving the current in-memory tree alone. */
  async clearStoredData(): Promise<void> {
    await this.saveChain
    await this.store.clear()
  }

  dispose(): void {
    this.bucketsNeedingSerialization.clear()
    this.serializationScheduled = false
    this.root?.dispose()
    this.root = null
    super.dispose()
  }

  private async loadRootBucket(): Promise<RestorationBucket | null> {
    const data = this.config.enabled ? await this.readStore() : null
    // A push may have landed while the store was being read; it wins.
    if (!this.rootIsValid) {
      this.handleRestorationUpdate({ enabled: this.config.enabled, data })
    }
    return this.root
  }

  private async readStore(): Promise<RawBucketData | null> {
    const encoded = await this.store.load()
    const decoded = decodeRestorationData(encoded)
    if (!decoded.ok) {
      console.warn(`[RestorationManager] Discarding stored restoration data: ${decoded.reason}`)
      return null
    }
    return decoded.data
  }

  private doSerialization(): Promise<void> {
    if (!this.serializationScheduled) {
      return this.saveChain
    }
    this.serializationScheduled = false
    const buckets = Array.from(this.bucketsNeedingSerialization)
    this.bucketsNeedingSerialization.clear()
    for (const bucket of buckets) {
      bucket.finalize()
    }
    if (!this.root) {
      return this.saveChain
    }
    const encoded = encodeRestorationData(this.root.data)
    void debugLog({
      component: "RestorationManager",
      action: "serialize",
      metadata: { buckets: buckets.length, bytes: encoded.length },
    })
    const save = this.saveChain.then(() => this.store.save(encoded))
    this.saveChain = save.then(
      () => undefined,
      () => undefined,
    )
    return save
  }
}

let defaultManager: RestorationManager | null = null

/**
 * Process-wide manager used when no RestorationManagerProvider is mounted.
 */
export function getDefaultRestorationManager(): RestorationManager {
  if (!defaultManager) {
    defaultManager = new RestorationManager()
  }
  return defaultManager
}
