"use client"

import { useContext, useEffect, useRef } from "react"

import { RestorationError, restorationAssert } from "../restoration/errors"
import type { RestorationBucket } from "../restoration/restoration-bucket"
import { RestorationBucketContext } from "../restoration/restoration-context"
import { logBucketEvent } from "../utils/debug-logger"
import type { RestorableProperty, RestorablePropertyOwner } from "./restorable-property"
import { useDisposeOnUnmount } from "./use-dispose-on-unmount"

type AnyRestorableProperty = RestorableProperty<unknown>

/**
 * The registration surface handed to `restoreState` and returned from
 * {@link useStateRestoration}.
 */
export interface StateRestoration {
  /**
   * The bucket claimed from the enclosing scope under `restorationId`, or null
   * when restoration is off (no scope, no id, or disabled).
   */
  readonly bucket: RestorationBucket | null
  readonly restorationId: string | null | undefined
  /**
   * True when new restoration data has arrived but `restoreState` has not run
   * for it yet. `bucket` still points at the old data meanwhile.
   */
  readonly restorePending: boolean

  /**
   * Registers `property` under `restorationId`, unique within this component.
   *
   * The property gets its value from the bucket when data is stored under the
   * id, and its default otherwise. Usually called from `restoreState`; a
   * property registered later must be registered again on the next
   * `restoreState` unless it was unregistered.
   */
  registerForRestoration(property: AnyRestorableProperty, restorationId: string): void

  /**
   * Removes `property` and its stored value from the restoration data. It
   * will not be restored in a future restoration.
   */
  unregisterFromRestoration(property: AnyRestorableProperty): void

  /**
   * Re-keys the bucket after `restorationId` changed. The hook calls this on
   * every render where the id differs from the last one.
   */
  didUpdateRestorationId(): void
}

export type RestoreStateCallback = (
  oldBucket: RestorationBucket | null,
  initialRestore: boolean,
  restoration: StateRestoration,
) => void

export interface UseStateRestorationOptions {
  restorationId: string | null | undefined
  restoreState: RestoreStateCallback
  /**
   * Called when `bucket` switches between null and non-null outside a
   * restore. `oldBucket` is the previous bucket when it goes away and null
   * when one appears.
   */
  didToggleBucket?: (oldBucket: RestorationBucket | null) => void
}

/**
 * Per-component property registry. One instance lives for the lifetime of a
 * component using {@link useStateRestoration}; {@link build} is called on
 * every render with the bucket of the enclosing scope.
 */
export class StateRestorationController implements StateRestoration, RestorablePropertyOwner {
  private options: UseStateRestorationOptions | null = null
  private _bucket: RestorationBucket | null = null
  private currentParent: RestorationBucket | null = null
  // The scope bucket seen by the render in progress; may differ from currentParent.
  private scopeParent: RestorationBucket | null = null
  private firstRestorePending = true
  private committed = false
  private disposed = false
  private readonly properties = new Map<AnyRestorableProperty, () => void>()
  private propertiesWaitingForReregistration: Set<AnyRestorableProperty> | null = null

  get bucket(): RestorationBucket | null {
    return this._bucket
  }

  get restorationId(): string | null | undefined {
    return this.options?.restorationId
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  get restorePending(): boolean {
    if (this.firstRestorePending) {
      return true
    }
    if (this.restorationId == null) {
      return false
    }
    const potentialNewParent = this.scopeParent
    return potentialNewParent !== this.currentParent && (potentialNewParent?.isReplacing ?? false)
  }

  private get doingRestore(): boolean {
    return this.propertiesWaitingForReregistration !== null
  }

  /**
   * Runs the bucket lifecycle for one render: applies new options, claims,
   * renames or drops the bucket, and calls `restoreState` when needed.
   */
  build(parent: RestorationBucket | null, options: UseStateRestorationOptions): void {
    this.assertNotDisposed()
    const previousId = this.options?.restorationId
    const idChanged = this.options !== null && previousId !== options.restorationId
    this.options = options
    this.scopeParent = parent

    if (idChanged) {
      this.didUpdateRestorationId()
    }

    const oldBucket = this._bucket
    const needsRestore = this.restorePending
    this.currentParent = parent

    const didReplaceBucket = this.updateBucketIfNecessary(parent, needsRestore)

    if (needsRestore) {
      this.doRestore(oldBucket)
    }
    if (didReplaceBucket && oldBucket && oldBucket !== this._bucket) {
      oldBucket.dispose()
    }
  }

  /**
   * Confirms the bucket claimed while rendering. Until then the claim is
   * provisional, so a render React discards (StrictMode renders every mount
   * twice) does not keep the id from the instance that does mount.
   */
  commit(): void {
    if (this.committed || this.disposed) return
    this.committed = true
    const bucket = this._bucket
    if (!bucket) return
    bucket.commitClaim()
    if (!bucket.isAttached && this.currentParent && !this.currentParent.isDisposed) {
      // Evicted by a sibling claiming the same id; finalize() reports the clash.
      this.currentParent.adoptChild(bucket)
      void logBucketEvent("adopt", bucket.restorationId, { afterEviction: true })
    }
  }

  registerForRestoration(property: AnyRestorableProperty, restorationId: string): void {
    this.assertNotDisposed()
    restorationAssert(
      property.restorationId === null || (this.doingRestore && property.restorationId === restorationId),
      () => `Property is already registered under ${property.restorationId}.`,
      restorationId,
    )
    restorationAssert(
      this.doingRestore ||
        !Array.from(this.properties.keys()).some((registered) => registered.restorationId === restorationId),
      () => `"${restorationId}" is already registered to another property.`,
      restorationId,
    )

    const bucket = this._bucket
    const stored = bucket?.contains(restorationId) ? bucket.read(restorationId) : undefined
    const hasSerializedValue = stored !== undefined
    const initialValue = hasSerializedValue ? property.fromPrimitives(stored) : property.createDefaultValue()

    if (!property.isRegistered) {
      property.attachOwner(restorationId, this)
      const listener = () => {
        if (this._bucket === null) {
          return
        }
        this.updateProperty(property)
      }
      property.addListener(listener)
      this.properties.set(property, listener)
    }

    this.propertiesWaitingForReregistration?.delete(property)

    property.initWithValue(initialValue)
    if (!hasSerializedValue && property.enabled && this._bucket !== null) {
      this.updateProperty(property)
    }
  }

  unregisterFromRestoration(property: AnyRestorableProperty): void {
    restorationAssert(property.isOwnedBy(this), "Property is not registered with this component.")
    if (!property.isOwnedBy(this)) return
    const id = property.restorationId
    if (id !== null) {
      this._bucket?.remove(id)
    }
    this.detachProperty(property)
  }

  didUpdateRestorationId(): void {
    // Nothing to do without a parent, when the bucket already carries the id,
    // or when a restore is pending (build() handles the rename then).
    if (this.currentParent === null || this._bucket?.restorationId === this.restorationId || this.restorePending) {
      return
    }

    const oldBucket = this._bucket
    const didReplaceBucket = this.updateBucketIfNecessary(this.currentParent, false)
    if (didReplaceBucket && oldBucket && oldBucket !== this._bucket) {
      oldBucket.dispose()
    }
  }

  detachProperty(property: AnyRestorableProperty): void {
    const listener = this.properties.get(property)
    if (listener) {
      this.properties.delete(property)
      property.removeListener(listener)
    }
    this.propertiesWaitingForReregistration?.delete(property)
    if (!property.isDisposed && property.isOwnedBy(this)) {
      property.detachOwner()
    }
  }

  dispose(): void {
    if (this.disposed) return
    for (const [property, listener] of this.properties) {
      if (!property.isDisposed) {
        property.removeListener(listener)
        if (property.isOwnedBy(this)) property.detachOwner()
      }
    }
    this.properties.clear()
    if (this._bucket) {
      void logBucketEvent("dispose", this._bucket.restorationId)
      this._bucket.dispose()
    }
    this._bucket = null
    this.disposed = true
  }

  private doRestore(oldBucket: RestorationBucket | null): void {
    const options = this.options
    if (!options) return
    this.propertiesWaitingForReregistration = new Set(this.properties.keys())
    const initialRestore = this.firstRestorePending

    try {
      options.restoreState(oldBucket, initialRestore, this)
    } finally {
      this.firstRestorePending = false
      const missing = Array.from(this.propertiesWaitingForReregistration)
      this.propertiesWaitingForReregistration = null
      if (missing.length > 0) {
        restorationAssert(
          false,
          () =>
            `Previously registered restorable properties must be re-registered in "restoreState". ` +
            `The properties with the following ids were not re-registered: ` +
            missing.map((property) => property.restorationId ?? "<unknown>").join(", "),
          this.restorationId ?? undefined,
        )
      }
    }
  }

  // Returns true if `bucket` has been replaced. The caller disposes the old one.
  private updateBucketIfNecessary(parent: RestorationBucket | null, restorePending: boolean): boolean {
    const restorationId = this.restorationId
    if (restorationId == null || parent === null) {
      return this.setNewBucketIfNecessary(null, restorePending)
    }
    if (restorePending || this._bucket === null) {
      const newBucket = parent.claimChild(restorationId, `useStateRestoration(${restorationId})`, {
        provisional: !this.committed,
      })
      void logBucketEvent("claim", restorationId, { restorePending })
      return this.setNewBucketIfNecessary(newBucket, restorePending)
    }
    // Existing bucket: make sure it has the right id and parent.
    if (this._bucket.restorationId !== restorationId) {
      void logBucketEvent("rename", restorationId, { from: this._bucket.restorationId })
    }
    this._bucket.rename(restorationId)
    if (!this._bucket.isChildOf(parent)) {
      void logBucketEvent("adopt", restorationId)
    }
    parent.adoptChild(this._bucket)
    return false
  }

  private setNewBucketIfNecessary(newBucket: RestorationBucket | null, restorePending: boolean): boolean {
    if (newBucket === this._bucket) {
      return false
    }
    const oldBucket = this._bucket
    this._bucket = newBucket
    if (!restorePending) {
      // Persist the current property values into the new bucket.
      if (this._bucket !== null) {
        for (const property of this.properties.keys()) {
          this.updateProperty(property)
        }
      }
      void logBucketEvent("toggle", this.restorationId ?? null, { hasBucket: this._bucket !== null })
      this.options?.didToggleBucket?.(oldBucket)
    }
    return true
  }

  private updateProperty(property: AnyRestorableProperty): void {
    const id = property.restorationId
    if (id === null || this._bucket === null) return
    if (property.enabled) {
      this._bucket.write(id, property.toPrimitives())
    } else {
      this._bucket.remove(id)
    }
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new RestorationError("StateRestorationController was used after being disposed.", this.restorationId ?? undefined)
    }
  }
}

/**
 * Binds a {@link StateRestorationController} to the calling component.
 *
 * The controller claims a bucket named `restorationId` from the nearest
 * restoration scope. `restoreState` runs during the first render and again
 * whenever new restoration data replaces the scope's bucket; register every
 * restorable property there.
 *
 * @example
 * ```tsx
 * function Counter() {
 *   const count = useRestorableProperty(() => new RestorableInt(0))
 *   useStateRestoration({
 *     restorationId: "counter",
 *     restoreState: (_oldBucket, _initialRestore, restoration) => {
 *       restoration.registerForRestoration(count, "count")
 *     },
 *   })
 *   return <button onClick={() => (count.value += 1)}>{count.value}</button>
 * }
 * ```
 */
export function useStateRestoration(options: UseStateRestorationOptions): StateRestoration {
  const parent = useContext(RestorationBucketContext)
  const controllerRef = useRef<StateRestorationController | null>(null)
  if (controllerRef.current === null) {
    controllerRef.current = new StateRestorationController()
  }
  const controller = controllerRef.current

  // Runs during render so registered values are readable in the same render.
  controller.build(parent, options)

  useEffect(() => {
    controller.commit()
  }, [controller])
  useDisposeOnUnmount(controller)

  return controller
}
