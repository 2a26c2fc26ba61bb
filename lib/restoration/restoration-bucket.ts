import { RestorationError, restorationAssert } from "./errors"
import {
  isSerializableForRestoration,
  primitivesEqual,
  type RawBucketData,
  type RestorationPrimitive,
} from "./restoration-codec"

/**
 * The part of the manager a bucket talks to. Kept as an interface so buckets
 * can be created and tested without a full RestorationManager.
 */
export interface RestorationBucketManager {
  readonly isReplacing: boolean
  scheduleSerializationFor(bucket: RestorationBucket): void
  unscheduleSerializationFor(bucket: RestorationBucket): void
}

type BucketOptions = {
  restorationId: string
  rawData: RawBucketData
  manager: RestorationBucketManager | null
  parent: RestorationBucket | null
  debugOwner?: string
}

/**
 * A node in the restoration tree. Holds primitive values keyed by id plus
 * child buckets, and shares its raw data object with its parent so that
 * serializing the root captures the whole tree.
 *
 * Buckets are claimed from a parent with {@link claimChild}, moved with
 * {@link adoptChild}, re-keyed with {@link rename} and released with
 * {@link dispose}. Any mutation marks the bucket dirty and asks the manager
 * to serialize at the end of the frame.
 */
export class RestorationBucket {
  private _restorationId: string
  private readonly rawData: RawBucketData
  private manager: RestorationBucketManager | null
  private parent: RestorationBucket | null
  private readonly claimedChildren = new Map<string, RestorationBucket>()
  // Children adopted while another bucket still holds their id. Resolved when
  // the current holder lets go; must be empty by the time the frame finalizes.
  private readonly childrenToAdd = new Map<string, RestorationBucket[]>()
  private needsSerialization = false
  private disposed = false
  private provisional = false
  readonly debugOwner: string | undefined

  private constructor(options: BucketOptions) {
    this._restorationId = options.restorationId
    this.rawData = options.rawData
    this.manager = options.manager
    this.parent = options.parent
    this.debugOwner = options.debugOwner
  }

  /** A detached bucket with no data, to be adopted by a parent. */
  static empty(restorationId: string, debugOwner?: string): RestorationBucket {
    return new RestorationBucket({ restorationId, rawData: {}, manager: null, parent: null, debugOwner })
  }

  static root(manager: RestorationBucketManager, rawData: RawBucketData | null): RestorationBucket {
    return new RestorationBucket({
      restorationId: "root",
      rawData: rawData ?? {},
      manager,
      parent: null,
      debugOwner: "RestorationManager",
    })
  }

  private static child(restorationId: string, parent: RestorationBucket, debugOwner?: string): RestorationBucket {
    return new RestorationBucket({
      restorationId,
      rawData: parent.rawChildren.get(restorationId) ?? {},
      manager: parent.manager,
      parent,
      debugOwner,
    })
  }

  get restorationId(): string {
    this.assertNotDisposed()
    return this._restorationId
  }

  get isReplacing(): boolean {
    return this.manager?.isReplacing ?? false
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  isChildOf(bucket: RestorationBucket): boolean {
    return this.parent === bucket
  }

  /** True until the owner of a provisional claim calls {@link commitClaim}. */
  get isProvisional(): boolean {
    return this.provisional
  }

  /** False once the bucket was dropped by, or evicted from, its parent. */
  get isAttached(): boolean {
    return this.parent !== null
  }

  /** The raw tree backing this bucket; shared with the parent. */
  get data(): RawBucketData {
    return this.rawData
  }

  private get rawValues(): Map<string, RestorationPrimitive> {
    if (!this.rawData.values) {
      this.rawData.values = new Map()
    }
    return this.rawData.values
  }

  private get rawChildren(): Map<string, RawBucketData> {
    if (!this.rawData.children) {
      this.rawData.children = new Map()
    }
    return this.rawData.children
  }

  contains(restorationId: string): boolean {
    this.assertNotDisposed()
    return this.rawData.values?.has(restorationId) ?? false
  }

  read(restorationId: string): RestorationPrimitive | undefined {
    this.assertNotDisposed()
    return this.rawData.values?.get(restorationId)
  }

  write(restorationId: string, value: RestorationPrimitive): void {
    this.assertNotDisposed()
    restorationAssert(
      isSerializableForRestoration(value),
      () => `The value written under "${restorationId}" cannot be serialized for restoration.`,
      restorationId,
    )
    const values = this.rawValues
    const current = values.get(restorationId)
    if (!values.has(restorationId) || current === undefined || !primitivesEqual(current, value)) {
      values.set(restorationId, value)
      this.markNeedsSerialization()
    }
  }

  remove(restorationId: string): RestorationPrimitive | undefined {
    this.assertNotDisposed()
    const values = this.rawData.values
    if (!values || !values.has(restorationId)) {
      return undefined
    }
    const removed = values.get(restorationId)
    values.delete(restorationId)
    if (values.size === 0) {
      delete this.rawData.values
    }
    this.markNeedsSerialization()
    return removed
  }

  /**
   * Claims the child bucket stored under `restorationId`.
   *
   * If that id is already claimed, or no data exists for it, an empty bucket
   * is returned instead. In the first case the previous owner is expected to
   * give the id up before the end of the frame ({@link finalize} checks).
   *
   * A `provisional` claim comes from a render that React may still throw
   * away. A later claim of the same id evicts it and takes over its data; the
   * evicted owner re-adopts its bucket if it commits after all.
   */
  claimChild(restorationId: string, debugOwner?: string, { provisional = false } = {}): RestorationBucket {
    this.assertNotDisposed()
    const holder = this.claimedChildren.get(restorationId)
    if (holder?.provisional) {
      this.evictChild(holder)
    }
    let child: RestorationBucket
    if (this.claimedChildren.has(restorationId) || !this.rawChildren.has(restorationId)) {
      child = RestorationBucket.empty(restorationId, debugOwner)
      this.adoptChild(child)
    } else {
      child = RestorationBucket.child(restorationId, this, debugOwner)
      this.claimedChildren.set(restorationId, child)
    }
    child.provisional = provisional
    return child
  }

  commitClaim(): void {
    this.assertNotDisposed()
    this.provisional = false
  }

  /**
   * Moves `child` (and everything below it) into this bucket. No-op if it is
   * already a child of this bucket.
   */
  adoptChild(child: RestorationBucket): void {
    this.assertNotDisposed()
    if (child.parent === this) return
    child.parent?.removeChildData(child)
    child.parent = this
    this.addChildData(child)
    if (child.manager !== this.manager) {
      this.recursivelyUpdateManager(child)
    }
  }

  rename(newRestorationId: string): void {
    this.assertNotDisposed()
    if (newRestorationId === this._restorationId) return
    this.parent?.removeChildData(this)
    this._restorationId = newRestorationId
    this.parent?.addChildData(this)
  }

  /**
   * Called by the manager right before the tree is serialized.
   */
  finalize(): void {
    this.assertNotDisposed()
    this.needsSerialization = false
    if (this.childrenToAdd.size > 0) {
      const conflicts = Array.from(this.childrenToAdd, ([id, pending]) => {
        const owners = [this.claimedChildren.get(id), ...pending].map((bucket) => bucket?.debugOwner ?? "<unknown>")
        return `"${id}" (claimed by ${owners.join(", ")})`
      })
      restorationAssert(
        false,
        `Multiple owners claimed child RestorationBuckets with the same IDs: ${conflicts.join("; ")}. ` +
          `Make sure restoration ids are unique among siblings.`,
      )
    }
  }

  dispose(): void {
    this.assertNotDisposed()
    this.visitChildren((child) => this.dropChild(child), true)
    this.claimedChildren.clear()
    this.childrenToAdd.clear()
    this.parent?.removeChildData(this)
    this.parent = null
    this.updateManager(null)
    this.disposed = true
  }

  toString(): string {
    return `RestorationBucket(restorationId: ${this._restorationId}, owner: ${this.debugOwner ?? "<unknown>"})`
  }

  private markNeedsSerialization(): void {
    if (!this.needsSerialization) {
      this.needsSerialization = true
      this.manager?.scheduleSerializationFor(this)
    }
  }

  private addChildData(child: RestorationBucket): void {
    if (this.claimedChildren.has(child._restorationId)) {
      const pending = this.childrenToAdd.get(child._restorationId) ?? []
      pending.push(child)
      this.childrenToAdd.set(child._restorationId, pending)
      this.markNeedsSerialization()
      return
    }
    this.finalizeAddChildData(child)
    this.markNeedsSerialization()
  }

  private finalizeAddChildData(child: RestorationBucket): void {
    this.claimedChildren.set(child._restorationId, child)
    this.rawChildren.set(child._restorationId, child.rawData)
  }

  private removeChildData(child: RestorationBucket): void {
    const id = child._restorationId
    if (this.claimedChildren.get(id) === child) {
      this.claimedChildren.delete(id)
      const pending = this.childrenToAdd.get(id)
      const next = pending?.pop()
      if (next) {
        this.finalizeAddChildData(next)
        if (pending && pending.length === 0) {
          this.childrenToAdd.delete(id)
        }
      } else {
        this.rawData.children?.delete(id)
        if (this.rawData.children?.size === 0) {
          delete this.rawData.children
        }
      }
      this.markNeedsSerialization()
      return
    }
    const pending = this.childrenToAdd.get(id)
    if (pending) {
      const index = pending.indexOf(child)
      if (index !== -1) pending.splice(index, 1)
      if (pending.length === 0) this.childrenToAdd.delete(id)
    }
  }

  // Unlike dropChild, the raw data stays so the next claim of the id finds it.
  private evictChild(child: RestorationBucket): void {
    this.claimedChildren.delete(child._restorationId)
    child.parent = null
    child.updateManager(null)
    child.visitChildren((grandchild) => child.recursivelyUpdateManager(grandchild))
  }

  private dropChild(child: RestorationBucket): void {
    if (child.parent !== this) {
      throw new RestorationError(`${child} is not a child of ${this}.`, child._restorationId)
    }
    this.removeChildData(child)
    child.parent = null
    if (child.manager !== null) {
      child.updateManager(null)
      child.visitChildren((grandchild) => child.recursivelyUpdateManager(grandchild))
    }
  }

  private recursivelyUpdateManager(bucket: RestorationBucket): void {
    bucket.updateManager(this.manager)
    bucket.visitChildren((child) => bucket.recursivelyUpdateManager(child))
  }

  private updateManager(manager: RestorationBucketManager | null): void {
    if (this.manager === manager) return
    if (this.needsSerialization) {
      this.manager?.unscheduleSerializationFor(this)
    }
    this.manager = manager
    if (this.needsSerialization && this.manager) {
      this.needsSerialization = false
      this.markNeedsSerialization()
    }
  }

  private visitChildren(visitor: (child: RestorationBucket) => void, concurrentModification = false): void {
    let children: Iterable<RestorationBucket> = this.claimedChildren.values()
    let pending: Iterable<RestorationBucket> = Array.from(this.childrenToAdd.values()).flat()
    if (concurrentModification) {
      children = Array.from(children)
      pending = Array.from(pending)
    }
    for (const child of children) visitor(child)
    for (const child of pending) visitor(child)
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new RestorationError(
        `A RestorationBucket was used after being disposed. ` +
          `Once dispose() has been called on a bucket it can no longer be used.`,
      )
    }
  }
}
