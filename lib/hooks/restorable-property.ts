import { ChangeNotifier } from "../restoration/change-notifier"
import { restorationAssert } from "../restoration/errors"
import type { RestorationPrimitive } from "../restoration/restoration-codec"

/**
 * What a property sees of the component it is registered with.
 */
export interface RestorablePropertyOwner {
  readonly restorationId: string | null | undefined
  /** Drops the owner's listener on `property` without touching the bucket. */
  detachProperty(property: RestorableProperty<unknown>): void
}

/**
 * A value a component wants back after the page is torn down and restored.
 *
 * The owner ({@link StateRestorationController}) calls {@link fromPrimitives}
 * when the bucket holds data for the property and {@link createDefaultValue}
 * when it does not, then hands the result to {@link initWithValue}. That cycle
 * repeats every time new restoration data arrives, so `initWithValue` must
 * forget whatever it held before.
 *
 * Whenever {@link toPrimitives} (or {@link enabled}) would return something
 * different, call `notifyListeners()`; the owner then writes the new primitive
 * into its bucket. Collections returned from `toPrimitives` must not be
 * mutated afterwards.
 *
 * Create instances with `useRestorableProperty` and register them from the
 * `restoreState` callback of `useStateRestoration`.
 */
export abstract class RestorableProperty<T> extends ChangeNotifier {
  private _restorationId: string | null = null
  private _owner: RestorablePropertyOwner | null = null

  abstract createDefaultValue(): T

  abstract fromPrimitives(data: RestorationPrimitive): T

  abstract initWithValue(value: T): void

  abstract toPrimitives(): RestorationPrimitive

  /**
   * When false, nothing is stored for this property and it comes back with
   * its default value. Call `notifyListeners()` when this flips.
   */
  get enabled(): boolean {
    return true
  }

  get restorationId(): string | null {
    return this._restorationId
  }

  get isRegistered(): boolean {
    this.assertNotDisposed()
    return this._restorationId !== null
  }

  /** The owner this property is registered with. Only valid while registered. */
  get owner(): RestorablePropertyOwner {
    restorationAssert(this.isRegistered, "The property is not registered for restoration.")
    if (!this._owner) {
      throw new Error(`${this.constructor.name} has no owner; register it before reading owner.`)
    }
    return this._owner
  }

  /** @internal Called by the owner on registration. */
  attachOwner(restorationId: string, owner: RestorablePropertyOwner): void {
    this.assertNotDisposed()
    this._restorationId = restorationId
    this._owner = owner
  }

  /** @internal Called by the owner when the registration ends. */
  detachOwner(): void {
    this.assertNotDisposed()
    restorationAssert(
      this._restorationId !== null && this._owner !== null,
      "Cannot detach a property that is not registered.",
    )
    this._restorationId = null
    this._owner = null
  }

  isOwnedBy(owner: RestorablePropertyOwner): boolean {
    return this._owner === owner
  }

  dispose(): void {
    this.assertNotDisposed()
    this._owner?.detachProperty(this)
    super.dispose()
  }
}

/**
 * A {@link RestorableProperty} exposing its wrapped value through `value`.
 * Assigning a different value calls {@link didUpdateValue}, which should
 * notify listeners if the primitive representation changed.
 */
export abstract class RestorableValue<T> extends RestorableProperty<T> {
  private current: { value: T } | null = null

  get value(): T {
    restorationAssert(this.isRegistered, () => `${this.constructor.name}.value read before registration.`)
    if (!this.current) {
      throw new Error(`${this.constructor.name} has no value yet; register it for restoration first.`)
    }
    return this.current.value
  }

  set value(next: T) {
    restorationAssert(this.isRegistered, () => `${this.constructor.name}.value written before registration.`)
    this.validateValue(next)
    const previous = this.current
    if (previous === null || !this.isSameValue(previous.value, next)) {
      this.current = { value: next }
      this.didUpdateValue(previous === null ? undefined : previous.value)
    }
  }

  initWithValue(value: T): void {
    this.current = { value }
  }

  protected isSameValue(a: T, b: T): boolean {
    return Object.is(a, b)
  }

  /** Hook for subclasses to reject values the wrapper cannot represent. */
  protected validateValue(_value: T): void {}

  /**
   * Called after `value` changed. `oldValue` is undefined when nothing was
   * set before.
   */
  protected abstract didUpdateValue(oldValue: T | undefined): void
}
