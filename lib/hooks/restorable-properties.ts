import type { ChangeNotifier, Listenable } from "../restoration/change-notifier"
import { restorationAssert } from "../restoration/errors"
import { isSerializableForRestoration, type RestorationPrimitive } from "../restoration/restoration-codec"
import { TextEditingController, type TextEditingValue } from "../restoration/text-editing-controller"
import { RestorableProperty, RestorableValue } from "./restorable-property"

function describePrimitive(data: RestorationPrimitive): string {
  return JSON.stringify(data)
}

// Base for wrappers whose value already is a restoration primitive.
export abstract class RestorablePrimitiveValue<T extends RestorationPrimitive> extends RestorableValue<T> {
  constructor(private readonly defaultValue: T) {
    super()
    restorationAssert(
      isSerializableForRestoration(defaultValue),
      () => `${this.constructor.name} default ${describePrimitive(defaultValue)} cannot be serialized for restoration.`,
    )
  }

  protected abstract accepts(data: RestorationPrimitive): data is T

  createDefaultValue(): T {
    return this.defaultValue
  }

  fromPrimitives(data: RestorationPrimitive): T {
    if (this.accepts(data)) {
      return data
    }
    restorationAssert(
      false,
      () => `${this.constructor.name} cannot restore ${describePrimitive(data)}.`,
      this.restorationId ?? undefined,
    )
    return this.defaultValue
  }

  toPrimitives(): RestorationPrimitive {
    return this.value
  }

  protected validateValue(value: T): void {
    restorationAssert(
      this.accepts(value),
      () => `${this.constructor.name} cannot hold ${describePrimitive(value)}.`,
      this.restorationId ?? undefined,
    )
  }

  protected didUpdateValue(): void {
    this.notifyListeners()
  }
}

const isFiniteNumber = (data: RestorationPrimitive): data is number =>
  typeof data === "number" && Number.isFinite(data)

const isInteger = (data: RestorationPrimitive): data is number =>
  typeof data === "number" && Number.isSafeInteger(data)

/**
 * Stores a finite number.
 *
 * If no restoration data is available, the property is initialized with the
 * provided default value.
 */
export class RestorableNumber extends RestorablePrimitiveValue<number> {
  protected accepts(data: RestorationPrimitive): data is number {
    return isFiniteNumber(data)
  }
}

/** Same as {@link RestorableNumber}; named for call sites that mean a fractional value. */
export class RestorableDouble extends RestorableNumber {}

/** Stores a safe integer. Non-integers are rejected. */
export class RestorableInt extends RestorablePrimitiveValue<number> {
  protected accepts(data: RestorationPrimitive): data is number {
    return isInteger(data)
  }
}

export class RestorableString extends RestorablePrimitiveValue<string> {
  protected accepts(data: RestorationPrimitive): data is string {
    return typeof data === "string"
  }
}

export class RestorableBool extends RestorablePrimitiveValue<boolean> {
  protected accepts(data: RestorationPrimitive): data is boolean {
    return typeof data === "boolean"
  }
}

export class RestorableNullableNumber extends RestorablePrimitiveValue<number | null> {
  protected accepts(data: RestorationPrimitive): data is number | null {
    return data === null || isFiniteNumber(data)
  }
}

export class RestorableNullableDouble extends RestorableNullableNumber {}

export class RestorableNullableInt extends RestorablePrimitiveValue<number | null> {
  protected accepts(data: RestorationPrimitive): data is number | null {
    return data === null || isInteger(data)
  }
}

export class RestorableNullableString extends RestorablePrimitiveValue<string | null> {
  protected accepts(data: RestorationPrimitive): data is string | null {
    return data === null || typeof data === "string"
  }
}

export class RestorableNullableBool extends RestorablePrimitiveValue<boolean | null> {
  protected accepts(data: RestorationPrimitive): data is boolean | null {
    return data === null || typeof data === "boolean"
  }
}

function dateFromPrimitive(data: RestorationPrimitive, owner: string): Date | undefined {
  if (isInteger(data)) {
    return new Date(data)
  }
  restorationAssert(false, () => `${owner} cannot restore ${describePrimitive(data)}; expected epoch milliseconds.`)
  return undefined
}

/**
 * Stores a Date as milliseconds since the epoch. Two dates for the same
 * instant count as the same value.
 */
export class RestorableDate extends RestorableValue<Date> {
  constructor(private readonly defaultValue: Date) {
    super()
  }

  createDefaultValue(): Date {
    return this.defaultValue
  }

  fromPrimitives(data: RestorationPrimitive): Date {
    return dateFromPrimitive(data, this.constructor.name) ?? this.defaultValue
  }

  toPrimitives(): RestorationPrimitive {
    return this.value.getTime()
  }

  protected isSameValue(a: Date, b: Date): boolean {
    return a.getTime() === b.getTime()
  }

  protected validateValue(value: Date): void {
    restorationAssert(!Number.isNaN(value.getTime()), "RestorableDate cannot hold an invalid Date.")
  }

  protected didUpdateValue(): void {
    this.notifyListeners()
  }
}

export class RestorableNullableDate extends RestorableValue<Date | null> {
  constructor(private readonly defaultValue: Date | null) {
    super()
  }

  createDefaultValue(): Date | null {
    return this.defaultValue
  }

  fromPrimitives(data: RestorationPrimitive): Date | null {
    if (data === null) return null
    return dateFromPrimitive(data, this.constructor.name) ?? this.defaultValue
  }

  toPrimitives(): RestorationPrimitive {
    return this.value?.getTime() ?? null
  }

  protected isSameValue(a: Date | null, b: Date | null): boolean {
    if (a === null || b === null) return a === b
    return a.getTime() === b.getTime()
  }

  protected validateValue(value: Date | null): void {
    restorationAssert(
      value === null || !Number.isNaN(value.getTime()),
      "RestorableNullableDate cannot hold an invalid Date.",
    )
  }

  protected didUpdateValue(): void {
    this.notifyListeners()
  }
}

export interface RestorableEnumOptions<T extends string> {
  /** Every member the property may hold, typically `Object.values(MyEnum)`. */
  values: Iterable<T>
}

function describeMembers(values: ReadonlySet<string>): string {
  return `{${Array.from(values).join(", ")}}`
}

/**
 * Stores a member of a string enum (or string literal union) by its value.
 * Restoring a string that is not a member falls back to the default.
 */
export class RestorableEnum<T extends string> extends RestorableValue<T> {
  readonly values: ReadonlySet<T>
  private readonly defaultValue: T

  constructor(defaultValue: T, { values }: RestorableEnumOptions<T>) {
    super()
    this.values = new Set(values)
    this.defaultValue = defaultValue
    restorationAssert(
      this.values.has(defaultValue),
      () => `Default value "${defaultValue}" not found in ${describeMembers(this.values)}.`,
    )
  }

  createDefaultValue(): T {
    return this.defaultValue
  }

  fromPrimitives(data: RestorationPrimitive): T {
    if (typeof data === "string") {
      for (const allowed of this.values) {
        if (allowed === data) return allowed
      }
      restorationAssert(
        false,
        () =>
          `Attempted to restore an unknown enum value "${data}" that is not in the valid set ` +
          `${describeMembers(this.values)}.`,
        this.restorationId ?? undefined,
      )
    }
    return this.defaultValue
  }

  toPrimitives(): RestorationPrimitive {
    return this.value
  }

  protected validateValue(value: T): void {
    restorationAssert(
      this.values.has(value),
      () => `Attempted to set an unknown enum value "${value}" that is not in ${describeMembers(this.values)}.`,
    )
  }

  protected didUpdateValue(): void {
    this.notifyListeners()
  }
}

export class RestorableNullableEnum<T extends string> extends RestorableValue<T | null> {
  readonly values: ReadonlySet<T>
  private readonly defaultValue: T | null

  constructor(defaultValue: T | null, { values }: RestorableEnumOptions<T>) {
    super()
    this.values = new Set(values)
    this.defaultValue = defaultValue
    restorationAssert(
      defaultValue === null || this.values.has(defaultValue),
      () => `Default value "${defaultValue}" not found in ${describeMembers(this.values)}.`,
    )
  }

  createDefaultValue(): T | null {
    return this.defaultValue
  }

  fromPrimitives(data: RestorationPrimitive): T | null {
    if (data === null) return null
    if (typeof data === "string") {
      for (const allowed of this.values) {
        if (allowed === data) return allowed
      }
      restorationAssert(
        false,
        () =>
          `Attempted to restore an unknown enum value "${data}" that is not null or in the valid set ` +
          `${describeMembers(this.values)}.`,
        this.restorationId ?? undefined,
      )
    }
    return this.defaultValue
  }

  toPrimitives(): RestorationPrimitive {
    return this.value
  }

  protected validateValue(value: T | null): void {
    restorationAssert(
      value === null || this.values.has(value),
      () => `Attempted to set an unknown enum value "${value}" that is not null or in ${describeMembers(this.values)}.`,
    )
  }

  protected didUpdateValue(): void {
    this.notifyListeners()
  }
}

/**
 * Wraps a {@link Listenable} whose state belongs in the restoration data.
 * Every notification from the wrapped object is forwarded, which makes the
 * owner store the latest `toPrimitives()`.
 */
export abstract class RestorableListenable<T extends Listenable> extends RestorableProperty<T> {
  private wrapped: T | null = null
  private readonly forward = () => this.notifyListeners()

  get value(): T {
    restorationAssert(this.isRegistered, () => `${this.constructor.name}.value read before registration.`)
    if (!this.wrapped) {
      throw new Error(`${this.constructor.name} has no value yet; register it for restoration first.`)
    }
    return this.wrapped
  }

  /** The wrapped object, or null before the first initWithValue. */
  protected get currentValue(): T | null {
    return this.wrapped
  }

  initWithValue(value: T): void {
    this.wrapped?.removeListener(this.forward)
    this.wrapped = value
    value.addListener(this.forward)
  }

  dispose(): void {
    super.dispose()
    this.wrapped?.removeListener(this.forward)
  }
}

/**
 * A {@link RestorableListenable} that also owns the wrapped notifier: the
 * previous one is disposed when it is replaced and when the property is.
 */
export abstract class RestorableChangeNotifier<T extends ChangeNotifier> extends RestorableListenable<T> {
  initWithValue(value: T): void {
    this.disposeOldValue()
    super.initWithValue(value)
  }

  dispose(): void {
    this.disposeOldValue()
    super.dispose()
  }

  private disposeOldValue(): void {
    const old = this.currentValue
    if (old) {
      // Deferred so other holders get a chance to remove their listeners first.
      queueMicrotask(() => {
        if (!old.isDisposed) old.dispose()
      })
    }
  }
}

/**
 * Restores the text of a {@link TextEditingController}. Selection is not
 * part of the restoration data.
 */
export class RestorableTextEditingController extends RestorableChangeNotifier<TextEditingController> {
  private readonly initialValue: TextEditingValue | null

  constructor(options: { text?: string | null } | { value: TextEditingValue } = {}) {
    super()
    if ("value" in options) {
      this.initialValue = options.value
    } else {
      const text = options.text ?? ""
      this.initialValue = text === "" ? null : { text, selection: { start: text.length, end: text.length } }
    }
  }

  createDefaultValue(): TextEditingController {
    return TextEditingController.fromValue(this.initialValue)
  }

  fromPrimitives(data: RestorationPrimitive): TextEditingController {
    if (typeof data === "string") {
      return new TextEditingController(data)
    }
    restorationAssert(
      false,
      () => `${this.constructor.name} cannot restore ${describePrimitive(data)}; expected text.`,
      this.restorationId ?? undefined,
    )
    return this.createDefaultValue()
  }

  toPrimitives(): RestorationPrimitive {
    return this.value.text
  }
}
