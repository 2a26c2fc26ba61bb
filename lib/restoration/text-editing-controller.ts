import { ChangeNotifier } from "./change-notifier"

export interface TextSelection {
  start: number
  end: number
}

export interface TextEditingValue {
  text: string
  selection: TextSelection
}

export const EMPTY_TEXT_EDITING_VALUE: Readonly<TextEditingValue> = Object.freeze({
  text: "",
  selection: Object.freeze({ start: 0, end: 0 }),
})

function clampSelection(selection: TextSelection, length: number): TextSelection {
  const start = Math.min(Math.max(selection.start, 0), length)
  const end = Math.min(Math.max(selection.end, start), length)
  return { start, end }
}

/**
 * Holds the text and selection of an editable field. Notifies whenever either
 * changes; bind it to an input with `useTextInputBinding`.
 */
export class TextEditingController extends ChangeNotifier {
  private _value: TextEditingValue

  constructor(text?: string | null) {
    super()
    const initial = text ?? ""
    this._value = { text: initial, selection: { start: initial.length, end: initial.length } }
  }

  static fromValue(value: TextEditingValue | null | undefined): TextEditingController {
    const controller = new TextEditingController()
    controller._value = value
      ? { text: value.text, selection: clampSelection(value.selection, value.text.length) }
      : { text: "", selection: { start: 0, end: 0 } }
    return controller
  }

  get value(): TextEditingValue {
    return this._value
  }

  set value(next: TextEditingValue) {
    const selection = clampSelection(next.selection, next.text.length)
    const current = this._value
    if (
      current.text === next.text &&
      current.selection.start === selection.start &&
      current.selection.end === selection.end
    ) {
      return
    }
    this._value = { text: next.text, selection }
    this.notifyListeners()
  }

  get text(): string {
    return this._value.text
  }

  /** Replaces the text and collapses the selection to its end. */
  set text(text: string) {
    this.value = { text, selection: { start: text.length, end: text.length } }
  }

  get selection(): TextSelection {
    return this._value.selection
  }

  set selection(selection: TextSelection) {
    this.value = { text: this._value.text, selection }
  }

  clear(): void {
    this.value = EMPTY_TEXT_EDITING_VALUE
  }
}
