"use client"

import { useCallback, useSyncExternalStore, type ChangeEvent, type SyntheticEvent } from "react"

import type { TextEditingController } from "../restoration/text-editing-controller"

type TextField = HTMLInputElement | HTMLTextAreaElement

export interface TextInputBinding {
  value: string
  onChange: (event: ChangeEvent<TextField>) => void
  onSelect: (event: SyntheticEvent<TextField>) => void
}

function readSelection(target: TextField, fallback: number): { start: number; end: number } {
  return {
    start: target.selectionStart ?? fallback,
    end: target.selectionEnd ?? fallback,
  }
}

/**
 * Props that keep a controlled `<input>` or `<textarea>` in sync with a
 * {@link TextEditingController}.
 *
 * @example
 * ```tsx
 * const note = useRestorableProperty(() => new RestorableTextEditingController())
 * // ...register `note` in restoreState...
 * return <textarea {...useTextInputBinding(note.value)} />
 * ```
 */
export function useTextInputBinding(controller: TextEditingController): TextInputBinding {
  const subscribe = useCallback(
    (onStoreChange: () => void) => {
      controller.addListener(onStoreChange)
      return () => controller.removeListener(onStoreChange)
    },
    [controller],
  )
  const getSnapshot = useCallback(() => controller.text, [controller])
  const value = useSyncExternalStore(subscribe, getSnapshot, getSnapshot)

  const onChange = useCallback(
    (event: ChangeEvent<TextField>) => {
      const text = event.target.value
      controller.value = { text, selection: readSelection(event.target, text.length) }
    },
    [controller],
  )

  const onSelect = useCallback(
    (event: SyntheticEvent<TextField>) => {
      const target = event.currentTarget
      controller.selection = readSelection(target, target.value.length)
    },
    [controller],
  )

  return { value, onChange, onSelect }
}
