"use client"

import { useCallback, useRef, useSyncExternalStore } from "react"

import type { RestorableProperty } from "./restorable-property"
import { useDisposeOnUnmount } from "./use-dispose-on-unmount"

/**
 * Creates a restorable property once per component instance and re-renders
 * the component whenever the property notifies. The property is disposed
 * (and thereby unregistered) when the component unmounts.
 *
 * `create` only runs on the first render. Register the returned property from
 * the `restoreState` callback of `useStateRestoration`.
 */
export function useRestorableProperty<P extends RestorableProperty<unknown>>(create: () => P): P {
  const stateRef = useRef<{ property: P; version: number } | null>(null)
  if (stateRef.current === null) {
    const state = { property: create(), version: 0 }
    // Counts every notification, including those sent before the subscription below is attached.
    state.property.addListener(() => {
      state.version += 1
    })
    stateRef.current = state
  }
  const state = stateRef.current
  const property = state.property

  const subscribe = useCallback(
    (onChange: () => void) => {
      property.addListener(onChange)
      return () => {
        property.removeListener(onChange)
      }
    },
    [property],
  )
  const getVersion = () => state.version
  useSyncExternalStore(subscribe, getVersion, getVersion)

  useDisposeOnUnmount(property)

  return property
}
