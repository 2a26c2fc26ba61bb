"use client"

import { useEffect, useRef } from "react"

interface Disposable {
  dispose(): void
}

/**
 * Disposes `target` once the component is really gone.
 *
 * Disposal waits a microtask so the unmount/remount pair React runs under
 * StrictMode does not tear down state the remounted effect still uses.
 */
export function useDisposeOnUnmount(target: Disposable): void {
  const mountedRef = useRef<Disposable | null>(null)

  useEffect(() => {
    mountedRef.current = target
    return () => {
      mountedRef.current = null
      queueMicrotask(() => {
        if (mountedRef.current !== target) {
          target.dispose()
        }
      })
    }
  }, [target])
}
