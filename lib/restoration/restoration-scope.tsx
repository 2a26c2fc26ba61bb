"use client"

import React, { useCallback, useContext, useEffect, useRef, useState, useSyncExternalStore } from "react"

import { useStateRestoration, type RestoreStateCallback } from "../hooks/use-state-restoration"
import type { RestorationBucket } from "./restoration-bucket"
import { RestorationBucketContext, RestorationManagerContext } from "./restoration-context"
import { getDefaultRestorationManager, type RestorationManager } from "./restoration-manager"

/**
 * The bucket of the nearest enclosing scope, or null when restoration is off
 * for this part of the tree.
 */
export function useRestorationScope(): RestorationBucket | null {
  return useContext(RestorationBucketContext)
}

export function useRestorationManager(): RestorationManager {
  return useContext(RestorationManagerContext) ?? getDefaultRestorationManager()
}

export function RestorationManagerProvider({
  manager,
  children,
}: {
  manager: RestorationManager
  children: React.ReactNode
}) {
  return <RestorationManagerContext.Provider value={manager}>{children}</RestorationManagerContext.Provider>
}

/**
 * Makes `bucket` the scope bucket for descendants without managing it. Useful
 * to hand a component's own bucket to its children.
 */
export function UnmanagedRestorationScope({
  bucket,
  children,
}: {
  bucket: RestorationBucket | null
  children: React.ReactNode
}) {
  return <RestorationBucketContext.Provider value={bucket}>{children}</RestorationBucketContext.Provider>
}

const restoreNothing: RestoreStateCallback = () => {}

/**
 * Claims a child bucket named `restorationId` from the enclosing scope and
 * provides it to descendants. A null id disables restoration below.
 */
export function RestorationScope({
  restorationId,
  children,
}: {
  restorationId: string | null | undefined
  children: React.ReactNode
}) {
  const restoration = useStateRestoration({ restorationId, restoreState: restoreNothing })
  return <UnmanagedRestorationScope bucket={restoration.bucket}>{children}</UnmanagedRestorationScope>
}

type RootRestorationScopeProps = {
  restorationId: string | null | undefined
  children: React.ReactNode
  /** Rendered while the stored restoration data is loading. */
  fallback?: React.ReactNode
}

/**
 * Entry point of the restoration tree.
 *
 * Without an enclosing scope it loads the manager's root bucket and renders
 * `fallback` until that finishes, so the first real render already sees the
 * restored values. Inside an existing scope it behaves like
 * {@link RestorationScope}. When the manager receives new restoration data
 * the subtree re-claims its buckets from the new root.
 *
 * @example
 * ```tsx
 * <RestorationManagerProvider manager={manager}>
 *   <RootRestorationScope restorationId="app">
 *     <App />
 *   </RootRestorationScope>
 * </RestorationManagerProvider>
 * ```
 */
export function RootRestorationScope({ restorationId, children, fallback = null }: RootRestorationScopeProps) {
  const manager = useRestorationManager()
  const ancestorBucket = useContext(RestorationBucketContext)
  const subscribe = useCallback(
    (onRootChange: () => void) => {
      manager.addListener(onRootChange)
      return () => {
        manager.removeListener(onRootChange)
      }
    },
    [manager],
  )
  const getRootBucket = () => manager.currentRootBucket
  const currentRootBucket = useSyncExternalStore(subscribe, getRootBucket, getRootBucket)
  const [loadFailed, setLoadFailed] = useState(false)
  // A disabled manager loads a null root without notifying; this re-renders anyway.
  const [, setLoaded] = useState(false)
  const rootBucket = currentRootBucket === undefined && loadFailed ? null : currentRootBucket

  const needsRootBucket = restorationId != null && ancestorBucket === null
  const waitingForRootBucket = needsRootBucket && rootBucket === undefined
  // Only the very first render may be blanked; later waits render children without a bucket.
  const okToRenderFallbackRef = useRef<boolean>(waitingForRootBucket)

  useEffect(() => {
    if (!waitingForRootBucket) return
    let cancelled = false
    manager.rootBucket.then(
      () => {
        if (!cancelled) setLoaded(true)
      },
      (error: unknown) => {
        console.error("[RootRestorationScope] Failed to load restoration data:", error)
        if (!cancelled) setLoadFailed(true)
      },
    )
    return () => {
      cancelled = true
    }
  }, [manager, waitingForRootBucket])

  // Descendants have re-claimed their buckets from the new root once a render
  // that saw that root commits.
  useEffect(() => {
    if (manager.isReplacing && rootBucket === manager.currentRootBucket) {
      manager.endReplacement()
    }
  }, [manager, rootBucket])

  if (waitingForRootBucket && okToRenderFallbackRef.current) {
    return <>{fallback}</>
  }
  okToRenderFallbackRef.current = false

  return (
    <UnmanagedRestorationScope bucket={ancestorBucket ?? rootBucket ?? null}>
      <RestorationScope restorationId={restorationId}>{children}</RestorationScope>
    </UnmanagedRestorationScope>
  )
}
