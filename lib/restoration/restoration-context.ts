"use client"

import { createContext } from "react"

import type { RestorationBucket } from "./restoration-bucket"
import type { RestorationManager } from "./restoration-manager"

/** The bucket descendants claim their own buckets from; null disables restoration below. */
export const RestorationBucketContext = createContext<RestorationBucket | null>(null)
RestorationBucketContext.displayName = "RestorationBucketContext"

export const RestorationManagerContext = createContext<RestorationManager | null>(null)
RestorationManagerContext.displayName = "RestorationManagerContext"
