import { areRestorationAssertionsEnabled } from "../config/restoration-config"

export class RestorationError extends Error {
  restorationId?: string

  constructor(message: string, restorationId?: string) {
    super(message)
    this.name = "RestorationError"
    if (restorationId !== undefined) {
      this.restorationId = restorationId
    }
  }
}

/**
 * Dev-mode protocol check. Throws a {@link RestorationError} when `condition`
 * is false and assertions are enabled (everything but production builds, see
 * NEXT_PUBLIC_STATE_RESTORATION_ASSERTIONS). Returns the condition so callers
 * can fall back when assertions are off.
 */
export function restorationAssert(
  condition: boolean,
  message: string | (() => string),
  restorationId?: string,
): boolean {
  if (!condition && areRestorationAssertionsEnabled()) {
    throw new RestorationError(typeof message === "string" ? message : message(), restorationId)
  }
  return condition
}
