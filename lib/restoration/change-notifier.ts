import { RestorationError } from "./errors"

export type VoidCallback = () => void

export interface Listenable {
  addListener(listener: VoidCallback): void
  removeListener(listener: VoidCallback): void
}

/**
 * Minimal observable used by buckets' owners, restorable properties and
 * controllers. Listeners run in registration order; a listener added twice is
 * called twice and must be removed twice.
 */
export class ChangeNotifier implements Listenable {
  private listeners: VoidCallback[] = []
  private disposed = false

  get hasListeners(): boolean {
    return this.listeners.length > 0
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  addListener(listener: VoidCallback): void {
    this.assertNotDisposed()
    this.listeners.push(listener)
  }

  removeListener(listener: VoidCallback): void {
    const index = this.listeners.indexOf(listener)
    if (index !== -1) {
      this.listeners.splice(index, 1)
    }
  }

  notifyListeners(): void {
    this.assertNotDisposed()
    // Snapshot: listeners may unsubscribe (or subscribe others) while we iterate.
    for (const listener of [...this.listeners]) {
      if (!this.listeners.includes(listener)) continue
      try {
        listener()
      } catch (error) {
        console.error(`[${this.constructor.name}] Listener threw while notifying:`, error)
      }
    }
  }

  dispose(): void {
    this.assertNotDisposed()
    this.listeners = []
    this.disposed = true
  }

  protected assertNotDisposed(): void {
    if (this.disposed) {
      throw new RestorationError(
        `A ${this.constructor.name} was used after being disposed. ` +
          `Once dispose() has been called it can no longer be used.`,
      )
    }
  }
}
