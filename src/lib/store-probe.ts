/**
 * Once-per-instance capability probe
 *
 * The first require() runs the loader; every later call gets the same
 * settled promise, rejection included.
 */
export class CapabilityProbe<T> {
  private pending: Promise<T> | null = null

  constructor(private readonly load: () => Promise<T>) {}

  /** True once the loader has been invoked */
  get probed(): boolean {
    return this.pending !== null
  }

  require(): Promise<T> {
    if (!this.pending) {
      this.pending = Promise.resolve().then(() => this.load())
    }
    return this.pending
  }
}
