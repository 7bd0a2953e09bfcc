/**
 * Per-tenant retry backoff for the periodic sweep.
 *
 * After a failed cycle a tenant is skipped until its delay has passed. The
 * delay starts at the base interval and doubles per consecutive failure, up
 * to MAX_BACKOFF_MULTIPLIER times the base.
 */

export const MAX_BACKOFF_MULTIPLIER = 16

interface BackoffEntry {
  failures: number
  retryAt: number
}

export class ReconcileBackoff {
  private readonly entries = new Map<string, BackoffEntry>()

  /**
   * @param baseDelayMs - Delay after the first failure
   */
  constructor(private readonly baseDelayMs: number) {}

  /**
   * Whether the tenant may be reconciled at `now`
   */
  shouldAttempt(uid: string, now: number = Date.now()): boolean {
    const entry = this.entries.get(uid)
    return !entry || now >= entry.retryAt
  }

  /**
   * Records a failed cycle and returns the delay until the next attempt
   */
  recordFailure(uid: string, now: number = Date.now()): number {
    const failures = (this.entries.get(uid)?.failures ?? 0) + 1
    const multiplier = Math.min(2 ** (failures - 1), MAX_BACKOFF_MULTIPLIER)
    const delay = this.baseDelayMs * multiplier
    this.entries.set(uid, { failures, retryAt: now + delay })
    return delay
  }

  recordSuccess(uid: string): void {
    this.entries.delete(uid)
  }

  /**
   * Drops entries for tenants that no longer exist
   */
  retain(uids: Iterable<string>): void {
    const keep = new Set(uids)
    for (const uid of this.entries.keys()) {
      if (!keep.has(uid)) {
        this.entries.delete(uid)
      }
    }
  }

  failureCount(uid: string): number {
    return this.entries.get(uid)?.failures ?? 0
  }
}
