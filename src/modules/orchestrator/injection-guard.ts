/**
 * InjectionGuard: caps the number of accepted injections per origin index
 * within one process run.
 */

import type { OrchestratorConfig } from '../process/types.js'

export class InjectionGuard {
  private readonly _counts = new Map<number, number>()

  /** @param initial counts carried over from a persisted run */
  constructor(initial: Record<number, number> = {}) {
    for (const [key, count] of Object.entries(initial)) {
      this._counts.set(Number(key), count)
    }
  }

  /**
   * Accept one more injection at `originIndex` if the limit allows it.
   * A rejected call leaves the count unchanged.
   */
  admit(originIndex: number, config: Pick<OrchestratorConfig, 'maxInjections'>): boolean {
    const current = this.count(originIndex)
    if (current >= config.maxInjections) {
      return false
    }
    this._counts.set(originIndex, current + 1)
    return true
  }

  count(originIndex: number): number {
    return this._counts.get(originIndex) ?? 0
  }

  snapshot(): Record<number, number> {
    return Object.fromEntries(this._counts)
  }
}
