/**
 * Session state — what an orchestrator remembers between evaluations.
 *
 * Everything here is in-memory and lost on restart. History is a fixed-size
 * ring; once full, each new snapshot evicts the oldest.
 */

import type { AdaptationParameters, PhaseKind, StressLevel, Vector3 } from './types.js'

// ==================== History ====================

export class HistoryBuffer<T> {
  private items: T[] = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`)
    }
  }

  push(item: T): void {
    this.items.push(item)
    if (this.items.length > this.capacity) this.items.shift()
  }

  /** Oldest first. */
  toArray(): T[] {
    return [...this.items]
  }

  latest(): T | undefined {
    return this.items[this.items.length - 1]
  }

  get size(): number {
    return this.items.length
  }

  clear(): void {
    this.items = []
  }
}

// ==================== State ====================

export interface SessionState {
  elapsedSeconds: number
  currentPhase: PhaseKind
  lastStressLevel: StressLevel | null
  lastKnownLocation: Vector3 | null
  history: Readonly<AdaptationParameters>[]
}
