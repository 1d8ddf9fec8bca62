/**
 * Adaptation Event Bus — per-engine event fan-out.
 *
 * The orchestrator and runner report what happened here; embedders subscribe
 * for telemetry or UI. Events are in-memory, ephemeral, synchronous fan-out.
 * One bus per engine instance, so two engines in one process never share
 * sequence numbers or listeners.
 *
 * Stream taxonomy:
 *   phase     — relaxation phase transitions
 *   stress    — stress level changes between evaluations
 *   snapshot  — every published parameter snapshot
 *   session   — reset / runner start / runner stop
 *   sink      — renderer sink delivery failures
 */

import type { AdaptationParameters, PhaseKind, StressLevel } from './types.js'
import { createLogger, type Logger } from './logger.js'

// ==================== Types ====================

export interface AdaptationEventMap {
  phase: { from: PhaseKind; to: PhaseKind; elapsedSeconds: number }
  stress: { from: StressLevel; to: StressLevel; intensity: number }
  snapshot: { params: Readonly<AdaptationParameters>; violations: number }
  session: { action: 'reset' | 'started' | 'stopped' }
  sink: { sink: string; error: string }
}

export type AdaptationStream = keyof AdaptationEventMap

export interface AdaptationEvent<K extends AdaptationStream = AdaptationStream> {
  /** Monotonic per stream, starting at 1. */
  seq: number
  /** Epoch ms. */
  ts: number
  stream: K
  data: AdaptationEventMap[K]
}

export type AdaptationListener<K extends AdaptationStream = AdaptationStream> = (
  event: AdaptationEvent<K>,
) => void

type StreamListeners = { [K in AdaptationStream]: Set<AdaptationListener<K>> }

// ==================== Bus ====================

export class AdaptationEventBus {
  private readonly seqByStream = new Map<AdaptationStream, number>()
  private readonly listeners = new Set<AdaptationListener>()
  private readonly streamListeners: StreamListeners = {
    phase: new Set(),
    stress: new Set(),
    snapshot: new Set(),
    session: new Set(),
    sink: new Set(),
  }
  private readonly log: Logger
  private readonly now: () => number

  constructor(opts?: { logger?: Logger; now?: () => number }) {
    this.log = opts?.logger ?? createLogger('events')
    this.now = opts?.now ?? Date.now
  }

  /** Emit to global listeners, then stream listeners. */
  emit<K extends AdaptationStream>(stream: K, data: AdaptationEventMap[K]): AdaptationEvent<K> {
    const event: AdaptationEvent<K> = {
      seq: this.nextSeq(stream),
      ts: this.now(),
      stream,
      data,
    }

    for (const fn of this.listeners) this.deliver(stream, () => fn(event))
    for (const fn of this.streamListeners[stream]) this.deliver(stream, () => fn(event))

    return event
  }

  /** Subscribe to all events. Returns an unsubscribe function. */
  on(listener: AdaptationListener): () => void {
    this.listeners.add(listener)
    return () => { this.listeners.delete(listener) }
  }

  /** Subscribe to one stream. Returns an unsubscribe function. */
  onStream<K extends AdaptationStream>(stream: K, listener: AdaptationListener<K>): () => void {
    const set = this.streamListeners[stream]
    set.add(listener)
    return () => { set.delete(listener) }
  }

  /** Drop every listener and restart sequence numbers. */
  clear(): void {
    this.seqByStream.clear()
    this.listeners.clear()
    for (const set of Object.values(this.streamListeners)) set.clear()
  }

  private nextSeq(stream: AdaptationStream): number {
    const n = (this.seqByStream.get(stream) ?? 0) + 1
    this.seqByStream.set(stream, n)
    return n
  }

  // Listener errors must not stop fan-out to the remaining listeners.
  private deliver(stream: AdaptationStream, call: () => void): void {
    try {
      call()
    } catch (err) {
      this.log.error({ err, stream }, 'event listener failed')
    }
  }
}
