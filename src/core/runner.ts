/**
 * Session runner — the embedding side's periodic driver.
 *
 * Every tick: poll the feedback channel, re-read the subject identity, run one
 * evaluation, and hand the snapshot to every renderer sink. The runner does
 * not own the orchestrator; it only calls it, one tick at a time.
 *
 * A tick that arrives while the previous one is still delivering is skipped,
 * so evaluate() is never re-entered.
 */

import type { AdaptationEventBus } from './adaptation-events.js'
import { createLogger, type Logger } from './logger.js'
import type { AdaptationOrchestrator } from './orchestrator.js'
import type { AdaptationParameters, AgeGroup, StressMetrics } from './types.js'
import type { FeedbackChannel } from '../extension/feedback/index.js'

// ==================== Types ====================

/** A renderer that consumes snapshots (video pipeline, audio engine, ...). */
export interface ParameterSink {
  name: string
  apply(params: Readonly<AdaptationParameters>): void | Promise<void>
}

export interface SubjectIdentity {
  breedName: string
  age: AgeGroup
}

export interface TickResult {
  status: 'delivered' | 'skipped' | 'failed'
  reason?: string
  /** Sinks that rejected the snapshot. */
  failedSinks?: string[]
  params?: Readonly<AdaptationParameters>
}

export interface SessionRunner {
  start(): void
  /** Stop the timer. An in-flight tick still finishes delivering. */
  stop(): void
  /** Run one tick immediately, outside the timer. */
  tickNow(): Promise<TickResult>
  readonly isRunning: boolean
}

export interface SessionRunnerOpts {
  orchestrator: AdaptationOrchestrator
  feedback: FeedbackChannel
  /** Re-read on every tick; the subject may be re-identified mid-session. */
  identity: () => SubjectIdentity
  sinks: ParameterSink[]
  everyMs?: number
  /** Inject clock for testing. */
  now?: () => number
  /** Defaults to the orchestrator's bus. */
  bus?: AdaptationEventBus
  logger?: Logger
}

/** Assumed until the first feedback sample arrives. */
export const RESTING_METRICS: Readonly<StressMetrics> = Object.freeze({ stressLevel: 'low', movementRate: 0 })

const DEFAULT_EVERY_MS = 2000

// ==================== Runner ====================

export function createSessionRunner(opts: SessionRunnerOpts): SessionRunner {
  const everyMs = opts.everyMs ?? DEFAULT_EVERY_MS
  const now = opts.now ?? Date.now
  const bus = opts.bus ?? opts.orchestrator.bus
  const log = opts.logger ?? createLogger('runner')

  let timer: ReturnType<typeof setInterval> | null = null
  let running = false
  let lastTickAt: number | null = null
  let lastSample: StressMetrics = RESTING_METRICS

  // Strict-mode range violations surface here; they fail the tick, not the timer.
  function evaluate(
    breedName: string,
    age: AgeGroup,
    deltaSeconds: number,
  ): { ok: true; params: Readonly<AdaptationParameters> } | { ok: false; reason: string } {
    try {
      return { ok: true, params: opts.orchestrator.evaluate(breedName, age, lastSample, deltaSeconds) }
    } catch (err) {
      log.error({ err }, 'evaluation failed')
      return { ok: false, reason: err instanceof Error ? err.message : String(err) }
    }
  }

  async function tickNow(): Promise<TickResult> {
    if (running) {
      log.debug('tick skipped, previous tick still delivering')
      return { status: 'skipped', reason: 'busy' }
    }
    running = true

    try {
      const at = now()
      const deltaSeconds = lastTickAt === null ? 0 : (at - lastTickAt) / 1000
      lastTickAt = at

      lastSample = opts.feedback.poll() ?? lastSample
      const { breedName, age } = opts.identity()

      const evaluated = evaluate(breedName, age, deltaSeconds)
      if (!evaluated.ok) return { status: 'failed', reason: evaluated.reason }
      const { params } = evaluated

      const results = await Promise.allSettled(opts.sinks.map(async (sink) => sink.apply(params)))
      const failedSinks: string[] = []
      results.forEach((result, i) => {
        if (result.status === 'fulfilled') return
        const sink = opts.sinks[i].name
        const error = result.reason instanceof Error ? result.reason.message : String(result.reason)
        failedSinks.push(sink)
        log.error({ sink, err: result.reason }, 'sink delivery failed')
        bus.emit('sink', { sink, error })
      })

      return failedSinks.length > 0
        ? { status: 'delivered', failedSinks, params }
        : { status: 'delivered', params }
    } finally {
      running = false
    }
  }

  return {
    start() {
      if (timer) return
      timer = setInterval(() => {
        tickNow().catch((err: unknown) => log.error({ err }, 'tick failed'))
      }, everyMs)
      bus.emit('session', { action: 'started' })
    },
    stop() {
      if (!timer) return
      clearInterval(timer)
      timer = null
      lastTickAt = null
      bus.emit('session', { action: 'stopped' })
    },
    tickNow,
    get isRunning() {
      return timer !== null
    },
  }
}
