/**
 * AdaptationOrchestrator — one session's evaluation pipeline.
 *
 * evaluate() runs lookup → phase tick → audio + visual shaping → merge →
 * final safety clamp → history, and returns a frozen snapshot. It owns the
 * SessionState and is the only writer to it; callers must not evaluate the
 * same orchestrator concurrently (SessionRunner guarantees that).
 *
 * No I/O beyond structured logging and bus events.
 */

import type { Config } from './config.js'
import { OutOfRangeParameterError } from './errors.js'
import { createLogger, type Logger } from './logger.js'
import { AdaptationEventBus } from './adaptation-events.js'
import { clampVector, enforceSafeRanges, freezeSnapshot } from './safety.js'
import { HistoryBuffer, type SessionState } from './session.js'
import type {
  AdaptationParameters,
  AgeGroup,
  ContentCategory,
  PhaseKind,
  StressLevel,
  StressMetrics,
  Vector3,
} from './types.js'
import type { ProfileRegistry } from '../extension/profiles/index.js'
import { PhaseController } from '../extension/phase/index.js'
import { AudioParameterShaper } from '../extension/audio/index.js'
import { ColorTransformShaper } from '../extension/vision/index.js'

// ==================== Types ====================

export interface OrchestratorOpts {
  registry: ProfileRegistry
  config: Config
  bus?: AdaptationEventBus
  logger?: Logger
  /** Throw OutOfRangeParameterError instead of clamping and logging. */
  strict?: boolean
  /** Replace the default shapers, e.g. with tuned subclasses. */
  shapers?: {
    audio?: AudioParameterShaper
    visual?: ColorTransformShaper
  }
}

export function contentCategoryFor(phase: PhaseKind, stress: StressLevel): ContentCategory {
  return phase === 'initial' && stress !== 'high' ? 'mental-stimulation' : 'calm-relax'
}

function isFiniteVector(v: Vector3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z)
}

// ==================== Orchestrator ====================

export class AdaptationOrchestrator {
  readonly bus: AdaptationEventBus

  private readonly registry: ProfileRegistry
  private readonly config: Config
  private readonly log: Logger
  private readonly strict: boolean
  private readonly phases: PhaseController
  private readonly audio: AudioParameterShaper
  private readonly visual: ColorTransformShaper
  private readonly ring: HistoryBuffer<Readonly<AdaptationParameters>>
  private lastKnownLocation: Vector3 | null = null

  constructor(opts: OrchestratorOpts) {
    this.registry = opts.registry
    this.config = opts.config
    this.bus = opts.bus ?? new AdaptationEventBus()
    this.log = opts.logger ?? createLogger('orchestrator')
    this.strict = opts.strict ?? false
    this.phases = new PhaseController(opts.config.engine.phaseDurations)
    this.audio = opts.shapers?.audio ?? new AudioParameterShaper(opts.config.safety)
    this.visual = opts.shapers?.visual ?? new ColorTransformShaper(opts.config.safety, opts.config.vision)
    this.ring = new HistoryBuffer(opts.config.engine.historyCapacity)
  }

  // ==================== Public API ====================

  /**
   * Advance the session by `deltaSeconds` and compute the parameters for the
   * new state. Unknown breeds fall back to the default profile.
   *
   * @throws OutOfRangeParameterError in strict mode only
   */
  evaluate(
    profileName: string,
    age: AgeGroup,
    stress: StressMetrics,
    deltaSeconds: number,
  ): Readonly<AdaptationParameters> {
    const profile = this.registry.lookup(profileName)
    const previousPhase = this.phases.current.kind
    const previousStress = this.phases.lastStressLevel
    const snap = this.phases.tick(deltaSeconds, stress.stressLevel)

    // A non-finite location counts as unknown; the previous one is kept.
    if (stress.subjectLocation && isFiniteVector(stress.subjectLocation)) {
      this.lastKnownLocation = clampVector(stress.subjectLocation)
    }

    const audio = this.audio.shape(snap, profile, age, stress, this.lastKnownLocation ?? undefined)
    const visual = this.visual.shape(snap, profile, age, stress)

    const merged: AdaptationParameters = {
      ...audio,
      ...visual,
      contentCategory: contentCategoryFor(snap.phase.kind, stress.stressLevel),
      phase: snap.phase.kind,
      intensity: snap.intensity,
      profileName: profile.name,
      age,
      stressLevel: stress.stressLevel,
      elapsedSeconds: snap.elapsedSeconds,
    }

    const { params, violations } = enforceSafeRanges(merged, this.config.safety)
    if (violations.length > 0) {
      if (this.strict) {
        const [first] = violations
        throw new OutOfRangeParameterError(first.field, first.value, first.min, first.max)
      }
      for (const v of violations) {
        this.log.warn(v, 'parameter clamped to safe range')
      }
    }

    const snapshot = freezeSnapshot(params)
    this.ring.push(snapshot)

    if (snap.transitioned) {
      this.log.debug({ from: previousPhase, to: snap.phase.kind, elapsed: snap.elapsedSeconds }, 'phase transition')
      this.bus.emit('phase', { from: previousPhase, to: snap.phase.kind, elapsedSeconds: snap.elapsedSeconds })
    }
    if (snap.stressChanged && previousStress !== null) {
      this.log.debug({ from: previousStress, to: stress.stressLevel }, 'stress level changed')
      this.bus.emit('stress', { from: previousStress, to: stress.stressLevel, intensity: snap.intensity })
    }
    this.bus.emit('snapshot', { params: snapshot, violations: violations.length })

    return snapshot
  }

  /** Restore the initial session state. Listeners on the bus are kept. */
  reset(): void {
    this.phases.reset()
    this.ring.clear()
    this.lastKnownLocation = null
    this.log.debug('session reset')
    this.bus.emit('session', { action: 'reset' })
  }

  getState(): SessionState {
    return {
      elapsedSeconds: this.phases.elapsedSeconds,
      currentPhase: this.phases.current.kind,
      lastStressLevel: this.phases.lastStressLevel,
      lastKnownLocation: this.lastKnownLocation ? { ...this.lastKnownLocation } : null,
      history: this.ring.toArray(),
    }
  }

  get latest(): Readonly<AdaptationParameters> | undefined {
    return this.ring.latest()
  }

  /** Snapshots oldest first, bounded by engine.historyCapacity. */
  get history(): Readonly<AdaptationParameters>[] {
    return this.ring.toArray()
  }
}
