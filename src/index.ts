/**
 * canine-sense — composition root and public API.
 *
 * createAdaptationEngine() wires registry, orchestrator, event bus and feedback
 * channel from one Config; loadAdaptationEngine() reads that Config from disk
 * first. Embedders attach renderer sinks through createRunner().
 */

import { loadConfig, type Config } from './core/config.js'
import { AdaptationEventBus } from './core/adaptation-events.js'
import { logger as rootLogger, type Logger } from './core/logger.js'
import { AdaptationOrchestrator } from './core/orchestrator.js'
import { createSessionRunner, type ParameterSink, type SessionRunner, type SubjectIdentity } from './core/runner.js'
import { FeedbackChannel } from './extension/feedback/index.js'
import { createProfileRegistry, type ProfileRegistry } from './extension/profiles/index.js'

// ==================== Engine ====================

export interface EngineOptions {
  strict?: boolean
  logger?: Logger
  /** Feedback samples kept between ticks. */
  feedbackCapacity?: number
}

export interface AdaptationEngine {
  config: Config
  registry: ProfileRegistry
  bus: AdaptationEventBus
  orchestrator: AdaptationOrchestrator
  feedback: FeedbackChannel
  /** A runner on the configured cadence. Call start() on it to begin. */
  createRunner(identity: () => SubjectIdentity, sinks: ParameterSink[]): SessionRunner
}

export function createAdaptationEngine(config: Config, opts: EngineOptions = {}): AdaptationEngine {
  const log = opts.logger ?? rootLogger
  const registry = createProfileRegistry(config.profiles, log.child({ module: 'profiles' }))
  const bus = new AdaptationEventBus({ logger: log.child({ module: 'events' }) })
  const orchestrator = new AdaptationOrchestrator({
    registry,
    config,
    bus,
    strict: opts.strict,
    logger: log.child({ module: 'orchestrator' }),
  })
  const feedback = new FeedbackChannel(opts.feedbackCapacity, log.child({ module: 'feedback' }))

  log.info({ breeds: registry.size, strict: opts.strict ?? false }, 'adaptation engine ready')

  return {
    config,
    registry,
    bus,
    orchestrator,
    feedback,
    createRunner: (identity, sinks) => createSessionRunner({
      orchestrator,
      feedback,
      identity,
      sinks,
      everyMs: config.engine.evaluationIntervalMs,
      bus,
      logger: log.child({ module: 'runner' }),
    }),
  }
}

export async function loadAdaptationEngine(configDir?: string, opts?: EngineOptions): Promise<AdaptationEngine> {
  const config = await loadConfig(configDir)
  return createAdaptationEngine(config, opts)
}

// ==================== Re-exports ====================

export { loadConfig, parseConfig, breedProfileSchema, MAX_VOLUME_DB, HEARING_RANGE_HZ } from './core/config.js'
export type { Config, SafetyConfig, BreedProfileInput, RawConfig } from './core/config.js'
export { DuplicateProfileError, OutOfRangeParameterError, ConfigError } from './core/errors.js'
export { logger, createLogger } from './core/logger.js'
export type { Logger } from './core/logger.js'
export * from './core/types.js'
export { AdaptationEventBus } from './core/adaptation-events.js'
export type { AdaptationEvent, AdaptationEventMap, AdaptationListener, AdaptationStream } from './core/adaptation-events.js'
export { enforceSafeRanges, freezeSnapshot, safeRanges } from './core/safety.js'
export type { RangeViolation } from './core/safety.js'
export { HistoryBuffer } from './core/session.js'
export type { SessionState } from './core/session.js'
export { AdaptationOrchestrator, contentCategoryFor } from './core/orchestrator.js'
export type { OrchestratorOpts } from './core/orchestrator.js'
export { createSessionRunner, RESTING_METRICS } from './core/runner.js'
export type { ParameterSink, SessionRunner, SessionRunnerOpts, SubjectIdentity, TickResult } from './core/runner.js'
export * from './extension/profiles/index.js'
export * from './extension/phase/index.js'
export * from './extension/audio/index.js'
export * from './extension/vision/index.js'
export * from './extension/feedback/index.js'
