/**
 * Shared domain vocabulary — the value types that cross module seams.
 *
 * Shapers, the orchestrator and renderer sinks all speak in these terms.
 * Enum-like unions are backed by `as const` tuples so the zod schemas in
 * config.ts and feedback validation can reuse the same literals.
 */

// ==================== Enumerations ====================

export const STRESS_LEVELS = ['low', 'moderate', 'high'] as const
export type StressLevel = (typeof STRESS_LEVELS)[number]

export const AGE_GROUPS = ['puppy', 'adult', 'senior'] as const
export type AgeGroup = (typeof AGE_GROUPS)[number]

export const SPATIAL_PREFERENCES = ['surround', 'frontFocused', 'sideFocused', 'overhead', 'adaptive'] as const
export type SpatialPreference = (typeof SPATIAL_PREFERENCES)[number]

export const COLOR_PREFERENCES = ['blueDominant', 'yellowDominant', 'balanced', 'highContrast'] as const
export type ColorPreference = (typeof COLOR_PREFERENCES)[number]

export const BREED_CATEGORIES = [
  'working', 'companion', 'terrier', 'brachycephalic',
  'giant', 'sporting', 'herding', 'toy',
] as const
export type BreedCategory = (typeof BREED_CATEGORIES)[number]

export const ENERGY_LEVELS = ['low', 'medium', 'high'] as const
export type EnergyLevel = (typeof ENERGY_LEVELS)[number]

export const PHASE_KINDS = ['initial', 'deepening', 'maintenance'] as const
export type PhaseKind = (typeof PHASE_KINDS)[number]

export type ContentCategory = 'mental-stimulation' | 'calm-relax'

/** Ordinal of a stress level (low = 0). */
export function stressRank(level: StressLevel): number {
  return STRESS_LEVELS.indexOf(level)
}

// ==================== Geometry ====================

export interface Vector3 {
  x: number
  y: number
  z: number
}

export const CENTER: Readonly<Vector3> = Object.freeze({ x: 0, y: 0, z: 0 })

// ==================== Feedback ====================

/** One behaviour-feedback sample, consumed by a single evaluation. */
export interface StressMetrics {
  stressLevel: StressLevel
  /** Normalised movement intensity in [0, 1]. */
  movementRate: number
  heartRate?: number
  /** Subject position relative to the screen, components in [-1, 1]. */
  subjectLocation?: Vector3
}

// ==================== Output ====================

export interface FrequencyBand {
  centerHz: number
  bandwidthHz: number
  gainDb: number
}

export interface ToneGenerator {
  frequencyHz: number
  /** Linear amplitude in [0, 1]. */
  amplitude: number
}

export interface DichromaticCoefficients {
  blueWeight: number
  yellowWeight: number
  redWeight: number
  greenWeight: number
  contrastExponent: number
}

export interface AudioParameters {
  audioBPM: number
  volumeCeilingDb: number
  frequencyBands: FrequencyBand[]
  toneGenerators: ToneGenerator[]
  spatialBias: Vector3
}

export interface VisualParameters {
  visualSpeed: number
  colorContrast: number
  /** Multiplier on on-screen motion amplitude; lower values damp harder. */
  motionDamping: number
  /** Advisory ceiling; the renderer may go lower for thermal reasons. */
  frameRateCap: number
  colorTransform: DichromaticCoefficients
}

/** The full snapshot handed to renderers. Recomputed on every evaluation. */
export interface AdaptationParameters extends AudioParameters, VisualParameters {
  contentCategory: ContentCategory
  phase: PhaseKind
  /** Stimulation intensity in (0, 1] derived from phase and stress. */
  intensity: number
  profileName: string
  age: AgeGroup
  stressLevel: StressLevel
  elapsedSeconds: number
}
