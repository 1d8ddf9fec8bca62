/**
 * Safety — global output ranges and the orchestrator's final clamp.
 *
 * Shapers already respect these ranges; the orchestrator checks again
 * independently before a snapshot leaves the engine. A violation found here
 * points at a coefficient table, not at runtime input.
 */

import type { SafetyConfig } from './config.js'
import type { AdaptationParameters, Vector3 } from './types.js'

// ==================== Numeric Helpers ====================

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min
  return Math.max(min, Math.min(max, value))
}

export function roundTo(value: number, places: number): number {
  const f = 10 ** places
  return Math.round(value * f) / f
}

export function clampVector(v: Vector3, limit = 1): Vector3 {
  return {
    x: clamp(v.x, -limit, limit),
    y: clamp(v.y, -limit, limit),
    z: clamp(v.z, -limit, limit),
  }
}

// ==================== Range Table ====================

export interface RangeViolation {
  field: string
  value: number
  min: number
  max: number
}

export interface SafeRanges {
  visualSpeed: [number, number]
  colorContrast: [number, number]
  audioBPM: [number, number]
  volumeCeilingDb: [number, number]
  frameRateCap: [number, number]
  gainDb: [number, number]
  motionDamping: [number, number]
  amplitude: [number, number]
  coefficient: [number, number]
  spatial: [number, number]
}

/** Lowest motion multiplier the damping formula can produce (1 − 0.9). */
export const MIN_MOTION_DAMPING = 0.1

export function safeRanges(safety: SafetyConfig): SafeRanges {
  return {
    visualSpeed: [0, safety.maxVisualSpeed],
    colorContrast: [0, 1],
    audioBPM: [safety.bpm.min, safety.bpm.max],
    volumeCeilingDb: [safety.volumeFloorDb, safety.volumeCeilingDb],
    frameRateCap: [safety.frameRate.min, safety.frameRate.max],
    gainDb: [safety.bandGainDb.min, safety.bandGainDb.max],
    motionDamping: [MIN_MOTION_DAMPING, 1],
    amplitude: [0, 1],
    coefficient: [0, 1],
    spatial: [-1, 1],
  }
}

// ==================== Enforcement ====================

export interface ClampResult {
  params: AdaptationParameters
  violations: RangeViolation[]
}

/**
 * Clamp every numeric field of a snapshot against the safe ranges and report
 * which fields needed it. Returns a new object; the input is not mutated.
 */
export function enforceSafeRanges(params: AdaptationParameters, safety: SafetyConfig): ClampResult {
  const ranges = safeRanges(safety)
  const violations: RangeViolation[] = []

  const check = (field: string, value: number, [min, max]: [number, number]): number => {
    const clamped = clamp(value, min, max)
    if (clamped !== value) violations.push({ field, value, min, max })
    return clamped
  }

  const result: AdaptationParameters = {
    ...params,
    visualSpeed: check('visualSpeed', params.visualSpeed, ranges.visualSpeed),
    colorContrast: check('colorContrast', params.colorContrast, ranges.colorContrast),
    audioBPM: Math.round(check('audioBPM', params.audioBPM, ranges.audioBPM)),
    volumeCeilingDb: check('volumeCeilingDb', params.volumeCeilingDb, ranges.volumeCeilingDb),
    frameRateCap: check('frameRateCap', params.frameRateCap, ranges.frameRateCap),
    motionDamping: check('motionDamping', params.motionDamping, ranges.motionDamping),
    frequencyBands: params.frequencyBands.map((band, i) => ({
      ...band,
      gainDb: check(`frequencyBands[${i}].gainDb`, band.gainDb, ranges.gainDb),
    })),
    toneGenerators: params.toneGenerators.map((tone, i) => ({
      ...tone,
      amplitude: check(`toneGenerators[${i}].amplitude`, tone.amplitude, ranges.amplitude),
    })),
    spatialBias: {
      x: check('spatialBias.x', params.spatialBias.x, ranges.spatial),
      y: check('spatialBias.y', params.spatialBias.y, ranges.spatial),
      z: check('spatialBias.z', params.spatialBias.z, ranges.spatial),
    },
    colorTransform: {
      blueWeight: check('colorTransform.blueWeight', params.colorTransform.blueWeight, ranges.coefficient),
      yellowWeight: check('colorTransform.yellowWeight', params.colorTransform.yellowWeight, ranges.coefficient),
      redWeight: check('colorTransform.redWeight', params.colorTransform.redWeight, ranges.coefficient),
      greenWeight: check('colorTransform.greenWeight', params.colorTransform.greenWeight, ranges.coefficient),
      contrastExponent: params.colorTransform.contrastExponent,
    },
  }

  return { params: result, violations }
}

/** Deep-freeze a snapshot so a half-applied parameter set can never be observed. */
export function freezeSnapshot(params: AdaptationParameters): Readonly<AdaptationParameters> {
  for (const band of params.frequencyBands) Object.freeze(band)
  for (const tone of params.toneGenerators) Object.freeze(tone)
  Object.freeze(params.frequencyBands)
  Object.freeze(params.toneGenerators)
  Object.freeze(params.spatialBias)
  Object.freeze(params.colorTransform)
  return Object.freeze(params)
}
