import { z } from 'zod'
import { readFile } from 'fs/promises'
import { resolve } from 'path'
import { ConfigError } from './errors.js'
import {
  BREED_CATEGORIES,
  COLOR_PREFERENCES,
  ENERGY_LEVELS,
  SPATIAL_PREFERENCES,
} from './types.js'

const CONFIG_DIR = resolve('data/config')

/** Hard welfare ceiling. Configuration may lower it, never raise it. */
export const MAX_VOLUME_DB = 65

/** Documented canine hearing range. */
export const HEARING_RANGE_HZ = { min: 40, max: 65_000 } as const

// ==================== Individual Schemas ====================

/** Configuration may narrow [min, max], never widen it. */
const rangeSchema = (min: number, max: number) =>
  z.object({
    min: z.number().min(min).max(max),
    max: z.number().min(min).max(max),
  })
    .refine((r) => r.min < r.max, 'min must be below max')
    .default({ min, max })

const engineSchema = z.object({
  phaseDurations: z.object({
    initial: z.number().positive().default(300),
    deepening: z.number().positive().default(600),
    maintenance: z.number().positive().default(3600),
  }).default({ initial: 300, deepening: 600, maintenance: 3600 }),
  historyCapacity: z.number().int().positive().default(120),
  /** Runner cadence. Feedback changes every few seconds, not faster. */
  evaluationIntervalMs: z.number().int().min(1000).max(5000).default(2000),
})

const safetySchema = z.object({
  volumeCeilingDb: z.number().max(MAX_VOLUME_DB).default(MAX_VOLUME_DB),
  volumeFloorDb: z.number().min(0).default(20),
  bandGainDb: rangeSchema(-12, 6),
  frameRate: rangeSchema(10, 120),
  bpm: rangeSchema(30, 120),
  maxVisualSpeed: z.number().positive().default(2),
}).refine((s) => s.volumeFloorDb < s.volumeCeilingDb, 'volumeFloorDb must be below volumeCeilingDb')

const weight = z.number().min(0).max(1)

const visionSchema = z.object({
  blueWeight: weight.default(0.75),
  yellowWeight: weight.default(0.85),
  redWeight: weight.default(0.35),
  greenWeight: weight.default(0.55),
  contrastExponent: z.number().gt(1).max(3).default(1.2),
})

const hz = z.number().min(HEARING_RANGE_HZ.min).max(HEARING_RANGE_HZ.max)

export const breedProfileSchema = z.object({
  name: z.string().trim().min(1),
  preferredFrequencies: z.array(hz).min(1),
  volumeSensitivity: z.number().gt(0).max(1),
  spatialPreference: z.enum(SPATIAL_PREFERENCES),
  stressResponseFrequencies: z.array(hz).default([]),
  colorPreference: z.enum(COLOR_PREFERENCES),
  motionSensitivity: weight,
  contrastPreference: weight,
  category: z.enum(BREED_CATEGORIES).default('companion'),
  energyLevel: z.enum(ENERGY_LEVELS).default('medium'),
  preferredFrameRate: z.number().positive().default(25),
})

export type BreedProfileInput = z.input<typeof breedProfileSchema>

const DEFAULT_PROFILE: z.infer<typeof breedProfileSchema> = {
  name: 'default',
  preferredFrequencies: [220, 440],
  volumeSensitivity: 0.7,
  spatialPreference: 'surround',
  stressResponseFrequencies: [200, 400],
  colorPreference: 'balanced',
  motionSensitivity: 0.6,
  contrastPreference: 0.6,
  category: 'companion',
  energyLevel: 'medium',
  preferredFrameRate: 25,
}

const profilesSchema = z.object({
  defaultProfile: breedProfileSchema.default(DEFAULT_PROFILE),
  breeds: z.array(breedProfileSchema).default([]),
})

// ==================== Unified Config Type ====================

export type Config = {
  engine: z.infer<typeof engineSchema>
  safety: z.infer<typeof safetySchema>
  vision: z.infer<typeof visionSchema>
  profiles: z.infer<typeof profilesSchema>
}

export type SafetyConfig = Config['safety']
export type Range = SafetyConfig['frameRate']

export interface RawConfig {
  engine?: unknown
  safety?: unknown
  vision?: unknown
  profiles?: unknown
}

// ==================== Loader ====================

function parseSection<S extends z.ZodTypeAny>(schema: S, raw: unknown, file: string): z.infer<S> {
  const result = schema.safeParse(raw ?? {})
  if (!result.success) throw new ConfigError(file, result.error.issues)
  return result.data
}

/** Validate already-loaded sections. Missing sections fall back to schema defaults. */
export function parseConfig(raw: RawConfig = {}): Config {
  return {
    engine: parseSection(engineSchema, raw.engine, 'engine.json'),
    safety: parseSection(safetySchema, raw.safety, 'safety.json'),
    vision: parseSection(visionSchema, raw.vision, 'vision.json'),
    profiles: parseSection(profilesSchema, raw.profiles, 'breeds.json'),
  }
}

async function loadJsonFile(dir: string, filename: string): Promise<unknown> {
  try {
    const raw = await readFile(resolve(dir, filename), 'utf-8')
    return JSON.parse(raw)
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {} // File not found → use defaults from Zod schema
    }
    throw err
  }
}

export async function loadConfig(dir: string = CONFIG_DIR): Promise<Config> {
  const [engine, safety, vision, profiles] = await Promise.all([
    loadJsonFile(dir, 'engine.json'),
    loadJsonFile(dir, 'safety.json'),
    loadJsonFile(dir, 'vision.json'),
    loadJsonFile(dir, 'breeds.json'),
  ])

  return parseConfig({ engine, safety, vision, profiles })
}
