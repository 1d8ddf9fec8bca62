import type { ZodIssue } from 'zod'

export class DuplicateProfileError extends Error {
  constructor(public profileName: string) {
    super(`Breed profile already registered: "${profileName}"`)
    this.name = 'DuplicateProfileError'
  }
}

/**
 * A shaper produced a value outside its documented range. Clamping makes this
 * unreachable in normal operation; seeing it means a coefficient table is wrong.
 */
export class OutOfRangeParameterError extends Error {
  constructor(
    public field: string,
    public value: number,
    public min: number,
    public max: number,
  ) {
    super(`Parameter ${field}=${value} outside [${min}, ${max}]`)
    this.name = 'OutOfRangeParameterError'
  }
}

export class ConfigError extends Error {
  constructor(
    public file: string,
    public issues: ZodIssue[],
  ) {
    super(`Invalid config ${file}: ${issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`)
    this.name = 'ConfigError'
  }
}
