import type { ValidationIssue } from './types'

export class ConfigValidationError extends Error {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[], source?: string) {
    const location = source ? ` in ${source}` : ''
    const details = issues.map(issue => `  ${issue.path || '(root)'}: ${issue.message}`).join('\n')
    super(`Invalid configuration${location}:\n${details}`)
    this.name = 'ConfigValidationError'
    this.issues = issues
  }
}

export class PresetResolutionError extends Error {
  readonly preset: string

  constructor(preset: string, message: string) {
    super(message)
    this.name = 'PresetResolutionError'
    this.preset = preset
  }
}

export class ScheduleParseError extends Error {
  readonly entry: string

  constructor(entry: string, reason: string) {
    super(`Invalid schedule "${entry}": ${reason}`)
    this.name = 'ScheduleParseError'
    this.entry = entry
  }
}
