import type { UpdateRulesConfig, UpdateRulesOptions } from './types'
import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import process from 'node:process'
import { z } from 'zod'
import { ConfigValidationError } from './errors'
import { isValidTimezone } from './schedule'
import { presetMapSchema, toValidationIssues } from './schema'
import { errorMessage } from './utils'

export const CONFIG_NAME = 'updaterules'

export const defaultConfig: UpdateRulesConfig = {
  cwd: process.cwd(),
  presets: {},
  strict: false,
  quiet: false,
  verbose: false,
  timezone: 'UTC',
}

const settingsSchema = z.object({
  configFile: z.string().optional(),
  presets: presetMapSchema.optional(),
  strict: z.boolean().optional(),
  quiet: z.boolean().optional(),
  verbose: z.boolean().optional(),
  timezone: z.string().refine(isValidTimezone, 'must be a valid IANA timezone').optional(),
}).strict()

/**
 * Load `updaterules.config.json` from a directory, if present
 */
export function loadSettingsFile(cwd: string): UpdateRulesOptions {
  const path = join(cwd, `${CONFIG_NAME}.config.json`)
  if (!existsSync(path))
    return {}

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'))
  }
  catch (error) {
    throw new Error(`Failed to read ${path}: ${errorMessage(error)}`)
  }

  const result = settingsSchema.safeParse(parsed)
  if (!result.success)
    throw new ConfigValidationError(toValidationIssues(result.error), path)
  return result.data
}

/**
 * Load updaterules settings with overrides
 */
let cachedConfig: UpdateRulesConfig | null = null

function getConfig(cwd: string): UpdateRulesConfig {
  if (cachedConfig && cachedConfig.cwd === cwd)
    return cachedConfig

  cachedConfig = { ...defaultConfig, cwd, ...loadSettingsFile(cwd) }
  return cachedConfig
}

export function loadUpdateRulesConfig(overrides: UpdateRulesOptions = {}): UpdateRulesConfig {
  const base = getConfig(overrides.cwd ?? process.cwd())
  return {
    ...base,
    ...overrides,
    presets: { ...base.presets, ...overrides.presets },
  }
}

export function resetConfigCache(): void {
  cachedConfig = null
}

/**
 * Typed identity helper for building settings objects in code, such as
 * overrides passed to `loadUpdateRulesConfig`
 */
export function defineConfig(config: UpdateRulesOptions): UpdateRulesOptions {
  return config
}
