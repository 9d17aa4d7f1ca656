import type { LockFileMaintenanceConfig, PackageRule, UpdateConfig, ValidationIssue } from './types'
import { z } from 'zod'
import { ConfigValidationError } from './errors'
import { isValidTimezone } from './schedule'

export const UPDATE_TYPES = [
  'major',
  'minor',
  'patch',
  'pin',
  'digest',
  'pinDigest',
  'lockFileMaintenance',
  'rollback',
  'bump',
  'replacement',
] as const

const stringList = z.array(z.string().min(1, 'must not be empty'))
const description = z.union([z.string(), z.array(z.string())])
const limit = z.number().int('must be an integer').nonnegative('must be 0 (no limit) or a positive integer')

export const packageRuleSchema: z.ZodType<PackageRule> = z.object({
  description: description.optional(),

  matchCategories: stringList.optional(),
  matchPackageNames: stringList.optional(),
  matchUpdateTypes: z.array(z.enum(UPDATE_TYPES)).optional(),
  matchManagers: stringList.optional(),
  matchDepTypes: stringList.optional(),
  matchCurrentVersion: z.string().min(1, 'must not be empty').optional(),

  labels: stringList.optional(),
  addLabels: stringList.optional(),
  schedule: z.array(z.string()).optional(),
  branchPrefix: z.string().optional(),
  commitMessageSuffix: z.string().optional(),
  enabled: z.boolean().optional(),
  groupName: z.string().min(1, 'must not be empty').optional(),
  groupSlug: z.string().min(1, 'must not be empty').optional(),
  automerge: z.boolean().optional(),
}).strict().superRefine((rule, ctx) => {
  if (rule.groupSlug !== undefined && rule.groupName === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['groupSlug'],
      message: 'groupSlug requires groupName',
    })
  }
})

export const lockFileMaintenanceSchema: z.ZodType<LockFileMaintenanceConfig> = z.object({
  enabled: z.boolean().optional(),
  schedule: z.array(z.string()).optional(),
  automerge: z.boolean().optional(),
}).strict()

export const updateConfigSchema: z.ZodType<UpdateConfig> = z.object({
  $schema: z.string().optional(),
  description: description.optional(),
  extends: stringList.optional(),
  packageRules: z.array(packageRuleSchema).optional(),
  ignoreDeps: stringList.optional(),

  labels: stringList.optional(),
  addLabels: stringList.optional(),
  schedule: z.array(z.string()).optional(),
  branchPrefix: z.string().optional(),
  commitMessageSuffix: z.string().optional(),
  enabled: z.boolean().optional(),
  automerge: z.boolean().optional(),

  timezone: z.string().refine(isValidTimezone, 'must be a valid IANA timezone').optional(),
  semanticCommits: z.enum(['auto', 'enabled', 'disabled']).optional(),
  prConcurrentLimit: limit.optional(),
  prHourlyLimit: limit.optional(),
  lockFileMaintenance: lockFileMaintenanceSchema.optional(),
}).strict()

export const presetMapSchema = z.record(updateConfigSchema)

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

export type SafeValidationResult =
  | { success: true, config: UpdateConfig }
  | { success: false, issues: ValidationIssue[] }

export function safeValidateConfig(input: unknown): SafeValidationResult {
  const result = updateConfigSchema.safeParse(input)
  if (result.success)
    return { success: true, config: result.data }
  return { success: false, issues: toValidationIssues(result.error) }
}

/**
 * Validate an unknown value as a configuration document, throwing a
 * ConfigValidationError listing every issue
 */
export function validateConfig(input: unknown, source?: string): UpdateConfig {
  const result = safeValidateConfig(input)
  if (!result.success)
    throw new ConfigValidationError(result.issues, source)
  return result.config
}
