import type { LintFinding, LintOptions, PackageRule, PresetMap, RuleEffects, UpdateConfig } from './types'
import { ConfigValidationError, PresetResolutionError } from './errors'
import { hasPredicates, PREDICATE_KEYS } from './matchers'
import { isBuiltinPreset, parsePresetReference, resolveConfig } from './presets'
import { isValidSchedule } from './schedule'
import { errorMessage, isRegexPattern, parseRegexPattern } from './utils'
import { isValidRange } from './versioning'

export const KNOWN_CATEGORIES = [
  'ansible',
  'ci',
  'dart',
  'docker',
  'dotnet',
  'elixir',
  'golang',
  'helm',
  'java',
  'js',
  'kubernetes',
  'php',
  'python',
  'ruby',
  'rust',
  'swift',
  'terraform',
]

export const EFFECT_KEYS = [
  'labels',
  'addLabels',
  'schedule',
  'branchPrefix',
  'commitMessageSuffix',
  'enabled',
  'groupName',
  'groupSlug',
  'automerge',
] as const satisfies ReadonlyArray<keyof RuleEffects>

// addLabels accumulate, so a later rule never overrides them
const OVERRIDABLE_KEYS = EFFECT_KEYS.filter(key => key !== 'addLabels')

function predicateSignature(rule: PackageRule): string {
  return JSON.stringify(PREDICATE_KEYS.map((key) => {
    const value = rule[key]
    return Array.isArray(value) ? [...value].sort() : value ?? null
  }))
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b)
}

function findDuplicates(values: string[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const value of values) {
    if (seen.has(value))
      duplicates.add(value)
    seen.add(value)
  }
  return [...duplicates]
}

function lintPresets(config: UpdateConfig, presets: PresetMap): LintFinding[] {
  const findings: LintFinding[] = []
  const reported = new Set<string>()
  const isSupplied = (raw: string, name: string): boolean => Object.hasOwn(presets, raw) || Object.hasOwn(presets, name)

  const report = (raw: string, path?: string): void => {
    const reference = parsePresetReference(raw)
    if (reported.has(reference.raw) || isSupplied(reference.raw, reference.name))
      return
    if (reference.kind === 'external') {
      reported.add(reference.raw)
      findings.push({
        rule: 'unresolved-preset',
        severity: 'info',
        message: `External preset ${reference.raw} is not available offline and was not checked`,
        path,
      })
    }
    else if (!isBuiltinPreset(reference.name)) {
      reported.add(reference.raw)
      findings.push({
        rule: 'unknown-preset',
        severity: 'error',
        message: `Unknown preset: ${reference.raw}`,
        path,
      })
    }
  }

  for (const [index, raw] of (config.extends ?? []).entries()) {
    try {
      report(raw, `extends.${index}`)
    }
    catch (error) {
      findings.push({ rule: 'invalid-preset', severity: 'error', message: errorMessage(error), path: `extends.${index}` })
    }
  }

  try {
    const { unresolved } = resolveConfig(config, { presets, allowUnknown: true })
    // presets extending unknown presets
    for (const raw of unresolved)
      report(raw)
  }
  catch (error) {
    if (!(error instanceof PresetResolutionError) && !(error instanceof ConfigValidationError))
      throw error
    findings.push({ rule: 'invalid-preset', severity: 'error', message: errorMessage(error) })
  }

  return findings
}

function lintSchedule(schedule: string[] | undefined, path: string): LintFinding[] {
  return (schedule ?? []).flatMap((entry, index) => isValidSchedule(entry)
    ? []
    : [{
        rule: 'invalid-schedule' as const,
        severity: 'error' as const,
        message: `Invalid schedule "${entry}"`,
        path: `${path}.${index}`,
      }])
}

function lintLabels(effects: RuleEffects, path: string): LintFinding[] {
  const findings: LintFinding[] = []
  for (const key of ['labels', 'addLabels'] as const) {
    const duplicates = findDuplicates(effects[key] ?? [])
    if (duplicates.length > 0) {
      findings.push({
        rule: 'duplicate-labels',
        severity: 'warning',
        message: `Duplicate ${key}: ${duplicates.join(', ')}`,
        path: `${path}${key}`,
      })
    }
  }
  return findings
}

function lintPatterns(rule: PackageRule, path: string): LintFinding[] {
  const findings: LintFinding[] = []

  for (const [index, pattern] of (rule.matchPackageNames ?? []).entries()) {
    const body = pattern.startsWith('!') ? pattern.slice(1) : pattern
    if (!isRegexPattern(body))
      continue
    try {
      parseRegexPattern(body)
    }
    catch (error) {
      findings.push({ rule: 'invalid-pattern', severity: 'error', message: errorMessage(error), path: `${path}.matchPackageNames.${index}` })
    }
  }

  const version = rule.matchCurrentVersion
  if (version !== undefined) {
    if (isRegexPattern(version)) {
      try {
        parseRegexPattern(version)
      }
      catch (error) {
        findings.push({ rule: 'invalid-pattern', severity: 'error', message: errorMessage(error), path: `${path}.matchCurrentVersion` })
      }
    }
    else if (!isValidRange(version)) {
      findings.push({ rule: 'invalid-pattern', severity: 'error', message: `Invalid range: ${version}`, path: `${path}.matchCurrentVersion` })
    }
  }

  return findings
}

function lintRule(rules: PackageRule[], index: number): LintFinding[] {
  const rule = rules[index]
  const path = `packageRules.${index}`
  const findings: LintFinding[] = [
    ...lintPatterns(rule, path),
    ...lintSchedule(rule.schedule, `${path}.schedule`),
  ]

  for (const [categoryIndex, category] of (rule.matchCategories ?? []).entries()) {
    if (!KNOWN_CATEGORIES.includes(category)) {
      findings.push({
        rule: 'unknown-category',
        severity: 'warning',
        message: `Unknown category "${category}"`,
        path: `${path}.matchCategories.${categoryIndex}`,
      })
    }
  }

  if (!hasPredicates(rule)) {
    findings.push({
      rule: 'match-all-rule',
      severity: 'warning',
      message: `Rule ${index} has no match conditions and applies to every update`,
      path,
    })
  }

  const effectKeys = EFFECT_KEYS.filter(key => rule[key] !== undefined)
  if (effectKeys.length === 0) {
    findings.push({
      rule: 'no-effect-rule',
      severity: 'warning',
      message: `Rule ${index} changes nothing`,
      path,
    })
  }

  findings.push(...lintLabels(rule, `${path}.`))

  const signature = predicateSignature(rule)

  for (let earlier = 0; earlier < index; earlier++) {
    const other = rules[earlier]
    if (predicateSignature(other) !== signature)
      continue
    for (const key of OVERRIDABLE_KEYS) {
      if (rule[key] !== undefined && other[key] !== undefined && !sameValue(rule[key], other[key])) {
        findings.push({
          rule: 'conflicting-rules',
          severity: 'warning',
          message: `Rule ${index} overrides ${key} set by rule ${earlier} under the same match conditions`,
          path: `${path}.${key}`,
        })
      }
    }
  }

  const overridable = effectKeys.filter(key => key !== 'addLabels')
  if (overridable.length > 0 && overridable.length === effectKeys.length) {
    for (let later = index + 1; later < rules.length; later++) {
      const other = rules[later]
      if (predicateSignature(other) === signature && overridable.every(key => other[key] !== undefined)) {
        findings.push({
          rule: 'shadowed-rule',
          severity: 'info',
          message: `Every field rule ${index} sets is overridden by rule ${later}`,
          path,
        })
        break
      }
    }
  }

  return findings
}

/**
 * Check a validated document for mistakes the schema cannot express.
 * Content problems become findings; the function itself does not throw for them.
 */
export function lintConfig(config: UpdateConfig, options: LintOptions = {}): LintFinding[] {
  const rules = config.packageRules ?? []

  return [
    ...lintPresets(config, options.presets ?? {}),
    ...lintSchedule(config.schedule, 'schedule'),
    ...lintSchedule(config.lockFileMaintenance?.schedule, 'lockFileMaintenance.schedule'),
    ...lintLabels(config, ''),
    ...rules.flatMap((_, index) => lintRule(rules, index)),
  ]
}

export function hasErrors(findings: LintFinding[]): boolean {
  return findings.some(finding => finding.severity === 'error')
}

/**
 * Whether findings should fail a lint run; strict mode also fails on warnings
 */
export function lintFails(findings: LintFinding[], strict: boolean = false): boolean {
  return findings.some(finding => finding.severity === 'error' || (strict && finding.severity === 'warning'))
}
