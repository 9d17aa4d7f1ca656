import type { CandidateUpdate, PackageRule, RulePredicates, UpdateType } from './types'
import { minimatch } from 'minimatch'
import { parseRegexPattern } from './utils'
import { satisfiesRange } from './versioning'

export const PREDICATE_KEYS = [
  'matchCategories',
  'matchPackageNames',
  'matchUpdateTypes',
  'matchManagers',
  'matchDepTypes',
  'matchCurrentVersion',
] as const satisfies ReadonlyArray<keyof RulePredicates>

/**
 * Test a single name pattern (exact, glob or `/regex/`), ignoring negation
 */
export function matchesNamePattern(name: string, pattern: string): boolean {
  // A lone `*` also covers scoped names, which a glob would stop at the slash
  if (pattern === '*')
    return true
  const regex = parseRegexPattern(pattern)
  if (regex)
    return regex.test(name)
  if (/[*?[\]{}]/.test(pattern))
    return minimatch(name, pattern, { dot: true })
  return name === pattern
}

/**
 * Positive patterns are OR-ed, any matching `!pattern` excludes. A list of
 * negations only matches every name none of them exclude.
 */
export function matchPackageName(name: string, patterns: string[]): boolean {
  const positive = patterns.filter(pattern => !pattern.startsWith('!'))
  const negative = patterns.filter(pattern => pattern.startsWith('!')).map(pattern => pattern.slice(1))

  if (negative.some(pattern => matchesNamePattern(name, pattern)))
    return false
  if (positive.length === 0)
    return negative.length > 0
  return positive.some(pattern => matchesNamePattern(name, pattern))
}

/**
 * `matchCurrentVersion` takes a `/regex/` tested against the raw version, or a range
 */
export function matchCurrentVersion(version: string, expression: string): boolean {
  const regex = parseRegexPattern(expression)
  if (regex)
    return regex.test(version)
  return satisfiesRange(version, expression)
}

function includes(list: string[] | undefined, value: string | undefined): boolean {
  if (list === undefined)
    return true
  return value !== undefined && list.includes(value)
}

export function hasPredicates(rule: PackageRule): boolean {
  return PREDICATE_KEYS.some(key => rule[key] !== undefined)
}

/**
 * Whether every predicate present on the rule holds for the candidate. A
 * predicate on a field the candidate leaves unset does not hold.
 */
export function ruleMatches(rule: PackageRule, candidate: CandidateUpdate, updateType: UpdateType | null): boolean {
  if (!includes(rule.matchCategories, candidate.category))
    return false
  if (!includes(rule.matchManagers, candidate.manager))
    return false
  if (!includes(rule.matchDepTypes, candidate.depType))
    return false
  if (rule.matchUpdateTypes !== undefined && (updateType === null || !rule.matchUpdateTypes.includes(updateType)))
    return false
  if (rule.matchPackageNames !== undefined && !matchPackageName(candidate.packageName, rule.matchPackageNames))
    return false
  if (rule.matchCurrentVersion !== undefined
    && (candidate.currentVersion === undefined || !matchCurrentVersion(candidate.currentVersion, rule.matchCurrentVersion))) {
    return false
  }
  return true
}
