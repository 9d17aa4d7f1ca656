import type { CandidateUpdate, EffectiveUpdate, LintFinding, PackageRule, PresetMap, UpdateConfig } from './types'
import { evaluateUpdate } from './evaluate'
import { resolveConfig } from './presets'
import { isScheduled } from './schedule'
import { colors, symbols } from './utils'

export interface ExplainOptions {
  presets?: PresetMap
  /** Instant the schedule is checked against _(default: now)_ */
  at?: Date
  /** Used when the document sets no timezone _(default: UTC)_ */
  timezone?: string
}

export interface ExplainResult {
  effective: EffectiveUpdate
  /** Rules that matched, as they appear after preset expansion */
  rules: Array<{ index: number, rule: PackageRule }>
  timezone: string
  scheduled: boolean
  /** Presets that could not be expanded and were left out */
  unresolved: string[]
}

/**
 * Resolve presets, evaluate the candidate and check its schedule
 */
export function explainUpdate(config: UpdateConfig, candidate: CandidateUpdate, options: ExplainOptions = {}): ExplainResult {
  const { config: resolved, unresolved } = resolveConfig(config, { presets: options.presets, allowUnknown: true })
  const effective = evaluateUpdate(resolved, candidate)
  const timezone = resolved.timezone ?? options.timezone ?? 'UTC'
  const packageRules = resolved.packageRules ?? []

  return {
    effective,
    rules: effective.matchedRules.map(index => ({ index, rule: packageRules[index] })),
    timezone,
    scheduled: isScheduled(effective.schedule, options.at ?? new Date(), timezone),
    unresolved,
  }
}

function describeRule(rule: PackageRule): string {
  if (typeof rule.description === 'string')
    return rule.description
  if (Array.isArray(rule.description))
    return rule.description.join(' ')
  return JSON.stringify(rule)
}

/**
 * Human-readable lines for an explain result
 */
export function formatExplanation(result: ExplainResult): string[] {
  const { effective } = result
  const status = effective.enabled ? colors.green('enabled') : colors.red('disabled')
  const lines = [
    `${symbols.package} ${colors.bold(effective.packageName)} ${colors.gray(`(${effective.updateType ?? 'unknown update type'})`)}: ${status}${effective.ignored ? colors.gray(' via ignoreDeps') : ''}`,
    `  labels:     ${effective.labels.length > 0 ? effective.labels.join(', ') : colors.gray('none')}`,
    `  schedule:   ${effective.schedule.join('; ')} ${colors.gray(`(${result.timezone})`)} ${result.scheduled ? colors.green('open now') : colors.yellow('closed now')}`,
    `  automerge:  ${effective.automerge ? 'yes' : 'no'}`,
  ]

  if (effective.groupName !== undefined)
    lines.push(`  group:      ${effective.groupName}`)

  lines.push(
    `  branch:     ${effective.branchName}`,
    `  commit:     ${effective.commitMessage}`,
  )

  if (result.rules.length === 0) {
    lines.push(colors.gray('  no package rules matched'))
  }
  else {
    lines.push('  matched rules:')
    for (const { index, rule } of result.rules)
      lines.push(`    ${colors.gray(`#${index}`)} ${describeRule(rule)}`)
  }

  for (const preset of result.unresolved)
    lines.push(colors.yellow(`  ${symbols.warning} preset ${preset} was not expanded`))

  return lines
}

export function formatFinding(finding: LintFinding): string {
  const location = finding.path ? colors.gray(` (${finding.path})`) : ''
  switch (finding.severity) {
    case 'error':
      return `${colors.red(`${symbols.error} ${finding.rule}`)} ${finding.message}${location}`
    case 'warning':
      return `${colors.yellow(`${symbols.warning} ${finding.rule}`)} ${finding.message}${location}`
    case 'info':
      return `${colors.blue(`${symbols.info} ${finding.rule}`)} ${finding.message}${location}`
  }
}
