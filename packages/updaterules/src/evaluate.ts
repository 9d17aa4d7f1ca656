import type { CandidateUpdate, EffectiveUpdate, PackageRule, UpdateConfig, UpdateType } from './types'
import { ruleMatches } from './matchers'
import { slugify, unique } from './utils'
import { classifyUpdate, parseVersion } from './versioning'

export const DEFAULT_BRANCH_PREFIX = 'renovate/'
export const DEFAULT_SCHEDULE = ['at any time']

interface EffectState {
  enabled: boolean
  automerge: boolean
  labels: string[]
  addLabels: string[]
  schedule: string[]
  branchPrefix: string
  commitMessageSuffix: string
  groupName?: string
  groupSlug?: string
}

function applyRule(state: EffectState, rule: PackageRule): void {
  if (rule.labels !== undefined)
    state.labels = [...rule.labels]
  if (rule.addLabels !== undefined)
    state.addLabels.push(...rule.addLabels)
  if (rule.schedule !== undefined)
    state.schedule = [...rule.schedule]
  if (rule.branchPrefix !== undefined)
    state.branchPrefix = rule.branchPrefix
  if (rule.commitMessageSuffix !== undefined)
    state.commitMessageSuffix = rule.commitMessageSuffix
  if (rule.enabled !== undefined)
    state.enabled = rule.enabled
  if (rule.automerge !== undefined)
    state.automerge = rule.automerge
  if (rule.groupName !== undefined) {
    // groupSlug belongs to the rule that named the group
    state.groupName = rule.groupName
    state.groupSlug = rule.groupSlug
  }
}

/**
 * Determine the update type of a candidate, classifying its versions when
 * the type is not given
 */
export function resolveUpdateType(candidate: CandidateUpdate): UpdateType | null {
  if (candidate.updateType)
    return candidate.updateType
  if (candidate.currentVersion && candidate.newVersion)
    return classifyUpdate(candidate.currentVersion, candidate.newVersion)
  return null
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1)
}

export function branchTopic(candidate: CandidateUpdate, updateType: UpdateType | null, groupName?: string, groupSlug?: string): string {
  if (updateType === 'lockFileMaintenance')
    return 'lock-file-maintenance'

  if (groupName !== undefined) {
    const topic = groupSlug ?? slugify(groupName)
    return updateType === 'major' ? `major-${topic}` : topic
  }

  const slug = slugify(candidate.packageName)
  const newVersion = candidate.newVersion ? parseVersion(candidate.newVersion) : null
  return newVersion ? `${slug}-${newVersion.major}.x` : slug
}

export function commitMessage(candidate: CandidateUpdate, updateType: UpdateType | null, config: UpdateConfig, groupName: string | undefined, suffix: string): string {
  let text: string
  if (updateType === 'lockFileMaintenance') {
    text = 'lock file maintenance'
  }
  else if (groupName !== undefined) {
    text = `update ${groupName}`
  }
  else {
    const version = candidate.newVersion ? ` to v${candidate.newVersion.replace(/^v/, '')}` : ''
    text = `update dependency ${candidate.packageName}${version}`
  }

  const message = config.semanticCommits === 'enabled' ? `chore(deps): ${text}` : capitalize(text)
  return suffix ? `${message} ${suffix}` : message
}

/**
 * Compute the merged effect of a resolved document on one candidate update.
 *
 * Layers, later winning field by field: built-in defaults, the document's
 * top-level settings, the lock file maintenance block (for that update type
 * only, its `enabled` ANDed with the repository's), then each matching
 * package rule in document order. `addLabels` accumulate across layers and
 * follow `labels`. Packages in `ignoreDeps` are always disabled.
 */
export function evaluateUpdate(config: UpdateConfig, candidate: CandidateUpdate): EffectiveUpdate {
  const updateType = resolveUpdateType(candidate)

  const state: EffectState = {
    enabled: config.enabled ?? true,
    automerge: config.automerge ?? false,
    labels: [...(config.labels ?? [])],
    addLabels: [...(config.addLabels ?? [])],
    schedule: [...(config.schedule ?? DEFAULT_SCHEDULE)],
    branchPrefix: config.branchPrefix ?? DEFAULT_BRANCH_PREFIX,
    commitMessageSuffix: config.commitMessageSuffix ?? '',
  }

  if (updateType === 'lockFileMaintenance') {
    const maintenance = config.lockFileMaintenance ?? {}
    state.enabled = state.enabled && (maintenance.enabled ?? false)
    if (maintenance.schedule !== undefined)
      state.schedule = [...maintenance.schedule]
    if (maintenance.automerge !== undefined)
      state.automerge = maintenance.automerge
  }

  const matchedRules: number[] = []
  for (const [index, rule] of (config.packageRules ?? []).entries()) {
    if (ruleMatches(rule, candidate, updateType)) {
      matchedRules.push(index)
      applyRule(state, rule)
    }
  }

  const ignored = config.ignoreDeps?.includes(candidate.packageName) ?? false
  if (ignored)
    state.enabled = false

  return {
    packageName: candidate.packageName,
    updateType,
    enabled: state.enabled,
    labels: unique([...state.labels, ...state.addLabels]),
    schedule: state.schedule,
    branchPrefix: state.branchPrefix,
    commitMessageSuffix: state.commitMessageSuffix,
    automerge: state.automerge,
    ...(state.groupName !== undefined && { groupName: state.groupName }),
    ...(state.groupSlug !== undefined && { groupSlug: state.groupSlug }),
    matchedRules,
    ignored,
    branchName: `${state.branchPrefix}${branchTopic(candidate, updateType, state.groupName, state.groupSlug)}`,
    commitMessage: commitMessage(candidate, updateType, config, state.groupName, state.commitMessageSuffix),
  }
}
