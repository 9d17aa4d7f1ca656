export type UpdateType =
  | 'major'
  | 'minor'
  | 'patch'
  | 'pin'
  | 'digest'
  | 'pinDigest'
  | 'lockFileMaintenance'
  | 'rollback'
  | 'bump'
  | 'replacement'

export type SemanticCommits = 'auto' | 'enabled' | 'disabled'

/**
 * Fields a package rule (or the document itself) can set on a candidate update
 */
export interface RuleEffects {
  /** Labels for the update, replacing any inherited ones */
  labels?: string[]
  /** Labels appended to the inherited ones */
  addLabels?: string[]
  /** Schedule entries, e.g. `before 6am on monday` */
  schedule?: string[]
  branchPrefix?: string
  commitMessageSuffix?: string
  enabled?: boolean
  groupName?: string
  groupSlug?: string
  automerge?: boolean
}

export interface RulePredicates {
  matchCategories?: string[]
  /** Exact names, globs, `/regex/flags`, each optionally negated with `!` */
  matchPackageNames?: string[]
  matchUpdateTypes?: UpdateType[]
  matchManagers?: string[]
  matchDepTypes?: string[]
  /** A version range (`>=1.0.0`, `^1.2.0`, `1.x`) or `/regex/` */
  matchCurrentVersion?: string
}

export interface PackageRule extends RulePredicates, RuleEffects {
  description?: string | string[]
}

export interface LockFileMaintenanceConfig {
  enabled?: boolean
  schedule?: string[]
  automerge?: boolean
}

export interface UpdateConfig {
  $schema?: string
  description?: string | string[]
  extends?: string[]
  packageRules?: PackageRule[]
  ignoreDeps?: string[]
  labels?: string[]
  addLabels?: string[]
  schedule?: string[]
  branchPrefix?: string
  commitMessageSuffix?: string
  enabled?: boolean
  automerge?: boolean
  /** IANA timezone schedules are evaluated in _(default: UTC)_ */
  timezone?: string
  semanticCommits?: SemanticCommits
  /** Maximum open pull requests, `0` for no limit */
  prConcurrentLimit?: number
  /** Maximum pull requests created per hour, `0` for no limit */
  prHourlyLimit?: number
  lockFileMaintenance?: LockFileMaintenanceConfig
}

/**
 * A built-in or user-supplied preset body
 */
export type PresetDefinition = UpdateConfig

export type PresetMap = Record<string, PresetDefinition>

export interface PresetReference {
  kind: 'builtin' | 'external'
  /** Preset name without arguments, e.g. `:label` or `github>acme/renovate-config` */
  name: string
  args: string[]
  raw: string
}

export interface ResolveOptions {
  /** Extra presets keyed by their full reference, used before the built-ins */
  presets?: PresetMap
  /** Collect unknown presets in `unresolved` instead of throwing */
  allowUnknown?: boolean
}

export interface ResolvedConfig {
  config: UpdateConfig
  /** Every preset that was expanded, in expansion order */
  resolved: string[]
  /** External or unknown presets that could not be expanded */
  unresolved: string[]
}

export interface CandidateUpdate {
  packageName: string
  category?: string
  manager?: string
  depType?: string
  updateType?: UpdateType
  currentVersion?: string
  newVersion?: string
}

export interface EffectiveUpdate {
  packageName: string
  updateType: UpdateType | null
  enabled: boolean
  labels: string[]
  schedule: string[]
  branchPrefix: string
  commitMessageSuffix: string
  automerge: boolean
  groupName?: string
  groupSlug?: string
  /** Indices into `packageRules` of every rule that matched, in order */
  matchedRules: number[]
  /** Set when the package is listed in `ignoreDeps` */
  ignored: boolean
  branchName: string
  commitMessage: string
}

export type LintSeverity = 'error' | 'warning' | 'info'

export type LintRule =
  | 'unknown-preset'
  | 'unresolved-preset'
  | 'invalid-preset'
  | 'invalid-pattern'
  | 'invalid-schedule'
  | 'unknown-category'
  | 'match-all-rule'
  | 'no-effect-rule'
  | 'duplicate-labels'
  | 'conflicting-rules'
  | 'shadowed-rule'

export interface LintFinding {
  rule: LintRule
  severity: LintSeverity
  message: string
  /** Dotted path into the document, e.g. `packageRules.2.labels` */
  path?: string
}

export interface LintOptions {
  presets?: PresetMap
}

export interface ValidationIssue {
  path: string
  message: string
}

export interface LoadedConfig {
  path: string
  config: UpdateConfig
}

export interface UpdateRulesConfig {
  /** Directory the document is searched in _(default: process.cwd())_ */
  cwd: string
  /** Explicit path to the document, skipping the search */
  configFile?: string
  /** Extra preset bodies keyed by reference, e.g. `github>acme/renovate-config` */
  presets: PresetMap
  /** Treat lint warnings as failures _(default: false)_ */
  strict: boolean
  quiet: boolean
  verbose: boolean
  /** Fallback timezone when the document sets none _(default: UTC)_ */
  timezone: string
}

export type UpdateRulesOptions = Partial<UpdateRulesConfig>

export enum ExitCode {
  Success = 0,
  InvalidArgument = 1,
  FatalError = 2,
}
