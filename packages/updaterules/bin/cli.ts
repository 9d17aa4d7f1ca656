#!/usr/bin/env tsx
/* eslint-disable no-console */
import type { CandidateUpdate, LoadedConfig, UpdateRulesConfig, UpdateType } from '../src/types'
import { resolve } from 'node:path'
import process from 'node:process'
import { cac } from 'cac'
import { version } from '../package.json'
import { loadUpdateRulesConfig } from '../src/config'
import { ConfigValidationError, PresetResolutionError, ScheduleParseError } from '../src/errors'
import { explainUpdate, formatExplanation, formatFinding } from '../src/explain'
import { lintConfig, lintFails } from '../src/lint'
import { findConfigFile, loadConfigFile } from '../src/loader'
import { listPresets, resolveConfig } from '../src/presets'
import { UPDATE_TYPES } from '../src/schema'
import { ExitCode } from '../src/types'
import { colors, findOptionValue, logStep, symbols } from '../src/utils'

process.on('SIGINT', () => {
  process.stderr.write('\nOperation cancelled by user \x1B[3m(Ctrl+C)\x1B[0m\n')
  process.exit(0)
})

const cli = cac('updaterules')

interface GlobalOptions {
  quiet?: boolean
  verbose?: boolean
  strict?: boolean
  cwd?: string
}

// cac hands back number-like values as numbers
type OptionValue = string | number

interface ExplainCommandOptions extends GlobalOptions {
  category?: OptionValue
  manager?: OptionValue
  depType?: OptionValue
  updateType?: string
  current?: OptionValue
  new?: OptionValue
  at?: string
}

/**
 * Error handler
 */
function errorHandler(error: Error): never {
  let message = error.message || String(error)

  if (process.env.CI || process.env.DEBUG)
    message += `\n\n${error.stack || ''}`

  console.error(colors.red(`${symbols.error} ${message}`))

  if (error instanceof ConfigValidationError
    || error instanceof PresetResolutionError
    || error instanceof ScheduleParseError
    || message.includes('Failed to read')
    || message.includes('Failed to parse')
    || message.includes('No configuration file')
    || message.includes('Invalid')) {
    process.exit(ExitCode.InvalidArgument)
  }

  process.exit(ExitCode.FatalError)
}

/**
 * Only pass options that were explicitly provided, so the settings file
 * fills in the rest
 */
function prepareSettings(file: string | undefined, options: GlobalOptions): UpdateRulesConfig {
  const overrides: Partial<UpdateRulesConfig> = {}
  if (options.cwd !== undefined)
    overrides.cwd = options.cwd
  if (file !== undefined)
    overrides.configFile = file
  if (options.quiet !== undefined)
    overrides.quiet = options.quiet
  if (options.verbose !== undefined)
    overrides.verbose = options.verbose
  if (options.strict !== undefined)
    overrides.strict = options.strict
  return loadUpdateRulesConfig(overrides)
}

async function loadDocument(settings: UpdateRulesConfig): Promise<LoadedConfig> {
  const path = settings.configFile !== undefined
    ? resolve(settings.cwd, settings.configFile)
    : await findConfigFile(settings.cwd)
  if (!path)
    throw new Error(`No configuration file found in ${settings.cwd}`)

  if (settings.verbose)
    logStep(symbols.search, `Reading ${path}`)
  return loadConfigFile(path)
}

/**
 * Text of a free-form option as typed, so `--current 1.10` stays `1.10`
 */
function textOption(flag: string, parsed: OptionValue | undefined): string | undefined {
  if (parsed === undefined)
    return undefined
  return findOptionValue(process.argv, flag) ?? String(parsed)
}

function isUpdateType(value: string): value is UpdateType {
  return UPDATE_TYPES.some(type => type === value)
}

cli
  .option('--cwd <dir>', 'Directory to search for the configuration file')
  .option('-q, --quiet', 'Only print problems')
  .option('--verbose', 'Enable verbose output')
  .option('--strict', 'Fail lint on warnings as well as errors')

cli
  .command('validate [file]', 'Check that the configuration file parses and matches the schema')
  .example('updaterules validate')
  .example('updaterules validate .github/renovate.json5')
  .action(async (file: string | undefined, options: GlobalOptions) => {
    const settings = prepareSettings(file, options)
    const { path } = await loadDocument(settings)
    if (!settings.quiet)
      console.log(colors.green(`${symbols.success} ${path} is valid`))
  })

cli
  .command('lint [file]', 'Validate, then check presets, patterns, schedules and rule conflicts')
  .example('updaterules lint --strict')
  .action(async (file: string | undefined, options: GlobalOptions) => {
    const settings = prepareSettings(file, options)
    const { path, config } = await loadDocument(settings)
    const findings = lintConfig(config, { presets: settings.presets })

    for (const finding of findings) {
      if (settings.quiet && finding.severity === 'info')
        continue
      console.log(formatFinding(finding))
    }

    if (lintFails(findings, settings.strict)) {
      console.error(colors.red(`${symbols.error} ${path} has problems`))
      process.exit(ExitCode.InvalidArgument)
    }

    if (!settings.quiet)
      console.log(colors.green(`${symbols.success} ${path} passed lint with ${findings.length} note(s)`))
  })

cli
  .command('resolve [file]', 'Print the configuration with every preset expanded')
  .action(async (file: string | undefined, options: GlobalOptions) => {
    const settings = prepareSettings(file, options)
    const { config } = await loadDocument(settings)
    const resolved = resolveConfig(config, { presets: settings.presets, allowUnknown: true })

    console.log(JSON.stringify(resolved.config, null, 2))
    if (settings.verbose)
      logStep(symbols.memo, `Expanded presets: ${resolved.resolved.join(', ') || 'none'}`)
    for (const preset of resolved.unresolved)
      console.error(colors.yellow(`${symbols.warning} preset ${preset} was not expanded`))
  })

cli
  .command('explain <package> [file]', 'Show the merged effect of every rule on one candidate update')
  .option('--category <category>', 'Category of the package, e.g. js or rust')
  .option('--manager <manager>', 'Package manager, e.g. npm or cargo')
  .option('--dep-type <type>', 'Dependency type, e.g. devDependencies')
  .option('--update-type <type>', `One of ${UPDATE_TYPES.join(', ')}`)
  .option('--current <version>', 'Current version')
  .option('--new <version>', 'Proposed version')
  .option('--at <date>', 'ISO date the schedule is checked against (default: now)')
  .example('updaterules explain ember-source --category js --current 5.4.0 --new 6.0.0')
  .example('updaterules explain lockfile --update-type lockFileMaintenance')
  .action(async (packageName: string, file: string | undefined, options: ExplainCommandOptions) => {
    const settings = prepareSettings(file, options)
    const { config } = await loadDocument(settings)

    if (options.updateType !== undefined && !isUpdateType(options.updateType))
      throw new Error(`Invalid update type: ${options.updateType}`)

    const at = options.at === undefined ? new Date() : new Date(options.at)
    if (Number.isNaN(at.getTime()))
      throw new Error(`Invalid date: ${options.at}`)

    const candidate: CandidateUpdate = { packageName }
    const category = textOption('--category', options.category)
    if (category !== undefined)
      candidate.category = category
    const manager = textOption('--manager', options.manager)
    if (manager !== undefined)
      candidate.manager = manager
    const depType = textOption('--dep-type', options.depType)
    if (depType !== undefined)
      candidate.depType = depType
    if (options.updateType !== undefined && isUpdateType(options.updateType))
      candidate.updateType = options.updateType
    const currentVersion = textOption('--current', options.current)
    if (currentVersion !== undefined)
      candidate.currentVersion = currentVersion
    const newVersion = textOption('--new', options.new)
    if (newVersion !== undefined)
      candidate.newVersion = newVersion

    const result = explainUpdate(config, candidate, { presets: settings.presets, at, timezone: settings.timezone })
    for (const line of formatExplanation(result))
      console.log(line)
  })

cli
  .command('presets', 'List the built-in presets')
  .action(() => {
    for (const preset of listPresets())
      console.log(`${colors.bold(preset.name)} ${colors.gray(preset.description)}`)
  })

cli
  .command('version', 'Show the version of updaterules')
  .action(() => {
    console.log(version)
  })

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:')
  errorHandler(error)
})
process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:')
  errorHandler(reason instanceof Error ? reason : new Error(String(reason)))
})

cli.version(version)
cli.help()

try {
  cli.parse(process.argv, { run: false })
  await cli.runMatchedCommand()
}
catch (error) {
  errorHandler(error instanceof Error ? error : new Error(String(error)))
}
