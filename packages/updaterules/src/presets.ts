import type { PresetMap, PresetReference, ResolveOptions, ResolvedConfig, UpdateConfig } from './types'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { PresetResolutionError } from './errors'
import { validateConfig } from './schema'
import { unique } from './utils'

type PresetBody = Record<string, unknown>

const builtinFileSchema = z.record(z.record(z.unknown()))

let builtinPresets: Record<string, PresetBody> | null = null

function getBuiltinPresets(): Record<string, PresetBody> {
  if (builtinPresets)
    return builtinPresets

  const path = fileURLToPath(new URL('../presets/builtin.json', import.meta.url))
  builtinPresets = builtinFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')))
  return builtinPresets
}

export function isBuiltinPreset(name: string): boolean {
  return Object.hasOwn(getBuiltinPresets(), name)
}

export interface PresetSummary {
  name: string
  description: string
}

/**
 * Built-in presets with their descriptions, in definition order
 */
export function listPresets(): PresetSummary[] {
  return Object.entries(getBuiltinPresets()).map(([name, body]) => ({
    name,
    description: typeof body.description === 'string' ? body.description : '',
  }))
}

/**
 * Split `:label(backend)` into its name and arguments. References with a
 * `host>` prefix (`github>acme/renovate-config`) are external.
 */
export function parsePresetReference(raw: string): PresetReference {
  const reference = raw.trim()
  const match = reference.match(/^([^(]+)(?:\((.*)\))?$/)
  if (!match)
    throw new PresetResolutionError(raw, `Invalid preset reference: ${raw}`)

  const name = match[1].trim()
  const args = match[2] === undefined
    ? []
    : match[2].split(',').map(arg => arg.trim()).filter(arg => arg !== '')

  return {
    kind: /^[a-z0-9-]+>/i.test(name) ? 'external' : 'builtin',
    name,
    args,
    raw: reference,
  }
}

function substituteArgs(value: unknown, reference: PresetReference): unknown {
  if (typeof value === 'string') {
    return value.replace(/\{\{\s*arg(\d+)\s*\}\}/g, (_, index: string) => {
      const arg = reference.args[Number.parseInt(index, 10)]
      if (arg === undefined)
        throw new PresetResolutionError(reference.raw, `Preset ${reference.name} requires argument arg${index}`)
      return arg
    })
  }
  if (Array.isArray(value))
    return value.map(item => substituteArgs(item, reference))
  if (value !== null && typeof value === 'object')
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, substituteArgs(item, reference)]))
  return value
}

/**
 * Merge a later layer over an earlier one: package rules concatenate,
 * ignored dependencies union, lock file maintenance merges shallowly and
 * everything else is replaced
 */
export function mergeConfig(base: UpdateConfig, override: UpdateConfig): UpdateConfig {
  const merged: UpdateConfig = { ...base, ...override }

  if (base.packageRules || override.packageRules)
    merged.packageRules = [...(base.packageRules ?? []), ...(override.packageRules ?? [])]
  if (base.ignoreDeps || override.ignoreDeps)
    merged.ignoreDeps = unique([...(base.ignoreDeps ?? []), ...(override.ignoreDeps ?? [])])
  if (base.lockFileMaintenance || override.lockFileMaintenance)
    merged.lockFileMaintenance = { ...base.lockFileMaintenance, ...override.lockFileMaintenance }

  return merged
}

/**
 * Expand every `extends` entry depth first: preset bodies apply in list
 * order, then the document's own keys on top
 */
export function resolveConfig(config: UpdateConfig, options: ResolveOptions = {}): ResolvedConfig {
  const userPresets: PresetMap = options.presets ?? {}
  const resolved: string[] = []
  const unresolved: string[] = []

  const lookup = (reference: PresetReference): unknown => {
    if (Object.hasOwn(userPresets, reference.raw))
      return userPresets[reference.raw]
    if (Object.hasOwn(userPresets, reference.name))
      return substituteArgs(userPresets[reference.name], reference)
    if (reference.kind === 'builtin' && isBuiltinPreset(reference.name))
      return substituteArgs(getBuiltinPresets()[reference.name], reference)
    return undefined
  }

  const expand = (body: UpdateConfig, chain: string[]): UpdateConfig => {
    let layered: UpdateConfig = {}

    for (const raw of body.extends ?? []) {
      const reference = parsePresetReference(raw)

      if (chain.includes(reference.raw))
        throw new PresetResolutionError(reference.raw, `Preset cycle: ${[...chain, reference.raw].join(' -> ')}`)

      const preset = lookup(reference)
      if (preset === undefined) {
        if (reference.kind === 'builtin' && !options.allowUnknown)
          throw new PresetResolutionError(reference.raw, `Unknown preset: ${reference.raw}`)
        unresolved.push(reference.raw)
        continue
      }

      resolved.push(reference.raw)
      const { description: _description, ...presetConfig } = validateConfig(preset, `preset ${reference.raw}`)
      layered = mergeConfig(layered, expand(presetConfig, [...chain, reference.raw]))
    }

    const { extends: _extends, ...own } = body
    return mergeConfig(layered, own)
  }

  return {
    config: expand(config, []),
    resolved,
    unresolved: unique(unresolved),
  }
}
