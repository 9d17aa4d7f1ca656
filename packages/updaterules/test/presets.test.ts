import { describe, expect, it } from 'vitest'
import { ConfigValidationError, PresetResolutionError } from '../src/errors'
import { isBuiltinPreset, listPresets, mergeConfig, parsePresetReference, resolveConfig } from '../src/presets'

describe('parsePresetReference', () => {
  it('should parse built-in names', () => {
    expect(parsePresetReference('config:recommended')).toEqual({
      kind: 'builtin',
      name: 'config:recommended',
      args: [],
      raw: 'config:recommended',
    })
  })

  it('should parse arguments', () => {
    expect(parsePresetReference(':labels(dependencies, backend)')).toEqual({
      kind: 'builtin',
      name: ':labels',
      args: ['dependencies', 'backend'],
      raw: ':labels(dependencies, backend)',
    })
  })

  it('should recognise external references', () => {
    const reference = parsePresetReference('github>acme/renovate-config//rust/updateDeps')
    expect(reference.kind).toBe('external')
    expect(reference.name).toBe('github>acme/renovate-config//rust/updateDeps')
  })
})

describe('built-in presets', () => {
  it('should list names with descriptions', () => {
    const presets = listPresets()
    expect(presets.find(preset => preset.name === ':maintainLockFilesWeekly')?.description).toBe('Refresh lock files early on Monday mornings')
    expect(presets.every(preset => preset.description.length > 0)).toBe(true)
  })

  it('should know which names are built in', () => {
    expect(isBuiltinPreset('schedule:weekly')).toBe(true)
    expect(isBuiltinPreset('schedule:hourly')).toBe(false)
  })

  it('should all resolve on their own', () => {
    const needsArgs = new Set([':label', ':labels', ':timezone', ':disableDependency'])
    for (const { name } of listPresets()) {
      if (needsArgs.has(name))
        continue
      expect(() => resolveConfig({ extends: [name] })).not.toThrow()
    }
  })
})

describe('mergeConfig', () => {
  it('should concatenate rules, union ignoreDeps and replace everything else', () => {
    const merged = mergeConfig(
      { labels: ['a'], ignoreDeps: ['x'], packageRules: [{ matchCategories: ['js'], enabled: false }], lockFileMaintenance: { enabled: true } },
      { labels: ['b'], ignoreDeps: ['x', 'y'], packageRules: [{ matchCategories: ['rust'], enabled: false }], lockFileMaintenance: { schedule: ['every weekend'] } },
    )

    expect(merged).toEqual({
      labels: ['b'],
      ignoreDeps: ['x', 'y'],
      packageRules: [{ matchCategories: ['js'], enabled: false }, { matchCategories: ['rust'], enabled: false }],
      lockFileMaintenance: { enabled: true, schedule: ['every weekend'] },
    })
  })
})

describe('resolveConfig', () => {
  it('should expand nested presets depth first and let the document win', () => {
    const result = resolveConfig({
      extends: ['config:recommended', ':semanticCommitsDisabled'],
      prHourlyLimit: 0,
    })

    expect(result.resolved).toEqual(['config:recommended', ':semanticCommitsAuto', ':prHourlyLimit2', ':prConcurrentLimit10', ':semanticCommitsDisabled'])
    expect(result.unresolved).toEqual([])
    expect(result.config).toEqual({
      semanticCommits: 'disabled',
      prHourlyLimit: 0,
      prConcurrentLimit: 10,
    })
  })

  it('should substitute preset arguments', () => {
    const { config } = resolveConfig({ extends: [':labels(dependencies, backend)', ':timezone(Europe/Berlin)'] })
    expect(config).toEqual({ labels: ['dependencies', 'backend'], timezone: 'Europe/Berlin' })
  })

  it('should substitute arguments inside package rules', () => {
    const { config } = resolveConfig({ extends: [':disableDependency(left-pad)'] })
    expect(config.packageRules).toEqual([{ matchPackageNames: ['left-pad'], enabled: false }])
  })

  it('should fail when an argument is missing', () => {
    expect(() => resolveConfig({ extends: [':label'] })).toThrow('Preset :label requires argument arg0')
  })

  it('should validate preset bodies after substitution', () => {
    expect(() => resolveConfig({ extends: [':timezone(Atlantis/Capital)'] })).toThrow(ConfigValidationError)
  })

  it('should append document rules after preset rules', () => {
    const { config } = resolveConfig({
      extends: [':automergeMinor'],
      packageRules: [{ matchPackageNames: ['tokio'], automerge: false }],
    })

    expect(config.packageRules).toEqual([
      { matchUpdateTypes: ['minor', 'patch'], automerge: true },
      { matchPackageNames: ['tokio'], automerge: false },
    ])
  })

  it('should throw for unknown built-in presets', () => {
    expect(() => resolveConfig({ extends: [':doesNotExist'] })).toThrow('Unknown preset: :doesNotExist')
  })

  it('should collect unknown presets when allowed', () => {
    const result = resolveConfig({ extends: [':doesNotExist', 'schedule:weekly'] }, { allowUnknown: true })
    expect(result.unresolved).toEqual([':doesNotExist'])
    expect(result.config).toEqual({ schedule: ['before 4am on monday'] })
  })

  it('should leave external presets unresolved unless supplied', () => {
    const external = 'github>acme/renovate-config'
    expect(resolveConfig({ extends: [external] }).unresolved).toEqual([external])

    const supplied = resolveConfig({ extends: [external] }, { presets: { [external]: { labels: ['dependencies'] } } })
    expect(supplied.unresolved).toEqual([])
    expect(supplied.resolved).toEqual([external])
    expect(supplied.config).toEqual({ labels: ['dependencies'] })
  })

  it('should let supplied presets take arguments', () => {
    const { config } = resolveConfig(
      { extends: ['local>team/area(backend)'] },
      { presets: { 'local>team/area': { addLabels: ['A-{{arg0}}'] } } },
    )
    expect(config).toEqual({ addLabels: ['A-backend'] })
  })

  it('should detect cycles', () => {
    const presets = {
      'local>a': { extends: ['local>b'] },
      'local>b': { extends: ['local>a'] },
    }

    expect(() => resolveConfig({ extends: ['local>a'] }, { presets })).toThrow(PresetResolutionError)
    expect(() => resolveConfig({ extends: ['local>a'] }, { presets })).toThrow('Preset cycle: local>a -> local>b -> local>a')
  })
})
