import { describe, expect, it } from 'vitest'
import { ConfigValidationError } from '../src/errors'
import { safeValidateConfig, validateConfig } from '../src/schema'

describe('validateConfig', () => {
  it('should accept a complete document', () => {
    const input = {
      $schema: 'https://docs.renovatebot.com/renovate-schema.json',
      extends: ['config:recommended'],
      timezone: 'Europe/Berlin',
      semanticCommits: 'disabled',
      prConcurrentLimit: 0,
      prHourlyLimit: 2,
      lockFileMaintenance: { enabled: true, schedule: ['before 4am on monday'] },
      packageRules: [
        { matchCategories: ['js'], labels: ['A-frontend'] },
        { matchPackageNames: ['@embroider/*'], groupName: 'embroider', groupSlug: 'embroider' },
      ],
    }

    expect(validateConfig(input)).toEqual(input)
  })

  it('should reject unknown keys', () => {
    const result = safeValidateConfig({ packageRules: [{ matchPackageName: ['serde'] }] })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.issues).toHaveLength(1)
      expect(result.issues[0].path).toBe('packageRules.0')
      expect(result.issues[0].message).toContain('matchPackageName')
    }
  })

  it('should report dotted paths for nested issues', () => {
    const result = safeValidateConfig({ packageRules: [{}, {}, { matchUpdateTypes: ['huge'] }] })
    expect(result.success).toBe(false)
    if (!result.success)
      expect(result.issues.map(issue => issue.path)).toEqual(['packageRules.2.matchUpdateTypes.0'])
  })

  it('should reject invalid limits and timezones', () => {
    const result = safeValidateConfig({ prConcurrentLimit: -1, prHourlyLimit: 1.5, timezone: 'Nowhere/Special' })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.issues).toEqual([
        { path: 'timezone', message: 'must be a valid IANA timezone' },
        { path: 'prConcurrentLimit', message: 'must be 0 (no limit) or a positive integer' },
        { path: 'prHourlyLimit', message: 'must be an integer' },
      ])
    }
  })

  it('should require groupName alongside groupSlug', () => {
    const result = safeValidateConfig({ packageRules: [{ matchCategories: ['js'], groupSlug: 'frontend' }] })
    expect(result.success).toBe(false)
    if (!result.success)
      expect(result.issues).toEqual([{ path: 'packageRules.0.groupSlug', message: 'groupSlug requires groupName' }])
  })

  it('should throw ConfigValidationError naming the source', () => {
    expect(() => validateConfig({ extends: 'config:recommended' }, 'renovate.json')).toThrow(ConfigValidationError)

    try {
      validateConfig({ enabled: 'yes' }, 'renovate.json')
    }
    catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError)
      if (error instanceof ConfigValidationError) {
        expect(error.message.startsWith('Invalid configuration in renovate.json:\n  enabled: ')).toBe(true)
        expect(error.issues.map(issue => issue.path)).toEqual(['enabled'])
      }
    }
  })

  it('should reject a document that is not an object', () => {
    expect(safeValidateConfig(['config:recommended']).success).toBe(false)
  })
})
