import { describe, expect, it } from 'vitest'
import { classifyUpdate, isValidRange, isValidVersion, parseRange, parseVersion, satisfiesRange, SemVer } from '../src/versioning'

describe('SemVer', () => {
  it('should parse versions with a v prefix, prerelease and build metadata', () => {
    const version = new SemVer('v1.2.3-beta.4+build.5')
    expect(version.major).toBe(1)
    expect(version.minor).toBe(2)
    expect(version.patch).toBe(3)
    expect(version.prerelease).toEqual(['beta', '4'])
    expect(version.build).toEqual(['build', '5'])
    expect(version.toString()).toBe('1.2.3-beta.4')
  })

  it('should reject invalid versions', () => {
    expect(() => new SemVer('1.2')).toThrow('Invalid version: 1.2')
    expect(isValidVersion('01.2.3')).toBe(false)
    expect(isValidVersion('1.2.3')).toBe(true)
  })

  it('should order by precedence', () => {
    const ordered = ['1.0.0-alpha', '1.0.0-alpha.1', '1.0.0-alpha.beta', '1.0.0-beta', '1.0.0-beta.2', '1.0.0-beta.11', '1.0.0-rc.1', '1.0.0']
    for (let i = 1; i < ordered.length; i++) {
      expect(new SemVer(ordered[i - 1]).compare(new SemVer(ordered[i]))).toBe(-1)
      expect(new SemVer(ordered[i]).compare(new SemVer(ordered[i - 1]))).toBe(1)
    }
  })

  it('should ignore build metadata when comparing', () => {
    expect(new SemVer('1.0.0+a').compare(new SemVer('1.0.0+b'))).toBe(0)
  })
})

describe('parseVersion', () => {
  it('should fill missing components with zero', () => {
    expect(parseVersion('2')?.toString()).toBe('2.0.0')
    expect(parseVersion('v1.4')?.toString()).toBe('1.4.0')
  })

  it('should return null for wildcards and garbage', () => {
    expect(parseVersion('x')).toBeNull()
    expect(parseVersion('latest')).toBeNull()
    expect(parseVersion('')).toBeNull()
  })
})

describe('classifyUpdate', () => {
  it('should classify by the highest changed component', () => {
    expect(classifyUpdate('1.2.3', '2.0.0')).toBe('major')
    expect(classifyUpdate('1.2.3', '1.3.0')).toBe('minor')
    expect(classifyUpdate('1.2.3', '1.2.4')).toBe('patch')
    expect(classifyUpdate('0.3.1', '0.4.0')).toBe('minor')
  })

  it('should treat prerelease-only changes as patch', () => {
    expect(classifyUpdate('1.0.0-beta.1', '1.0.0')).toBe('patch')
    expect(classifyUpdate('1.0.0-beta.1', '1.0.0-beta.2')).toBe('patch')
  })

  it('should detect rollbacks', () => {
    expect(classifyUpdate('2.1.0', '2.0.9')).toBe('rollback')
  })

  it('should return null for equal or unparsable versions', () => {
    expect(classifyUpdate('1.0.0', 'v1.0.0')).toBeNull()
    expect(classifyUpdate('main', '1.0.0')).toBeNull()
  })
})

describe('satisfiesRange', () => {
  it('should handle comparison operators', () => {
    expect(satisfiesRange('1.5.0', '>=1.0.0')).toBe(true)
    expect(satisfiesRange('0.9.9', '>=1.0.0')).toBe(false)
    expect(satisfiesRange('1.9.9', '<2')).toBe(true)
    expect(satisfiesRange('2.0.0', '<2')).toBe(false)
    expect(satisfiesRange('1.2.9', '<=1.2')).toBe(true)
    expect(satisfiesRange('1.3.0', '<=1.2')).toBe(false)
    expect(satisfiesRange('1.9.0', '>1')).toBe(false)
    expect(satisfiesRange('2.0.0', '>1')).toBe(true)
  })

  it('should handle caret ranges', () => {
    expect(satisfiesRange('1.9.0', '^1.2.0')).toBe(true)
    expect(satisfiesRange('2.0.0', '^1.2.0')).toBe(false)
    expect(satisfiesRange('0.2.5', '^0.2.3')).toBe(true)
    expect(satisfiesRange('0.3.0', '^0.2.3')).toBe(false)
    expect(satisfiesRange('0.0.4', '^0.0.3')).toBe(false)
  })

  it('should handle tilde and x-ranges', () => {
    expect(satisfiesRange('1.2.9', '~1.2.0')).toBe(true)
    expect(satisfiesRange('1.3.0', '~1.2.0')).toBe(false)
    expect(satisfiesRange('1.7.2', '1.x')).toBe(true)
    expect(satisfiesRange('2.0.0', '1.x')).toBe(false)
    expect(satisfiesRange('4.5.6', '*')).toBe(true)
  })

  it('should AND comparators and OR sets', () => {
    expect(satisfiesRange('1.5.0', '>= 1.0.0 < 2.0.0')).toBe(true)
    expect(satisfiesRange('2.5.0', '>=1.0.0 <2.0.0')).toBe(false)
    expect(satisfiesRange('3.1.0', '^1.0.0 || ^3.0.0')).toBe(true)
  })

  it('should never match unparsable versions', () => {
    expect(satisfiesRange('latest', '*')).toBe(false)
  })

  it('should reject invalid ranges', () => {
    expect(() => parseRange('>=abc')).toThrow('Invalid range: >=abc')
    expect(isValidRange('^1.2.0')).toBe(true)
    expect(isValidRange('1.2.3 ||')).toBe(false)
  })
})
