import type { UpdateType } from './types'

const SEMVER_REGEX = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-z-][0-9a-z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-z-][0-9a-z-]*))*))?(?:\+([0-9a-z-]+(?:\.[0-9a-z-]+)*))?$/i

const PARTIAL_REGEX = /^(\d+|[x*])(?:\.(\d+|[x*]))?(?:\.(\d+|[x*]))?(?:-([0-9a-z.-]+))?(?:\+[0-9a-z.-]+)?$/i

/**
 * Semantic version with comparison by SemVer precedence
 */
export class SemVer {
  major: number
  minor: number
  patch: number
  prerelease: string[]
  build: string[]
  version: string

  constructor(version: string) {
    // Remove v prefix if present
    if (version.startsWith('v')) {
      version = version.slice(1)
    }

    const match = version.match(SEMVER_REGEX)

    if (!match) {
      throw new Error(`Invalid version: ${version}`)
    }

    this.major = Number.parseInt(match[1], 10)
    this.minor = Number.parseInt(match[2], 10)
    this.patch = Number.parseInt(match[3], 10)
    this.prerelease = match[4] ? match[4].split('.') : []
    this.build = match[5] ? match[5].split('.') : []
    this.version = version
  }

  /**
   * Returns -1, 0 or 1. Build metadata is ignored.
   */
  compare(other: SemVer): -1 | 0 | 1 {
    const main = compareNumbers(this.major, other.major)
      || compareNumbers(this.minor, other.minor)
      || compareNumbers(this.patch, other.patch)
    if (main !== 0)
      return main

    // A release has higher precedence than any of its prereleases
    if (this.prerelease.length === 0 && other.prerelease.length === 0)
      return 0
    if (this.prerelease.length === 0)
      return 1
    if (other.prerelease.length === 0)
      return -1

    const length = Math.max(this.prerelease.length, other.prerelease.length)
    for (let i = 0; i < length; i++) {
      const a = this.prerelease[i]
      const b = other.prerelease[i]
      if (a === undefined)
        return -1
      if (b === undefined)
        return 1
      const result = compareIdentifiers(a, b)
      if (result !== 0)
        return result
    }
    return 0
  }

  toString(): string {
    let versionStr = `${this.major}.${this.minor}.${this.patch}`
    if (this.prerelease.length > 0) {
      versionStr += `-${this.prerelease.join('.')}`
    }
    return versionStr
  }
}

function compareNumbers(a: number, b: number): -1 | 0 | 1 {
  if (a === b)
    return 0
  return a > b ? 1 : -1
}

function compareIdentifiers(a: string, b: string): -1 | 0 | 1 {
  const aNumeric = /^\d+$/.test(a)
  const bNumeric = /^\d+$/.test(b)
  if (aNumeric && bNumeric)
    return compareNumbers(Number.parseInt(a, 10), Number.parseInt(b, 10))
  if (aNumeric)
    return -1
  if (bNumeric)
    return 1
  if (a === b)
    return 0
  return a > b ? 1 : -1
}

/**
 * Parse a version, filling missing minor/patch components with zero (`1.2` → `1.2.0`)
 */
export function parseVersion(versionStr: string): SemVer | null {
  if (!versionStr || typeof versionStr !== 'string')
    return null

  const trimmed = versionStr.trim().replace(/^[v=]/, '')
  const partial = parsePartial(trimmed)
  if (!partial || partial.major === undefined)
    return null

  const prerelease = partial.prerelease ? `-${partial.prerelease}` : ''
  try {
    return new SemVer(`${partial.major}.${partial.minor ?? 0}.${partial.patch ?? 0}${prerelease}`)
  }
  catch {
    return null
  }
}

/**
 * Check if a string is a valid, complete semver version
 */
export function isValidVersion(version: string): boolean {
  try {
    const _ = new SemVer(version)
    return true
  }
  catch {
    return false
  }
}

/**
 * Classify a version change. The highest changed component decides; a change
 * in the prerelease part only counts as a patch.
 */
export function classifyUpdate(currentVersion: string, newVersion: string): UpdateType | null {
  const current = parseVersion(currentVersion)
  const next = parseVersion(newVersion)
  if (!current || !next)
    return null

  const order = next.compare(current)
  if (order === 0)
    return null
  if (order < 0)
    return 'rollback'

  if (next.major !== current.major)
    return 'major'
  if (next.minor !== current.minor)
    return 'minor'
  return 'patch'
}

interface PartialVersion {
  major?: number
  minor?: number
  patch?: number
  prerelease?: string
}

function parsePartial(input: string): PartialVersion | null {
  const match = input.match(PARTIAL_REGEX)
  if (!match)
    return null

  const component = (value: string | undefined): number | undefined =>
    value === undefined || /^[x*]$/i.test(value) ? undefined : Number.parseInt(value, 10)

  const major = component(match[1])
  const minor = major === undefined ? undefined : component(match[2])
  const patch = minor === undefined ? undefined : component(match[3])

  return {
    major,
    minor,
    patch,
    prerelease: patch === undefined ? undefined : match[4],
  }
}

type Operator = '<' | '<=' | '>' | '>=' | '='

interface Comparator {
  operator: Operator
  version: SemVer
}

/** Comparators in one set are AND-ed, sets are OR-ed */
export type Range = Comparator[][]

function bound(operator: Operator, major: number, minor: number, patch: number, prerelease?: string): Comparator {
  return { operator, version: new SemVer(`${major}.${minor}.${patch}${prerelease ? `-${prerelease}` : ''}`) }
}

function expandComparator(token: string, range: string): Comparator[] {
  const match = token.match(/^(\^|~|>=|<=|>|<|=)?\s*v?(.+)$/)
  if (!match)
    throw new Error(`Invalid range: ${range}`)

  const operator = match[1] ?? ''
  const partial = parsePartial(match[2])
  if (!partial)
    throw new Error(`Invalid range: ${range}`)

  const { major, minor, patch, prerelease } = partial

  if (major === undefined) {
    // `*`, `x`, `>=*` all match everything; `<*` and `>*` match nothing
    if (operator === '<' || operator === '>')
      return [bound('<', 0, 0, 0, '0')]
    return []
  }

  switch (operator) {
    case '^':
      if (major > 0 || minor === undefined)
        return [bound('>=', major, minor ?? 0, patch ?? 0, prerelease), bound('<', major + 1, 0, 0)]
      if (minor > 0 || patch === undefined)
        return [bound('>=', 0, minor, patch ?? 0, prerelease), bound('<', 0, minor + 1, 0)]
      return [bound('>=', 0, 0, patch, prerelease), bound('<', 0, 0, patch + 1)]

    case '~':
      if (minor === undefined)
        return [bound('>=', major, 0, 0), bound('<', major + 1, 0, 0)]
      return [bound('>=', major, minor, patch ?? 0, prerelease), bound('<', major, minor + 1, 0)]

    case '>=':
      return [bound('>=', major, minor ?? 0, patch ?? 0, prerelease)]

    case '>':
      if (minor === undefined)
        return [bound('>=', major + 1, 0, 0)]
      if (patch === undefined)
        return [bound('>=', major, minor + 1, 0)]
      return [bound('>', major, minor, patch, prerelease)]

    case '<':
      return [bound('<', major, minor ?? 0, patch ?? 0, prerelease)]

    case '<=':
      if (minor === undefined)
        return [bound('<', major + 1, 0, 0)]
      if (patch === undefined)
        return [bound('<', major, minor + 1, 0)]
      return [bound('<=', major, minor, patch, prerelease)]

    default:
      // Bare or `=` versions, where missing components act as wildcards
      if (minor === undefined)
        return [bound('>=', major, 0, 0), bound('<', major + 1, 0, 0)]
      if (patch === undefined)
        return [bound('>=', major, minor, 0), bound('<', major, minor + 1, 0)]
      return [bound('=', major, minor, patch, prerelease)]
  }
}

/**
 * Parse a range such as `>=1.2.0 <2`, `^1.4 || ~2.1.0` or `1.x`
 */
export function parseRange(range: string): Range {
  const trimmed = range.trim()
  if (trimmed === '')
    return [[]]

  return trimmed.split('||').map((set) => {
    // Allow `>= 1.0.0` by gluing operators to their operand
    const tokens = set.trim().replace(/(\^|~|>=|<=|>|<|=)\s+/g, '$1').split(/\s+/).filter(Boolean)
    if (tokens.length === 0)
      throw new Error(`Invalid range: ${range}`)
    return tokens.flatMap((token) => {
      try {
        return expandComparator(token, range)
      }
      catch {
        throw new Error(`Invalid range: ${range}`)
      }
    })
  })
}

export function isValidRange(range: string): boolean {
  try {
    parseRange(range)
    return true
  }
  catch {
    return false
  }
}

function testComparator(version: SemVer, { operator, version: target }: Comparator): boolean {
  const order = version.compare(target)
  switch (operator) {
    case '<':
      return order < 0
    case '<=':
      return order <= 0
    case '>':
      return order > 0
    case '>=':
      return order >= 0
    case '=':
      return order === 0
  }
}

/**
 * Test a version against a range. Unparsable versions never satisfy;
 * an invalid range throws.
 */
export function satisfiesRange(version: string, range: string | Range): boolean {
  const parsedRange = typeof range === 'string' ? parseRange(range) : range
  const parsed = parseVersion(version)
  if (!parsed)
    return false

  return parsedRange.some(set => set.every(comparator => testComparator(parsed, comparator)))
}
