/* eslint-disable no-console */

export const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  question: '?',
  search: '🔍',
  package: '📦',
  memo: '📝',
  tag: '🏷️',
  clock: '🕒',
}

export const colors = {
  green: (text: string) => `\x1B[32m${text}\x1B[0m`,
  red: (text: string) => `\x1B[31m${text}\x1B[0m`,
  yellow: (text: string) => `\x1B[33m${text}\x1B[0m`,
  blue: (text: string) => `\x1B[34m${text}\x1B[0m`,
  gray: (text: string) => `\x1B[90m${text}\x1B[0m`,
  bold: (text: string) => `\x1B[1m${text}\x1B[0m`,
  italic: (text: string) => `\x1B[3m${text}\x1B[0m`,
}

/**
 * Step logger for CLI progress lines
 */
export function logStep(emoji: string, message: string): void {
  console.log(`${emoji} ${message}`)
}

/**
 * Lower-case, dash-separated form of a name usable in a branch
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/^@/, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

export function unique<T>(values: T[]): T[] {
  return [...new Set(values)]
}

/**
 * Parse a `/pattern/flags` string. Returns null for strings in any other form
 * and throws for a malformed expression.
 */
export function parseRegexPattern(pattern: string): RegExp | null {
  const match = pattern.match(/^\/(.+)\/([dgimsuy]*)$/)
  if (!match)
    return null

  try {
    // Stateful flags would make repeated `test` calls alternate
    return new RegExp(match[1], match[2].replace(/[gy]/g, ''))
  }
  catch (error) {
    throw new Error(`Invalid regular expression ${pattern}: ${error instanceof Error ? error.message : String(error)}`)
  }
}

export function isRegexPattern(pattern: string): boolean {
  return /^\/.+\/[dgimsuy]*$/.test(pattern)
}

/**
 * Last value given for a long flag, exactly as written (`--flag value` or
 * `--flag=value`). Arguments after `--` are not options.
 */
export function findOptionValue(argv: string[], flag: string): string | undefined {
  let value: string | undefined
  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index]
    if (arg === '--')
      break
    if (arg === flag && index + 1 < argv.length)
      value = argv[++index]
    else if (arg.startsWith(`${flag}=`))
      value = arg.slice(flag.length + 1)
  }
  return value
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
