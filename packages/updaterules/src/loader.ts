import type { LoadedConfig } from './types'
import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { basename, join, resolve } from 'node:path'
import JSON5 from 'json5'
import { validateConfig } from './schema'
import { errorMessage } from './utils'

/**
 * File names searched for a configuration document, in priority order
 */
export const CONFIG_FILE_NAMES = [
  'renovate.json',
  'renovate.json5',
  '.github/renovate.json',
  '.github/renovate.json5',
  '.gitlab/renovate.json',
  '.gitlab/renovate.json5',
  '.renovaterc',
  '.renovaterc.json',
  '.renovaterc.json5',
]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse document text. Every supported file is read as JSON5, which also
 * accepts plain JSON.
 */
export function parseConfigText(text: string, fileName: string): unknown {
  try {
    return JSON5.parse(text)
  }
  catch (error) {
    throw new Error(`Failed to parse ${fileName}: ${errorMessage(error)}`)
  }
}

async function readPackageJsonConfig(path: string): Promise<unknown> {
  const parsed = parseConfigText(await readFile(path, 'utf-8'), path)
  return isRecord(parsed) ? parsed.renovate : undefined
}

/**
 * Find the configuration document in a directory, falling back to the
 * `renovate` key of package.json. Returns null when there is none.
 */
export async function findConfigFile(cwd: string): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name)
    if (existsSync(candidate))
      return candidate
  }

  const packageJson = join(cwd, 'package.json')
  if (existsSync(packageJson)) {
    try {
      if (await readPackageJsonConfig(packageJson) !== undefined)
        return packageJson
    }
    catch {
      // an unreadable package.json is not a configuration source
    }
  }

  return null
}

/**
 * Read, parse and validate a configuration document
 */
export async function loadConfigFile(path: string): Promise<LoadedConfig> {
  const fullPath = resolve(path)

  let text: string
  try {
    text = await readFile(fullPath, 'utf-8')
  }
  catch (error) {
    throw new Error(`Failed to read ${fullPath}: ${errorMessage(error)}`)
  }

  let document = parseConfigText(text, fullPath)

  if (basename(fullPath) === 'package.json') {
    document = isRecord(document) ? document.renovate : undefined
    if (document === undefined)
      throw new Error(`No "renovate" key found in ${fullPath}`)
  }

  return {
    path: fullPath,
    config: validateConfig(document, fullPath),
  }
}
