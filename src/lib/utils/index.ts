import fs from 'fs'
import yaml from 'js-yaml'
import * as path from 'path'
import toml from '@iarna/toml'

export { path, fs }
export { configureLogger, createLogger, getLogger, getTestingLogger, isLevel, levels } from './logger'
export type { Logger, Level } from './logger'
export { Once } from './once'

/** Expand the first ~ to the user home dir in a path. Throw and error if no $HOME env var is set */
export function expandUserHomeDir(p: string): string {
  const home = () => {
    if (process.env.HOME === undefined) throw new Error('cannot expand user home dir ~')
    return process.env.HOME
  }
  if (/^~/.test(p)) return p.replace(/^~/, home())
  if (/^\$HOME/.test(p)) return p.replace(/^\$HOME/, home())
  return p
}

/** Given a list of dir paths, return an absolute path.
 * Same behavior as NodeJS path.resolve except that each path component is expanded with user home dir where applicable.
 */
export function resolveToAbsDir(...dirPaths: string[]): string {
  const expanded = dirPaths.map(expandUserHomeDir)
  return path.resolve(...expanded)
}

/** Recursively delete a directory and its children if the directory/children exist.
 * Also works for a regular file. Behavior similar to `rm -rf`
 */
export function rmDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
}

/** Ensure a directory exists. Create if necessary.
 * If recursive = true, then behavior similar to mkdir -p /parent/folder/will/be/created
 */
export function ensureDir(dir: string, recursive: boolean = false): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: recursive })
  }
  return dir
}

export function pathExists(...paths: string[]): boolean {
  return paths.every((p) => fs.existsSync(p))
}

export function readYamlFile(filepath: string): unknown {
  return yaml.load(fs.readFileSync(filepath, 'utf-8'))
}

export function dumpToml(obj: toml.JsonMap): string {
  return toml.stringify(obj)
}

export function dumpTomlToFile(filepath: string, obj: toml.JsonMap) {
  fs.writeFileSync(filepath, dumpToml(obj))
}

export function readTomlFile(filepath: string): toml.JsonMap {
  return toml.parse(fs.readFileSync(filepath, 'utf-8'))
}

export type Replacement = readonly [pattern: string, replacement: string]

/**
 * Replace every occurrence of each pattern in a text file, in the order given, and write it back.
 * Patterns are matched literally.
 */
export function findAndReplaceInFile(filepath: string, replacements: readonly Replacement[]) {
  let content = fs.readFileSync(filepath, 'utf-8')
  for (const [pattern, replacement] of replacements) {
    content = content.split(pattern).join(replacement)
  }
  fs.writeFileSync(filepath, content)
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
