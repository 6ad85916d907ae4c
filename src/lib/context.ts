import { defaultConfig, defaultRoot, DevnetConfig } from './config'
import { CommandRunner, ProcessSpawner, ZxRunner, ZxSpawner } from './process'
import { configureLogger, Logger, path } from './utils/index'

/**
 * Everything a network needs from its surroundings: where state lives, where commands run and how
 * processes are spawned. Tests swap the runner and spawner for in-process fakes.
 */
export type DevnetContext = {
  /** root of all persisted state */
  root: string
  /** working directory mounted into containers and used for relative contract paths */
  cwd: string
  config: DevnetConfig
  runner: CommandRunner
  spawner: ProcessSpawner
  log: Logger
}

export type ContextOptions = Partial<DevnetContext>

export function createContext(opts: ContextOptions = {}): DevnetContext {
  const cwd = opts.cwd ?? process.cwd()
  const config = opts.config ?? defaultConfig()
  const log = opts.log ?? configureLogger(config.Logger)
  return {
    root: path.resolve(cwd, opts.root ?? defaultRoot(cwd)),
    cwd,
    config,
    runner: opts.runner ?? new ZxRunner(log),
    spawner: opts.spawner ?? new ZxSpawner(log),
    log
  }
}

export function rootPath(ctx: DevnetContext, ...relativePaths: string[]): string {
  return path.join(ctx.root, ...relativePaths)
}
