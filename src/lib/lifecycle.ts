import fs from 'fs'
import { StringDecoder } from 'string_decoder'
import { Writable } from 'stream'
import { ChildProcessHandle, CommandRunner, describe, Invocation, ProcessSpawner } from './process'
import { errorMessage } from './errors'
import { Logger, path, sleep } from './utils/index'

/**
 * Ownership of one or more running processes or containers. While a handle is alive its processes
 * may be assumed running; `release` terminates them. Exactly one owner releases a handle.
 */
export interface LifecycleHandle {
  /** Follow the main log until interrupted. Does not terminate anything. */
  intoForeground(): Promise<void>
  /** Terminate everything owned by this handle. Errors are logged, never thrown. Idempotent. */
  release(): Promise<void>
}

/** Run `fn` with the handle and release it on every exit path */
export async function withHandle<T>(handle: LifecycleHandle, fn: (handle: LifecycleHandle) => Promise<T>): Promise<T> {
  try {
    return await fn(handle)
  } finally {
    await handle.release()
  }
}

/** Resolves on the next SIGINT. While waiting, SIGINT no longer kills the process. */
export function interrupted(): Promise<void> {
  return new Promise((resolve) => process.once('SIGINT', () => resolve()))
}

/**
 * Copy a growing file to `out` line by line until `stop` resolves. Lines already in the file are
 * written first.
 */
export async function followFile(filepath: string, out: Writable, stop: Promise<void>, intervalMs = 250) {
  let stopped = false
  const stopping = stop.then(() => {
    stopped = true
  })
  const file = await fs.promises.open(filepath, 'r')
  try {
    let position = 0
    let partial = ''
    const decoder = new StringDecoder('utf-8')
    const buffer = Buffer.alloc(64 * 1024)
    for (;;) {
      const { bytesRead } = await file.read(buffer, 0, buffer.length, position)
      if (bytesRead > 0) {
        position += bytesRead
        const lines = (partial + decoder.write(buffer.subarray(0, bytesRead))).split('\n')
        partial = lines.pop() ?? ''
        for (const line of lines) out.write(line + '\n')
        continue
      }
      if (stopped) break
      await Promise.race([sleep(intervalMs), stopping])
    }
    partial += decoder.end()
    if (partial.length > 0) out.write(partial + '\n')
  } finally {
    await file.close()
  }
}

export type ForegroundOptions = {
  out?: Writable
  stop?: Promise<void>
}

/** A child process started by a ProcessSpawner */
export class ProcessHandle implements LifecycleHandle {
  private released = false

  constructor(
    readonly child: ChildProcessHandle,
    readonly name: string,
    private readonly log: Logger,
    private readonly foreground: ForegroundOptions = {}
  ) {}

  get logfile(): string {
    return this.child.logfile
  }

  async intoForeground(): Promise<void> {
    this.log.info(`bringing ${this.name} to the foreground - following ${this.logfile}`)
    await followFile(this.logfile, this.foreground.out ?? process.stderr, this.foreground.stop ?? interrupted())
  }

  async release(): Promise<void> {
    if (this.released) return
    this.released = true
    try {
      await this.child.kill()
    } catch (e) {
      this.log.error(`${path.basename(this.logfile)} encountered an error: ${errorMessage(e)}`)
    }
  }
}

export type ContainerHandleOptions = {
  runner: CommandRunner
  spawner: ProcessSpawner
  log: Logger
  /** where `docker logs -f` is captured while in the foreground */
  logfile: string
} & ForegroundOptions

/** A detached docker container, stopped on release */
export class ContainerHandle implements LifecycleHandle {
  private released = false

  constructor(
    readonly container: string,
    private readonly opts: ContainerHandleOptions
  ) {}

  async intoForeground(): Promise<void> {
    const follow: Invocation = { program: 'docker', args: ['logs', '-f', this.container] }
    const logs = this.opts.spawner.spawn(follow, this.opts.logfile, 'overwrite')
    try {
      this.opts.log.info(`bringing container ${this.container} to the foreground`)
      await followFile(logs.logfile, this.opts.out ?? process.stderr, this.opts.stop ?? interrupted())
    } finally {
      await logs.kill()
    }
  }

  async release(): Promise<void> {
    if (this.released) return
    this.released = true
    const stop: Invocation = { program: 'docker', args: ['stop', this.container] }
    try {
      const out = await this.opts.runner.run(stop)
      if (out.exitCode !== 0) this.opts.log.error(`${describe(stop)} failed: ${out.stderr.trim()}`)
    } catch (e) {
      this.opts.log.error(`${describe(stop)} failed: ${errorMessage(e)}`)
    }
  }
}

/**
 * Several handles released together. The first one is the primary process whose log is followed in
 * the foreground.
 */
export class CompositeHandle implements LifecycleHandle {
  private readonly handles: LifecycleHandle[]

  constructor(
    primary: LifecycleHandle,
    others: LifecycleHandle[],
    private readonly log: Logger
  ) {
    this.handles = [primary, ...others]
  }

  async intoForeground(): Promise<void> {
    await this.handles[0].intoForeground()
  }

  /** Releases in reverse start order */
  async release(): Promise<void> {
    for (const handle of [...this.handles].reverse()) {
      try {
        await handle.release()
      } catch (e) {
        this.log.error(`failed to release a process: ${errorMessage(e)}`)
      }
    }
  }
}
