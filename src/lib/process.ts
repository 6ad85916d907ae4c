import { $, nothrow, ProcessOutput, ProcessPromise } from 'zx-cjs'
import { CommandError, errorMessage } from './errors'
import { Logger } from './utils/logger'

$.verbose = false

/** A single external program invocation. Nothing is run until it is handed to a runner. */
export type Invocation = {
  program: string
  args: string[]
  cwd?: string
  env?: Record<string, string>
  stdin?: string
}

export type CommandOutput = {
  stdout: string
  stderr: string
  exitCode: number | null
}

/**
 * Runs an invocation to completion and captures its output. Implementations resolve with a
 * non-zero exit code instead of throwing; callers classify failures themselves.
 */
export interface CommandRunner {
  run(invocation: Invocation): Promise<CommandOutput>
}

export type LogfileMode = 'overwrite' | 'append'

type Redirect = { logfile: string; mode: LogfileMode }

/** A long-running child process whose stdout and stderr go to a log file */
export interface ChildProcessHandle {
  readonly pid?: number
  readonly logfile: string
  /** Resolves with the exit code once the process is gone */
  readonly exited: Promise<number | null>
  kill(): Promise<void>
}

export interface ProcessSpawner {
  spawn(invocation: Invocation, logfile: string, mode: LogfileMode): ChildProcessHandle
}

export function describe(invocation: Invocation): string {
  return [invocation.program, ...invocation.args].map((a) => $.quote(a)).join(' ')
}

export function withArgs(invocation: Invocation, ...args: string[]): Invocation {
  return { ...invocation, args: [...invocation.args, ...args] }
}

/** Throw a CommandError unless the output is from a successful run */
export function checkOutput(invocation: Invocation, out: CommandOutput): CommandOutput {
  if (out.exitCode !== 0) {
    throw new CommandError(invocation.program, invocation.args, out.exitCode, out.stderr)
  }
  return out
}

/**
 * Start an invocation under the zx shell. The working directory and environment are set by the
 * command line itself; `exec` leaves the program as the shell's only process. Without stdin the
 * program reads from /dev/null. With a redirect, stdout and stderr go to the log file.
 */
function start(invocation: Invocation, redirect?: Redirect): ProcessPromise<ProcessOutput> {
  const cwd = invocation.cwd ?? process.cwd()
  const env = Object.entries(invocation.env ?? {}).map(([key, value]) => `${key}=${value}`)
  const argv = [invocation.program, ...invocation.args]
  if (redirect?.mode === 'overwrite') {
    return $`cd ${cwd} && exec env ${env} ${argv} </dev/null >${redirect.logfile} 2>&1`
  }
  if (redirect?.mode === 'append') {
    return $`cd ${cwd} && exec env ${env} ${argv} </dev/null >>${redirect.logfile} 2>&1`
  }
  if (invocation.stdin === undefined) {
    return $`cd ${cwd} && exec env ${env} ${argv} </dev/null`
  }
  return $`cd ${cwd} && exec env ${env} ${argv}`
}

export class ZxRunner implements CommandRunner {
  constructor(private readonly log: Logger) {}

  async run(invocation: Invocation): Promise<CommandOutput> {
    this.log.debug(describe(invocation))
    try {
      const proc = start(invocation)
      if (invocation.stdin !== undefined) {
        proc.stdin.write(invocation.stdin)
        proc.stdin.end()
      }
      const out = await nothrow(proc)
      this.log.debug(`exit code: ${out.exitCode}`)
      return { stdout: out.stdout, stderr: out.stderr, exitCode: out.exitCode }
    } catch (e) {
      throw new CommandError(invocation.program, invocation.args, null, errorMessage(e), e)
    }
  }
}

class ZxChildHandle implements ChildProcessHandle {
  readonly exited: Promise<number | null>
  private running = true

  constructor(
    private readonly proc: ProcessPromise<ProcessOutput>,
    readonly logfile: string
  ) {
    this.exited = nothrow(proc).then(
      (result) => {
        this.running = false
        return result.exitCode
      },
      () => {
        this.running = false
        return null
      }
    )
  }

  get pid(): number | undefined {
    return this.proc.child?.pid
  }

  /** zx signals the whole process tree, children of the program included */
  async kill() {
    if (!this.running) return
    await this.proc.kill('SIGTERM')
    await this.exited
  }
}

export class ZxSpawner implements ProcessSpawner {
  constructor(private readonly log: Logger) {}

  spawn(invocation: Invocation, logfile: string, mode: LogfileMode): ChildProcessHandle {
    this.log.debug(`${describe(invocation)} > ${logfile}`)
    return new ZxChildHandle(start(invocation, { logfile, mode }), logfile)
  }
}
