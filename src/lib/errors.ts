/**
 * Every error raised by the library derives from DevnetError so callers can tell them apart from
 * programming errors with a single instanceof check.
 */
export class DevnetError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined)
    this.name = new.target.name
  }
}

/** A spawned program could not be started or exited with a non-zero status */
export class CommandError extends DevnetError {
  readonly program: string
  readonly args: readonly string[]
  readonly exitCode: number | null
  readonly stderr: string

  constructor(program: string, args: readonly string[], exitCode: number | null, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || `exit code ${exitCode}`
    super(`${program} ${args.slice(0, 3).join(' ')} failed: ${detail}`, cause)
    this.program = program
    this.args = args
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

/** stdout of a command was not the JSON or text we expected */
export class ParseError extends DevnetError {
  readonly input: string

  constructor(message: string, input: string, cause?: unknown) {
    super(message, cause)
    this.input = input
  }
}

/** hex or protobuf decoding of a transaction payload failed */
export class DecodeError extends DevnetError {}

/**
 * A transaction was rejected, either at broadcast or once included in a block.
 * The message is the raw log reported by the node.
 */
export class TxExecuteError extends DevnetError {
  readonly rawLog: string

  constructor(rawLog: string) {
    super(rawLog)
    this.rawLog = rawLog
  }
}

export class NoSignerError extends DevnetError {
  constructor(network: string) {
    super(`no signing key available on network ${network}`)
  }
}

export class ExpectedAtLeastOneMsgResponseError extends DevnetError {
  constructor() {
    super('expected at least one message response in the transaction data')
  }
}

export class MnemonicError extends DevnetError {}

export class PollTimeoutError extends DevnetError {
  readonly attempts: number

  constructor(what: string, attempts: number, elapsedMs: number) {
    super(`gave up waiting for ${what} after ${attempts} attempt(s) in ${elapsedMs}ms`)
    this.attempts = attempts
  }
}

export class UnsupportedOperationError extends DevnetError {
  constructor(network: string, operation: string) {
    super(`network ${network} does not support ${operation}`)
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
