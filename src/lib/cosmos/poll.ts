import { PollConfig } from '../config'
import { PollTimeoutError, TxExecuteError } from '../errors'
import { TxRecord } from '../schemas'
import { getLogger, sleep } from '../utils/index'
import { Cmd, NodeAddress, TxId } from './cmd'

/** What the pollers need from a network */
export interface Queryable {
  command(): Cmd
  nodeAddress(): Promise<NodeAddress>
}

/**
 * Polling is unbounded unless a call site sets `maxAttempts` or `timeoutMs`.
 */
export type PollOptions = {
  intervalMs?: number
  maxAttempts?: number
  timeoutMs?: number
}

export type BlockPollOptions = PollOptions & {
  /** interval while waiting for the height to advance, after the node became reachable */
  progressIntervalMs?: number
}

const log = getLogger()

export const txPollIntervalMs = 250
export const blockPollIntervalMs = 500

export function txPollOptions(config: PollConfig): PollOptions {
  return { intervalMs: config.TxIntervalMs, maxAttempts: config.MaxAttempts, timeoutMs: config.TimeoutMs }
}

/** Unreachable nodes are polled at the tx interval, progress at the block interval */
export function blockPollOptions(config: PollConfig): BlockPollOptions {
  return { ...txPollOptions(config), progressIntervalMs: config.BlockIntervalMs }
}

class Budget {
  private attempts = 0
  private readonly startedAt = Date.now()

  constructor(
    private readonly what: string,
    private readonly opts: PollOptions
  ) {}

  /** Count one attempt, throwing when the budget is spent */
  spend() {
    this.attempts++
    const elapsed = Date.now() - this.startedAt
    const tooMany = this.opts.maxAttempts !== undefined && this.attempts > this.opts.maxAttempts
    const tooLong = this.opts.timeoutMs !== undefined && elapsed > this.opts.timeoutMs
    if (tooMany || tooLong) throw new PollTimeoutError(this.what, this.attempts - 1, elapsed)
  }
}

/**
 * Query the transaction until the node has included it. A record with a non-zero code means the
 * transaction was included but rejected.
 */
export async function waitForTx(network: Queryable, id: TxId, opts: PollOptions = {}): Promise<TxRecord> {
  const node = await network.nodeAddress()
  const interval = opts.intervalMs ?? txPollIntervalMs
  const budget = new Budget(`transaction ${id}`, opts)

  for (;;) {
    budget.spend()
    const record = await network.command().query(node).tx(id)
    if (record) {
      if (record.code > 0) throw new TxExecuteError(record.raw_log)
      return record
    }
    log.debug(`transaction ${id} not found on ${node}, retrying in ${interval}ms`)
    await sleep(interval)
  }
}

/**
 * Wait until the node answers, then until it produces a block past the height it first reported.
 * Returns the new height.
 */
export async function waitForBlocks(network: Queryable, opts: BlockPollOptions = {}): Promise<number> {
  const node = await network.nodeAddress()
  const interval = opts.intervalMs ?? txPollIntervalMs
  const progressInterval = opts.progressIntervalMs ?? blockPollIntervalMs
  const budget = new Budget(`blocks on ${node}`, opts)

  let start: number | undefined
  for (;;) {
    budget.spend()
    const status = await network.command().query(node).status()
    if (start === undefined) {
      if (status) {
        start = status.latestBlockHeight
        await sleep(progressInterval)
      } else {
        log.debug(`${node} refused the connection, retrying in ${interval}ms`)
        await sleep(interval)
      }
      continue
    }
    // refused connections after the first answer are retried as well
    if (status && status.latestBlockHeight > start) return status.latestBlockHeight
    log.debug(
      status
        ? `${node} still at height ${status.latestBlockHeight}, retrying in ${progressInterval}ms`
        : `${node} refused the connection, retrying in ${progressInterval}ms`
    )
    await sleep(progressInterval)
  }
}
