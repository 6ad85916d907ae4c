import { toHex, toUtf8 } from '@cosmjs/encoding'
import { z } from 'zod'
import { CommandError, ParseError, TxExecuteError } from '../errors'
import { Coin, formatCoins, Gas } from '../gas'
import { Key, KeyringBackend, rawKeySchema } from '../key'
import { checkOutput, CommandOutput, CommandRunner, Invocation, withArgs } from '../process'
import { CodeInfo, codeInfoSchema, NodeStatus, parseJson, statusSchema, TxRecord, txRecordSchema } from '../schemas'

export type TxId = string
export type ChainId = string
export type NodeAddress = string
export type CodeId = bigint
export type ContractAddress = string

const notFound = 'not found'
const connectionRefused = 'connection refused'

/**
 * Runs one invocation and returns its stdout. Some chain binaries print JSON on stderr, so stderr
 * is returned when stdout is empty.
 */
async function runChecked(runner: CommandRunner, invocation: Invocation): Promise<string> {
  const out = checkOutput(invocation, await runner.run(invocation))
  return out.stdout.trim().length > 0 ? out.stdout : out.stderr
}

function jsonOutput(out: CommandOutput): string {
  return out.stdout.trim().length > 0 ? out.stdout : out.stderr
}

/**
 * A chain binary invocation that has not been specialized yet. Each terminal method spawns exactly
 * one process.
 */
export class Cmd {
  constructor(
    readonly runner: CommandRunner,
    readonly invocation: Invocation
  ) {}

  /** The same command with extra arguments appended */
  args(...args: string[]): Cmd {
    return new Cmd(this.runner, withArgs(this.invocation, ...args))
  }

  /** Run as-is and return stdout */
  async run(): Promise<string> {
    return await runChecked(this.runner, this.invocation)
  }

  async listKeys(backend: KeyringBackend): Promise<Key[]> {
    const out = await this.args('keys', 'list', '--keyring-backend', backend, '--output', 'json').run()
    if (out.trim().length === 0) return []
    return parseJson(out, z.array(rawKeySchema), 'keys list').map((raw) => Key.fromRaw(raw, backend))
  }

  async addKey(name: string, backend: KeyringBackend): Promise<Key> {
    const out = await this.args('keys', 'add', name, '--keyring-backend', backend, '--output', 'json').run()
    return Key.fromRaw(parseJson(out, rawKeySchema, 'keys add'), backend)
  }

  /** Recover a key from its mnemonic, which is written to the process' stdin */
  async recoverKey(name: string, mnemonic: string, backend: KeyringBackend): Promise<Key> {
    const invocation = withArgs(
      this.invocation,
      'keys',
      'add',
      name,
      '--keyring-backend',
      backend,
      '--recover',
      '--output',
      'json'
    )
    const out = await runChecked(this.runner, { ...invocation, stdin: `${mnemonic}\n` })
    return Key.fromRaw(parseJson(out, rawKeySchema, 'keys add --recover'), backend)
  }

  async initChain(moniker: string, chainId: ChainId): Promise<void> {
    await this.args('init', moniker, '--chain-id', chainId).run()
  }

  async addGenesisAccount(key: Key, coins: readonly Coin[]): Promise<void> {
    await this.args('add-genesis-account', key.name, formatCoins(coins), '--keyring-backend', key.backend).run()
  }

  async gentx(key: Key, stake: Coin, chainId: ChainId, gas?: bigint): Promise<void> {
    const args = ['gentx', key.name, formatCoins([stake])]
    if (gas !== undefined) args.push('--gas', gas.toString())
    args.push('--chain-id', chainId, '--keyring-backend', key.backend)
    await this.args(...args).run()
  }

  async collectGentx(): Promise<void> {
    await this.args('collect-gentxs').run()
  }

  async validateGenesis(): Promise<void> {
    await this.args('validate-genesis').run()
  }

  /** Predict the address of a contract instantiated with `instantiate2` */
  async buildAddress(codeHash: string, creator: Key, salt: string): Promise<ContractAddress> {
    const out = await this.args('query', 'wasm', 'build-address', codeHash, creator.address, toHex(toUtf8(salt))).run()
    const address = out.trim().split(/\s+/)[0]
    if (!address) throw new ParseError('build-address: empty output', out)
    return address
  }

  tx(from: Key, chainId: ChainId, node: NodeAddress): TxCmd {
    return new TxCmd(this, from, chainId, node)
  }

  query(node: NodeAddress): QueryCmd {
    return new QueryCmd(this, node)
  }
}

/** A transaction being assembled for a signer on a chain */
export class TxCmd {
  constructor(
    private readonly cmd: Cmd,
    readonly from: Key,
    readonly chainId: ChainId,
    readonly node: NodeAddress
  ) {}

  private ready(...args: string[]): ReadyTxCmd {
    const signed = this.cmd.args(
      ...args,
      '--from',
      this.from.name,
      '--keyring-backend',
      this.from.backend,
      '--chain-id',
      this.chainId,
      '--node',
      this.node,
      '--yes'
    )
    return new ReadyTxCmd(signed)
  }

  wasmStore(wasmPath: string): ReadyTxCmd {
    return this.ready('tx', 'wasm', 'store', wasmPath)
  }

  wasmInstantiate(codeId: CodeId, label: string, msg: string, admin?: string): ReadyTxCmd {
    const args = ['tx', 'wasm', 'instantiate', codeId.toString(), msg, '--label', label]
    if (admin !== undefined) args.push('--admin', admin)
    else args.push('--no-admin')
    return this.ready(...args)
  }

  wasmExecute(contract: ContractAddress, msg: string): ReadyTxCmd {
    return this.ready('tx', 'wasm', 'execute', contract, msg)
  }
}

/** A fully signed-for transaction command that only needs gas before it can be broadcast */
export class ReadyTxCmd {
  constructor(readonly cmd: Cmd) {}

  get invocation(): Invocation {
    return this.cmd.invocation
  }

  amount(value: bigint | number, denom: string): ReadyTxCmd {
    return this.args('--amount', formatCoins([{ amount: value, denom }]))
  }

  args(...args: string[]): ReadyTxCmd {
    return new ReadyTxCmd(this.cmd.args(...args))
  }

  /** Broadcast and return the transaction hash. The transaction is not confirmed yet. */
  async execute(gas: Gas): Promise<TxId> {
    const out = await this.cmd
      .args('--gas', gas.units.toString(), '--gas-prices', gas.price.toString(), '--output', 'json')
      .run()
    const record = parseJson(out, txRecordSchema, 'tx broadcast')
    if (record.code > 0) throw new TxExecuteError(record.raw_log)
    return record.txhash
  }
}

/** Queries against a node */
export class QueryCmd {
  constructor(
    private readonly cmd: Cmd,
    readonly node: NodeAddress
  ) {}

  private async output(...args: string[]): Promise<[Invocation, CommandOutput]> {
    const invocation = withArgs(this.cmd.invocation, ...args, '--node', this.node)
    return [invocation, await this.cmd.runner.run(invocation)]
  }

  /** The transaction record, or undefined while the node does not know the hash yet */
  async tx(id: TxId): Promise<TxRecord | undefined> {
    const [invocation, out] = await this.output('query', 'tx', id, '--output', 'json')
    if (out.exitCode !== 0) {
      if (out.stderr.includes(notFound)) return undefined
      throw new CommandError(invocation.program, invocation.args, out.exitCode, out.stderr)
    }
    return parseJson(out.stdout, txRecordSchema, 'query tx')
  }

  /** The node status, or undefined while the node refuses connections */
  async status(): Promise<NodeStatus | undefined> {
    const [invocation, out] = await this.output('status')
    if (out.exitCode !== 0) {
      if (out.stderr.includes(connectionRefused)) return undefined
      throw new CommandError(invocation.program, invocation.args, out.exitCode, out.stderr)
    }
    return parseJson(jsonOutput(out), statusSchema, 'status')
  }

  /** Raw JSON text of a smart query */
  async wasmSmart(contract: ContractAddress, msg: string): Promise<string> {
    const [invocation, out] = await this.output(
      'query',
      'wasm',
      'contract-state',
      'smart',
      contract,
      msg,
      '--output',
      'json'
    )
    return checkOutput(invocation, out).stdout
  }

  async codeInfo(codeId: CodeId): Promise<CodeInfo> {
    const [invocation, out] = await this.output('query', 'wasm', 'code-info', codeId.toString(), '--output', 'json')
    return parseJson(checkOutput(invocation, out).stdout, codeInfoSchema, 'code-info')
  }
}
