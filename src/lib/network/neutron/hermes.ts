import toml from '@iarna/toml'
import { DevnetContext } from '../../context'
import { CommandError } from '../../errors'
import { ProcessHandle } from '../../lifecycle'
import { checkOutput, describe, Invocation, LogfileMode } from '../../process'
import { dumpTomlToFile, ensureDir, fs, path, pathExists, rmDir, sleep } from '../../utils/index'
import { DemoMnemonics, NativeChain } from './chain'

export const hermesVersion = '1.6.0'

type RelayedChain = {
  chain: NativeChain
  accountPrefix: string
  keyName: string
  mnemonicFile: string
  consumer: boolean
}

function chainConfig({ chain, accountPrefix, keyName, consumer }: RelayedChain): toml.JsonMap {
  const { chainId, denom, ports } = chain.params
  const config: toml.JsonMap = {
    id: chainId,
    type: 'CosmosSdk',
    rpc_addr: `http://127.0.0.1:${ports.rpc}`,
    grpc_addr: `http://127.0.0.1:${ports.grpc}`,
    event_source: { mode: 'push', url: `ws://127.0.0.1:${ports.rpc}/websocket`, batch_delay: '200ms' },
    rpc_timeout: '10s',
    account_prefix: accountPrefix,
    key_name: keyName,
    store_prefix: 'ibc',
    default_gas: 100_000,
    max_gas: 3_000_000,
    gas_price: { price: 0.0025, denom },
    gas_multiplier: 1.1,
    max_msg_num: 30,
    max_tx_size: 2_097_152,
    clock_drift: '5s',
    max_block_time: '30s',
    trusting_period: '14days',
    trust_threshold: { numerator: '1', denominator: '3' },
    address_type: { derivation: 'cosmos' }
  }
  if (consumer) config.ccv_consumer_chain = true
  return config
}

/** The Hermes configuration relaying between the two chains of the topology */
export function hermesConfig(chains: readonly RelayedChain[]): toml.JsonMap {
  return {
    global: { log_level: 'info' },
    mode: {
      clients: { enabled: true, refresh: true, misbehaviour: true },
      connections: { enabled: true },
      channels: { enabled: true },
      packets: { enabled: true, clear_interval: 100, clear_on_start: true, tx_confirmation: true }
    },
    rest: { enabled: true, host: '127.0.0.1', port: 3000 },
    telemetry: { enabled: false, host: '127.0.0.1', port: 3001 },
    chains: chains.map(chainConfig)
  }
}

export type HermesOptions = {
  /** pause before creating the connection, so that both chains have produced a few blocks */
  settleMs?: number
}

/** The IBC relayer that opens the transfer channel and relays packets over it */
export class Hermes {
  readonly binPath: string
  readonly homePath: string
  readonly configPath: string
  readonly logfilePath: string
  private readonly chains: RelayedChain[]

  constructor(
    private readonly ctx: DevnetContext,
    private readonly root: string,
    neutrond: NativeChain,
    gaiad: NativeChain,
    private readonly opts: HermesOptions = {}
  ) {
    this.binPath = path.join(root, 'bin', 'hermes')
    this.homePath = path.join(root, '.hermes')
    this.configPath = path.join(this.homePath, 'config.toml')
    this.logfilePath = path.join(this.homePath, 'hermes.log')
    this.chains = [
      {
        chain: neutrond,
        accountPrefix: 'neutron',
        keyName: 'testkey_1',
        mnemonicFile: path.join(this.homePath, 'mnemonic1.txt'),
        consumer: true
      },
      {
        chain: gaiad,
        accountPrefix: 'cosmos',
        keyName: 'testkey_2',
        mnemonicFile: path.join(this.homePath, 'mnemonic2.txt'),
        consumer: false
      }
    ]
  }

  isInitialized(): boolean {
    return pathExists(this.binPath, this.homePath)
  }

  private invocation(...args: string[]): Invocation {
    return { program: this.binPath, args: ['--config', this.configPath, ...args], env: { HOME: this.root } }
  }

  private async exec(invocation: Invocation) {
    checkOutput(invocation, await this.ctx.runner.run(invocation))
  }

  async init(mnemonics: DemoMnemonics) {
    this.ctx.log.info('initializing hermes')
    if (!fs.existsSync(this.binPath)) {
      await this.exec({
        program: 'cargo',
        args: ['install', 'ibc-relayer-cli', '--bin', 'hermes', '--version', hermesVersion, '--locked', '--root', this.root]
      })
    }

    rmDir(this.homePath)
    ensureDir(this.homePath, true)
    dumpTomlToFile(this.configPath, hermesConfig(this.chains))

    const relayerMnemonics = [mnemonics.rly1, mnemonics.rly2]
    for (const [i, relayed] of this.chains.entries()) {
      fs.writeFileSync(relayed.mnemonicFile, relayerMnemonics[i])
      const { chainId } = relayed.chain.params
      await this.exec(this.invocation('keys', 'delete', '--chain', chainId, '--all'))
      await this.exec(
        this.invocation('keys', 'add', '--key-name', relayed.keyName, '--chain', chainId, '--mnemonic-file', relayed.mnemonicFile)
      )
    }
  }

  /** Run a one-shot hermes command with its output going to the shared log file */
  private async runToCompletion(mode: LogfileMode, ...args: string[]) {
    const invocation = this.invocation(...args)
    const child = this.ctx.spawner.spawn(invocation, this.logfilePath, mode)
    const exitCode = await child.exited
    if (exitCode !== 0) {
      throw new CommandError(invocation.program, invocation.args, exitCode, `see ${this.logfilePath}`)
    }
    this.ctx.log.debug(`${describe(invocation)} done`)
  }

  /** Create the connection and the transfer channel, then start relaying */
  async start(): Promise<ProcessHandle> {
    await sleep(this.opts.settleMs ?? 5000)
    const [a, b] = this.chains.map((relayed) => relayed.chain.params.chainId)
    await this.runToCompletion('overwrite', 'create', 'connection', '--a-chain', a, '--b-chain', b)
    await this.runToCompletion(
      'append',
      'create',
      'channel',
      '--a-chain',
      a,
      '--a-connection',
      'connection-0',
      '--a-port',
      'transfer',
      '--b-port',
      'transfer'
    )
    const child = this.ctx.spawner.spawn(this.invocation('start'), this.logfilePath, 'append')
    return new ProcessHandle(child, 'hermes', this.ctx.log)
  }
}
