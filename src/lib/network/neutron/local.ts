import { DevnetContext, rootPath } from '../../context'
import { ChainId, Cmd, NodeAddress } from '../../cosmos/cmd'
import { blockPollOptions, waitForBlocks } from '../../cosmos/poll'
import { errorMessage } from '../../errors'
import { gasPrices, GasPrices } from '../../gas'
import { KeyringBackend } from '../../key'
import { CompositeHandle, LifecycleHandle } from '../../lifecycle'
import { path, rmDir } from '../../utils/index'
import { CleanScope, NetworkBackend, NetworkBase } from '../network'
import { loadDemoMnemonics, NativeChain } from './chain'
import { Gaiad } from './gaiad'
import { Hermes, HermesOptions } from './hermes'
import { IcqRelayer } from './icq_relayer'
import { Neutrond } from './neutrond'

export const dirName = 'neutron-local'

const prices = gasPrices('untrn', 0.01, 0.02, 0.04)

function backendRoot(ctx: DevnetContext): string {
  return rootPath(ctx, dirName)
}

export type NeutronLocalOptions = {
  hermes?: HermesOptions
}

/**
 * neutrond and gaiad connected by a transfer channel, with Hermes relaying packets and the ICQ
 * relayer serving interchain queries. All four run as child processes built from source.
 */
export class NeutronLocal extends NetworkBase {
  readonly name = 'neutron-local'
  readonly root: string
  readonly neutrond: Neutrond
  readonly gaiad: Gaiad
  readonly hermes: Hermes
  readonly icq: IcqRelayer

  constructor(ctx: DevnetContext, opts: NeutronLocalOptions = {}) {
    super(ctx)
    this.root = backendRoot(ctx)
    this.neutrond = new Neutrond(ctx, this.root)
    this.gaiad = new Gaiad(ctx, this.root)
    this.hermes = new Hermes(ctx, this.root, this.neutrond, this.gaiad, opts.hermes)
    this.icq = new IcqRelayer(ctx, this.root)
  }

  static async initialize(ctx: DevnetContext, opts: NeutronLocalOptions = {}): Promise<NeutronLocal> {
    const network = new NeutronLocal(ctx, opts)
    if (network.isInitialized()) {
      ctx.log.info(`resuming ${network.name} from ${network.root}`)
    } else {
      ctx.log.info(`bootstrapping ${network.name} in ${network.root}`)
      const mnemonics = loadDemoMnemonics(path.join(network.root, 'mnemonics.json'))
      await network.neutrond.init(mnemonics)
      await network.gaiad.init(mnemonics)
      await network.hermes.init(mnemonics)
      await network.icq.init()
    }
    network.addKeys(...(await network.neutrond.cli().listKeys(KeyringBackend.Test)))
    return network
  }

  isInitialized(): boolean {
    return (
      this.neutrond.isInitialized() &&
      this.gaiad.isInitialized() &&
      this.hermes.isInitialized() &&
      this.icq.isInitialized()
    )
  }

  chainId(): ChainId {
    return this.neutrond.params.chainId
  }

  command(): Cmd {
    return this.neutrond.cli()
  }

  protected gasPrices(): GasPrices {
    return prices
  }

  protected resolveNodeAddress(): Promise<NodeAddress> {
    return this.neutrond.nodeAddress()
  }

  private async waitForChain(chain: NativeChain) {
    this.ctx.log.info(`waiting for ${chain.params.name} blocks`)
    const height = await waitForBlocks(chain, blockPollOptions(this.ctx.config.Poll))
    this.ctx.log.info(`${chain.params.name} reached height ${height}`)
  }

  /** Starts the components in dependency order. On failure whatever already runs is released. */
  async startLocal(): Promise<LifecycleHandle> {
    const started: LifecycleHandle[] = []
    try {
      this.ctx.log.info('starting neutron')
      const ntrn = this.neutrond.start()
      started.push(ntrn)

      this.ctx.log.info('starting gaia')
      started.push(this.gaiad.start())

      await this.waitForChain(this.neutrond)
      await this.waitForChain(this.gaiad)

      this.ctx.log.info('starting hermes')
      started.push(await this.hermes.start())

      this.ctx.log.info('starting ICQ relayer')
      started.push(this.icq.start(this.neutrond, this.gaiad))

      return new CompositeHandle(ntrn, started.slice(1), this.ctx.log)
    } catch (e) {
      this.ctx.log.error(`${this.name} failed to start: ${errorMessage(e)}`)
      for (const handle of started.reverse()) await handle.release()
      throw e
    }
  }

  async clean(scope: CleanScope): Promise<void> {
    await clean(this.ctx, scope)
  }
}

async function clean(ctx: DevnetContext, scope: CleanScope): Promise<void> {
  const root = backendRoot(ctx)
  const targets =
    scope === 'state'
      ? ['neutron/data', 'gaia/data', '.hermes', 'icq_rly/db'].map((dir) => path.join(root, dir))
      : [root]
  for (const target of targets) {
    rmDir(target)
    ctx.log.info(`removed ${target}`)
  }
}

export const neutronLocal: NetworkBackend = {
  name: 'neutron-local',
  description: 'neutrond and gaiad connected over IBC with Hermes and the ICQ relayer',
  initialize: (ctx) => NeutronLocal.initialize(ctx),
  clean
}
