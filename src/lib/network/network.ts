import { PollConfig } from '../config'
import { DevnetContext } from '../context'
import { ChainId, Cmd, NodeAddress } from '../cosmos/cmd'
import { NoSignerError, UnsupportedOperationError } from '../errors'
import { GasPrice, GasPrices, GasTier } from '../gas'
import { checkMnemonic, Key, KeyringBackend } from '../key'
import { LifecycleHandle } from '../lifecycle'
import { Once } from '../utils/index'

export const networkNames = ['archway-local', 'neutron-local', 'neutron-testnet'] as const
export type NetworkName = (typeof networkNames)[number]

export type CleanScope = 'state' | 'all'

/** The capabilities every backend offers once initialized */
export interface Network {
  readonly name: NetworkName
  chainId(): ChainId
  /** Resolved on first use and memoized */
  nodeAddress(): Promise<NodeAddress>
  keys(): readonly Key[]
  recover(name: string, mnemonic: string, backend: KeyringBackend): Promise<Key>
  gasPrice(tier: GasTier): GasPrice
  /** How confirmations and block progress are polled on this network */
  pollConfig(): PollConfig
  /** A command pipeline bound to this network's binary or container */
  command(): Cmd
  startLocal(): Promise<LifecycleHandle>
  clean(scope: CleanScope): Promise<void>
}

/** How to bring a backend into existence; the closed set lives in ./index */
export interface NetworkBackend {
  readonly name: NetworkName
  readonly description: string
  /**
   * Bootstrap the network, or resume it when its state directory already exists. A failed
   * bootstrap leaves its partial state behind and the next call resumes from it.
   */
  initialize(ctx: DevnetContext): Promise<Network>
  clean(ctx: DevnetContext, scope: CleanScope): Promise<void>
}

export abstract class NetworkBase implements Network {
  abstract readonly name: NetworkName
  protected readonly ctx: DevnetContext
  private readonly inventory: Key[] = []
  private readonly address = new Once<NodeAddress>()

  constructor(ctx: DevnetContext) {
    this.ctx = ctx
  }

  abstract chainId(): ChainId
  abstract command(): Cmd
  abstract startLocal(): Promise<LifecycleHandle>
  abstract clean(scope: CleanScope): Promise<void>
  protected abstract gasPrices(): GasPrices
  protected abstract resolveNodeAddress(): Promise<NodeAddress>

  nodeAddress(): Promise<NodeAddress> {
    return this.address.get(() => this.resolveNodeAddress())
  }

  keys(): readonly Key[] {
    return this.inventory
  }

  protected addKeys(...keys: Key[]) {
    this.inventory.push(...keys)
  }

  async recover(name: string, mnemonic: string, backend: KeyringBackend): Promise<Key> {
    const key = await this.command().recoverKey(name, checkMnemonic(mnemonic), backend)
    this.addKeys(key)
    this.ctx.log.info(`recovered key ${key}`)
    return key
  }

  gasPrice(tier: GasTier): GasPrice {
    return this.gasPrices()[tier]
  }

  pollConfig(): PollConfig {
    return this.ctx.config.Poll
  }

  protected unsupported(operation: string): never {
    throw new UnsupportedOperationError(this.name, operation)
  }
}

/** The first key of the inventory, which bootstrap funds */
export function defaultSigner(network: Network): Key {
  const [first] = network.keys()
  if (!first) throw new NoSignerError(network.name)
  return first
}
