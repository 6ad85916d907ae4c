import { DevnetContext, rootPath } from '../../context'
import { ChainId, Cmd, NodeAddress } from '../../cosmos/cmd'
import { gasPrices, GasPrices } from '../../gas'
import { KeyringBackend } from '../../key'
import { LifecycleHandle } from '../../lifecycle'
import { checkOutput, Invocation } from '../../process'
import { fs, path, rmDir } from '../../utils/index'
import { CleanScope, NetworkBackend, NetworkBase } from '../network'

export const dirName = 'neutron-testnet'
export const testnetChainId = 'pion-1'
export const testnetNode = 'https://rpc-t.neutron.nodestake.top:443'

const repoUrl = 'https://github.com/neutron-org/neutron.git'
const repoBranch = 'main'

const prices = gasPrices('untrn', 0.001, 0.002, 0.004)

function backendRoot(ctx: DevnetContext): string {
  return rootPath(ctx, dirName)
}

/** The public neutron testnet, reached with a locally built neutrond. Keys are added with `recover`. */
export class NeutronTestnet extends NetworkBase {
  readonly name = 'neutron-testnet'
  readonly srcPath: string
  readonly homePath: string
  readonly binPath: string

  constructor(ctx: DevnetContext) {
    super(ctx)
    this.srcPath = path.join(backendRoot(ctx), 'src')
    this.homePath = path.join(backendRoot(ctx), 'data')
    this.binPath = path.join(this.srcPath, 'build', 'neutrond')
  }

  static async initialize(ctx: DevnetContext): Promise<NeutronTestnet> {
    const network = new NeutronTestnet(ctx)
    if (fs.existsSync(network.srcPath)) {
      network.addKeys(...(await network.command().listKeys(KeyringBackend.Test)))
      return network
    }
    ctx.log.info(`building neutrond for ${testnetChainId} in ${network.srcPath}`)
    await network.exec({
      program: 'git',
      args: ['clone', '--depth', '1', '--branch', repoBranch, repoUrl, network.srcPath]
    })
    await network.exec({ program: 'make', args: ['build'], cwd: network.srcPath })
    return network
  }

  private async exec(invocation: Invocation) {
    checkOutput(invocation, await this.ctx.runner.run(invocation))
  }

  chainId(): ChainId {
    return testnetChainId
  }

  command(): Cmd {
    return new Cmd(this.ctx.runner, { program: this.binPath, args: ['--home', this.homePath] })
  }

  protected gasPrices(): GasPrices {
    return prices
  }

  protected async resolveNodeAddress(): Promise<NodeAddress> {
    return testnetNode
  }

  startLocal(): Promise<LifecycleHandle> {
    return this.unsupported('startLocal')
  }

  async clean(scope: CleanScope): Promise<void> {
    await clean(this.ctx, scope)
  }
}

async function clean(ctx: DevnetContext, scope: CleanScope): Promise<void> {
  const target = scope === 'state' ? path.join(backendRoot(ctx), 'data') : backendRoot(ctx)
  rmDir(target)
  ctx.log.info(`removed ${target}`)
}

export const neutronTestnet: NetworkBackend = {
  name: 'neutron-testnet',
  description: `the public neutron testnet ${testnetChainId}`,
  initialize: (ctx) => NeutronTestnet.initialize(ctx),
  clean
}
