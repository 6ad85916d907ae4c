import { ArchwayConfig } from '../config'
import { DevnetContext, rootPath } from '../context'
import { ChainId, Cmd, NodeAddress } from '../cosmos/cmd'
import { dockerRun, DockerImage, getIPAddress, pullImage } from '../docker'
import { coin, gasPrices, GasPrices } from '../gas'
import { KeyringBackend } from '../key'
import { ContainerHandle, LifecycleHandle } from '../lifecycle'
import { checkOutput } from '../process'
import { ensureDir, fs, path } from '../utils/index'
import { CleanScope, NetworkBackend, NetworkBase } from './network'

export const dirName = 'archway'
export const homeDirName = '.archwayd'
export const chainId = 'localnet'
export const moniker = 'archway-local'
export const denom = 'stake'
export const rpcPort = '26657'
export const grpcPort = '9090'

const genesisAllocation = 1_000_000_000_000_000_000_000n
const validatorStake = 9_500_000_000_000_000_000n
const gentxGas = 180_000_000_000_000_000n

const prices = gasPrices(denom, 10, 100, 1000)

/** Where the node's home directory is mounted inside containers */
const containerHome = '/home'
const containerWork = '/work'

function backendRoot(ctx: DevnetContext): string {
  return rootPath(ctx, dirName)
}

function images(config: ArchwayConfig) {
  return {
    node: new DockerImage(config.Image, config.Tag),
    debug: new DockerImage(config.DebugImage, config.Tag)
  }
}

/**
 * A single archwayd node running in docker. The chain binary itself is also only ever run inside a
 * throwaway container with the home directory mounted.
 */
export class ArchwayLocal extends NetworkBase {
  readonly name = 'archway-local'
  readonly home: string
  private readonly config: ArchwayConfig

  constructor(ctx: DevnetContext) {
    super(ctx)
    this.config = ctx.config.Archway
    this.home = path.join(backendRoot(ctx), homeDirName)
  }

  static async initialize(ctx: DevnetContext): Promise<ArchwayLocal> {
    const network = new ArchwayLocal(ctx)
    await pullImage(ctx.runner, images(network.config).node.full())

    if (fs.existsSync(network.home)) {
      ctx.log.info(`resuming ${network.name} from ${network.home}`)
      network.addKeys(...(await network.command().listKeys(KeyringBackend.Test)))
      return network
    }

    ctx.log.info(`bootstrapping ${network.name} in ${network.home}`)
    ensureDir(network.home, true)
    await network.bootstrap()
    return network
  }

  private async bootstrap() {
    await this.command().initChain(moniker, chainId)

    const local0 = await this.command().addKey('local0', KeyringBackend.Test)
    await this.command().addGenesisAccount(local0, [coin(genesisAllocation, denom)])

    const local1 = await this.command().addKey('local1', KeyringBackend.Test)
    await this.command().addGenesisAccount(local1, [coin(genesisAllocation, denom)])

    await this.command().gentx(local0, coin(validatorStake, denom), chainId, gentxGas)

    this.addKeys(local0, local1)

    await this.command().collectGentx()
    await this.command().validateGenesis()

    const debugImage = images(this.config).debug.full()
    await pullImage(this.ctx.runner, debugImage)
    // the files belong to the container user, so they are patched from a container as well
    await this.sed(debugImage, 's/127.0.0.1/0.0.0.0/g')
    await this.sed(debugImage, 's/cors_allowed_origins = \\[\\]/cors_allowed_origins = \\["*"\\]/g')
  }

  private async sed(image: string, expression: string) {
    const invocation = dockerRun({
      imageRepoTag: image,
      interactive: true,
      volumes: [[this.home, containerHome]],
      entrypoint: '/bin/sed',
      args: ['-i', expression, `${containerHome}/config/config.toml`],
      label: 'debug'
    })
    checkOutput(invocation, await this.ctx.runner.run(invocation))
  }

  chainId(): ChainId {
    return chainId
  }

  command(): Cmd {
    return new Cmd(
      this.ctx.runner,
      dockerRun({
        imageRepoTag: images(this.config).node.full(),
        interactive: true,
        volumes: [
          [this.home, containerHome],
          [this.ctx.cwd, containerWork]
        ],
        workDir: containerWork,
        args: ['--home', containerHome]
      })
    )
  }

  protected gasPrices(): GasPrices {
    return prices
  }

  protected async resolveNodeAddress(): Promise<NodeAddress> {
    const ip = await getIPAddress(this.ctx.runner, this.config.Container)
    return `tcp://${ip}:${rpcPort}`
  }

  async startLocal(): Promise<LifecycleHandle> {
    const invocation = dockerRun({
      imageRepoTag: images(this.config).node.full(),
      name: this.config.Container,
      detach: true,
      volumes: [
        [this.home, containerHome],
        [this.ctx.cwd, containerWork]
      ],
      workDir: containerWork,
      ports: [
        [grpcPort, grpcPort],
        [rpcPort, rpcPort]
      ],
      args: ['start', '--home', containerHome]
    })
    checkOutput(invocation, await this.ctx.runner.run(invocation))
    this.ctx.log.info(`started container ${this.config.Container}`)
    return new ContainerHandle(this.config.Container, {
      runner: this.ctx.runner,
      spawner: this.ctx.spawner,
      log: this.ctx.log,
      logfile: path.join(backendRoot(this.ctx), 'archwayd.log')
    })
  }

  async clean(scope: CleanScope): Promise<void> {
    await clean(this.ctx, scope)
  }
}

/**
 * Remove the chain state, or everything the backend wrote. Removal runs in a container because the
 * node writes its files as root.
 */
async function clean(ctx: DevnetContext, scope: CleanScope): Promise<void> {
  const root = backendRoot(ctx)
  const [parent, target] = scope === 'state' ? [root, homeDirName] : [ctx.root, dirName]
  if (!fs.existsSync(path.join(parent, target))) return
  const invocation = dockerRun({
    imageRepoTag: images(ctx.config.Archway).debug.full(),
    interactive: true,
    volumes: [[parent, containerWork]],
    workDir: containerWork,
    entrypoint: '/bin/rm',
    args: ['-rf', target],
    label: 'debug'
  })
  checkOutput(invocation, await ctx.runner.run(invocation))
  ctx.log.info(`removed ${path.join(parent, target)}`)
}

export const archwayLocal: NetworkBackend = {
  name: 'archway-local',
  description: 'single archwayd node in docker',
  initialize: (ctx) => ArchwayLocal.initialize(ctx),
  clean
}
