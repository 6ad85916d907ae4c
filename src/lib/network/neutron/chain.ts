import { z } from 'zod'
import { DevnetContext } from '../../context'
import { Cmd, NodeAddress } from '../../cosmos/cmd'
import { coin } from '../../gas'
import { generateMnemonic, Key, KeyringBackend } from '../../key'
import { ProcessHandle } from '../../lifecycle'
import { checkOutput, Invocation } from '../../process'
import { parseJson } from '../../schemas'
import { ensureDir, findAndReplaceInFile, fs, path, pathExists, rmDir } from '../../utils/index'

export const ibcAtomDenom = 'uibcatom'
export const ibcUsdcDenom = 'uibcusdc'
/** ATOM as seen on neutron over the first transfer channel */
export const ibcAtomTrace = 'ibc/27394FB092D2ECCD56123C74F36E4C1F926001CEADA9CA97EA622B25F41E5EB2'

export const genesisAllocation = 100_000_000_000_000n

/** Keys recovered into both chains' keyrings and funded at genesis, in inventory order */
export const demoKeyNames = ['local1', 'local2', 'local3', 'val1', 'val2', 'rly1', 'rly2'] as const
export type DemoKeyName = (typeof demoKeyNames)[number]
export type DemoMnemonics = Record<DemoKeyName, string>

const mnemonic = z.string().min(1)
const mnemonicsSchema = z.object({
  local1: mnemonic,
  local2: mnemonic,
  local3: mnemonic,
  val1: mnemonic,
  val2: mnemonic,
  rly1: mnemonic,
  rly2: mnemonic
}) satisfies z.ZodType<DemoMnemonics>

/**
 * The demo mnemonics of a topology. They are generated on first use and kept in `file` so that both
 * chains and the relayers agree on them across runs.
 */
export function loadDemoMnemonics(file: string): DemoMnemonics {
  if (fs.existsSync(file)) {
    return parseJson(fs.readFileSync(file, 'utf-8'), mnemonicsSchema, file)
  }
  const generated = Object.fromEntries(demoKeyNames.map((name) => [name, generateMnemonic()]))
  const mnemonics = mnemonicsSchema.parse(generated)
  ensureDir(path.dirname(file), true)
  fs.writeFileSync(file, JSON.stringify(mnemonics, null, 2))
  return mnemonics
}

export type Ports = {
  p2p: number
  rpc: number
  rest: number
  grpc: number
  grpcWeb: number
  rosetta: number
}

export type NativeChainParams = {
  /** short name used in logs, e.g. neutrond */
  name: string
  repoUrl: string
  repoBranch: string
  chainId: string
  denom: string
  ports: Ports
  /** all relative to the topology root */
  srcDir: string
  binPath: string
  homeDir: string
  logfile: string
}

/**
 * A chain node built from source and run as a child process. `init` runs once per state directory,
 * `start` every time the topology starts.
 */
export abstract class NativeChain {
  readonly params: NativeChainParams
  readonly srcPath: string
  readonly binPath: string
  readonly homePath: string
  readonly logfilePath: string
  protected readonly ctx: DevnetContext
  protected readonly root: string

  constructor(ctx: DevnetContext, root: string, params: NativeChainParams) {
    this.ctx = ctx
    this.root = root
    this.params = params
    this.srcPath = path.join(root, params.srcDir)
    this.binPath = path.join(root, params.binPath)
    this.homePath = path.join(root, params.homeDir)
    this.logfilePath = path.join(root, params.logfile)
  }

  /** Build the binary; runs inside the source checkout */
  protected abstract build(): Promise<void>

  /** Steps after the shared genesis setup */
  protected abstract finishGenesis(keys: Key[]): Promise<void>

  isInitialized(): boolean {
    return pathExists(this.srcPath, this.homePath, this.binPath)
  }

  cli(): Cmd {
    return new Cmd(this.ctx.runner, { program: this.binPath, args: ['--home', this.homePath] })
  }

  command(): Cmd {
    return this.cli()
  }

  async nodeAddress(): Promise<NodeAddress> {
    return `tcp://127.0.0.1:${this.params.ports.rpc}`
  }

  /** Environment for building Go sources; keeps the module cache removable */
  protected goEnv(): Record<string, string> {
    return { GOPATH: this.root, GOFLAGS: '-modcacherw' }
  }

  protected async exec(invocation: Invocation): Promise<string> {
    return checkOutput(invocation, await this.ctx.runner.run(invocation)).stdout
  }

  protected async cloneAndBuild() {
    if (!fs.existsSync(this.srcPath)) {
      const { repoBranch, repoUrl } = this.params
      await this.exec({
        program: 'git',
        args: ['clone', '--depth', '1', '--branch', repoBranch, repoUrl, this.srcPath]
      })
    }
    if (!fs.existsSync(this.binPath)) {
      this.ctx.log.info(`building ${this.params.name} in ${this.srcPath}`)
      await this.build()
    }
  }

  async init(mnemonics: DemoMnemonics) {
    this.ctx.log.info(`initializing ${this.params.name}`)
    await this.cloneAndBuild()
    rmDir(this.homePath)
    const keys = await this.initGenesis(mnemonics)
    await this.finishGenesis(keys)
  }

  /** The genesis setup shared by both chains of the topology */
  private async initGenesis(mnemonics: DemoMnemonics): Promise<Key[]> {
    const { chainId, denom, ports } = this.params
    await this.cli().initChain('test', chainId)

    const keys: Key[] = []
    for (const name of demoKeyNames) {
      const key = await this.cli().recoverKey(name, mnemonics[name], KeyringBackend.Test)
      await this.cli().addGenesisAccount(key, [
        coin(genesisAllocation, denom),
        coin(genesisAllocation, ibcAtomDenom),
        coin(genesisAllocation, ibcUsdcDenom)
      ])
      keys.push(key)
    }

    findAndReplaceInFile(this.configPath('config.toml'), [
      ['timeout_commit = "5s"', 'timeout_commit = "1s"'],
      ['timeout_propose = "3s"', 'timeout_propose = "1s"'],
      ['index_all_keys = false', 'index_all_keys = true'],
      ['tcp://0.0.0.0:26656', `tcp://127.0.0.1:${ports.p2p}`],
      ['tcp://127.0.0.1:26657', `tcp://127.0.0.1:${ports.rpc}`]
    ])

    findAndReplaceInFile(this.configPath('app.toml'), [
      ['enable = false', 'enable = true'],
      ['swagger = false', 'swagger = true'],
      ['prometheus-retention-time = 0', 'prometheus-retention-time = 1000'],
      ['minimum-gas-prices = ""', `minimum-gas-prices = "0.0025${denom},0.0025${ibcAtomTrace}"`],
      ['tcp://0.0.0.0:1317', `tcp://127.0.0.1:${ports.rest}`],
      ['address = ":8080"', `address = ":${ports.rosetta}"`]
    ])

    findAndReplaceInFile(this.configPath('genesis.json'), [
      ['"denom": "stake"', `"denom": "${denom}"`],
      ['"mint_denom": "stake"', `"mint_denom": "${denom}"`],
      ['"bond_denom": "stake"', `"bond_denom": "${denom}"`]
    ])

    return keys
  }

  protected configPath(file: string): string {
    return path.join(this.homePath, 'config', file)
  }

  start(): ProcessHandle {
    const { grpc, grpcWeb } = this.params.ports
    const child = this.ctx.spawner.spawn(
      {
        program: this.binPath,
        args: [
          'start',
          '--log_level',
          'trace',
          '--log_format',
          'json',
          '--home',
          this.homePath,
          '--pruning=nothing',
          `--grpc.address=127.0.0.1:${grpc}`,
          `--grpc-web.address=127.0.0.1:${grpcWeb}`,
          '--trace'
        ],
        env: { HOME: this.root }
      },
      this.logfilePath,
      'overwrite'
    )
    return new ProcessHandle(child, this.params.name, this.ctx.log)
  }
}
