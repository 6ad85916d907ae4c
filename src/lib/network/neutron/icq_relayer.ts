import { DevnetContext } from '../../context'
import { ProcessHandle } from '../../lifecycle'
import { checkOutput, Invocation } from '../../process'
import { fs, path, pathExists } from '../../utils/index'
import { NativeChain } from './chain'

const repoUrl = 'https://github.com/neutron-org/neutron-query-relayer.git'
const repoBranch = 'main'

/** Relayer configuration; the relayer reads everything from its environment */
export function icqEnv(neutrond: NativeChain, gaiad: NativeChain, storagePath: string): Record<string, string> {
  const ntrn = neutrond.params
  const gaia = gaiad.params
  return {
    RELAYER_NEUTRON_CHAIN_CHAIN_PREFIX: 'neutron',
    RELAYER_NEUTRON_CHAIN_RPC_ADDR: `tcp://127.0.0.1:${ntrn.ports.rpc}`,
    RELAYER_NEUTRON_CHAIN_REST_ADDR: `http://127.0.0.1:${ntrn.ports.rest}`,
    RELAYER_NEUTRON_CHAIN_HOME_DIR: neutrond.homePath,
    RELAYER_NEUTRON_CHAIN_CHAIN_ID: ntrn.chainId,
    RELAYER_NEUTRON_CHAIN_GAS_PRICES: `0.5${ntrn.denom}`,
    RELAYER_NEUTRON_CHAIN_SIGN_KEY_NAME: 'local3',
    RELAYER_NEUTRON_CHAIN_TIMEOUT: '1000s',
    RELAYER_NEUTRON_CHAIN_GAS_ADJUSTMENT: '2.0',
    RELAYER_NEUTRON_CHAIN_TX_BROADCAST_TYPE: 'BroadcastTxCommit',
    RELAYER_NEUTRON_CHAIN_CONNECTION_ID: 'connection-0',
    RELAYER_NEUTRON_CHAIN_CLIENT_ID: '07-tendermint-0',
    RELAYER_NEUTRON_CHAIN_DEBUG: 'true',
    RELAYER_NEUTRON_CHAIN_KEY: 'local1',
    RELAYER_NEUTRON_CHAIN_ACCOUNT_PREFIX: 'neutron',
    RELAYER_NEUTRON_CHAIN_KEYRING_BACKEND: 'test',
    RELAYER_NEUTRON_CHAIN_OUTPUT_FORMAT: 'json',
    RELAYER_NEUTRON_CHAIN_SIGN_MODE_STR: 'direct',
    RELAYER_NEUTRON_CHAIN_ALLOW_KV_CALLBACKS: 'true',
    RELAYER_TARGET_CHAIN_RPC_ADDR: `tcp://127.0.0.1:${gaia.ports.rpc}`,
    RELAYER_TARGET_CHAIN_HOME_DIR: gaiad.homePath,
    RELAYER_TARGET_CHAIN_CHAIN_ID: gaia.chainId,
    RELAYER_TARGET_CHAIN_GAS_PRICES: `0.5${gaia.denom}`,
    RELAYER_TARGET_CHAIN_TIMEOUT: '1000s',
    RELAYER_TARGET_CHAIN_GAS_ADJUSTMENT: '1.0',
    RELAYER_TARGET_CHAIN_CONNECTION_ID: 'connection-0',
    RELAYER_TARGET_CHAIN_CLIENT_ID: '07-tendermint-0',
    RELAYER_TARGET_CHAIN_DEBUG: 'true',
    RELAYER_TARGET_CHAIN_KEYRING_BACKEND: 'test',
    RELAYER_TARGET_CHAIN_OUTPUT_FORMAT: 'json',
    RELAYER_TARGET_CHAIN_SIGN_MODE_STR: 'direct',
    RELAYER_REGISTRY_ADDRESSES: '',
    RELAYER_ALLOW_TX_QUERIES: 'true',
    RELAYER_ALLOW_KV_CALLBACKS: 'true',
    RELAYER_MIN_KV_UPDATE_PERIOD: '1',
    RELAYER_QUERIES_TASK_QUEUE_CAPACITY: '10000',
    RELAYER_CHECK_SUBMITTED_TX_STATUS_DELAY: '10s',
    RELAYER_WEBSERVER_PORT: '127.0.0.1:9999',
    RELAYER_STORAGE_PATH: storagePath
  }
}

/** The interchain queries relayer */
export class IcqRelayer {
  readonly srcPath: string
  readonly binPath: string
  readonly dbPath: string
  readonly logfilePath: string

  constructor(
    private readonly ctx: DevnetContext,
    private readonly root: string
  ) {
    this.srcPath = path.join(root, 'icq_rly', 'src')
    this.binPath = path.join(root, 'bin', 'neutron_query_relayer')
    this.dbPath = path.join(root, 'icq_rly', 'db')
    this.logfilePath = path.join(root, 'icq_rly', 'icq_rly.log')
  }

  isInitialized(): boolean {
    return pathExists(this.srcPath, this.binPath)
  }

  private async exec(invocation: Invocation) {
    checkOutput(invocation, await this.ctx.runner.run(invocation))
  }

  async init() {
    this.ctx.log.info('initializing the ICQ relayer')
    if (!fs.existsSync(this.srcPath)) {
      await this.exec({ program: 'git', args: ['clone', '--depth', '1', '--branch', repoBranch, repoUrl, this.srcPath] })
    }
    if (!fs.existsSync(this.binPath)) {
      await this.exec({
        program: 'make',
        args: ['install'],
        cwd: this.srcPath,
        env: { GOPATH: this.root, GOFLAGS: '-modcacherw' }
      })
    }
  }

  start(neutrond: NativeChain, gaiad: NativeChain): ProcessHandle {
    const env = { ...icqEnv(neutrond, gaiad, this.dbPath), HOME: this.root }
    const child = this.ctx.spawner.spawn({ program: this.binPath, args: ['start'], env }, this.logfilePath, 'overwrite')
    return new ProcessHandle(child, 'icq relayer', this.ctx.log)
  }
}
