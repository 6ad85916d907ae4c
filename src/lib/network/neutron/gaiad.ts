import { DevnetContext } from '../../context'
import { DevnetError } from '../../errors'
import { coin } from '../../gas'
import { Key } from '../../key'
import { findAndReplaceInFile, path } from '../../utils/index'
import { NativeChain } from './chain'

export const gaiaChainId = 'test-2'
export const gaiaDenom = 'uatom'

const validatorStake = 7_000_000_000n

/** Messages the host chain executes on behalf of interchain accounts */
const icaAllowMessages = [
  '/cosmos.bank.v1beta1.MsgSend',
  '/cosmos.staking.v1beta1.MsgDelegate',
  '/cosmos.staking.v1beta1.MsgUndelegate'
]

/** The host chain on the other side of the transfer channel */
export class Gaiad extends NativeChain {
  constructor(ctx: DevnetContext, root: string) {
    super(ctx, root, {
      name: 'gaiad',
      repoUrl: 'https://github.com/cosmos/gaia.git',
      repoBranch: 'v9.0.3',
      chainId: gaiaChainId,
      denom: gaiaDenom,
      ports: { p2p: 16656, rpc: 16657, rest: 1316, grpc: 9090, grpcWeb: 9091, rosetta: 8081 },
      srcDir: 'gaia/src',
      binPath: 'bin/gaiad',
      homeDir: 'gaia/data',
      logfile: 'gaia/gaiad.log'
    })
  }

  protected async build() {
    // the go version check rejects toolchains newer than the release
    findAndReplaceInFile(path.join(this.srcPath, 'Makefile'), [
      ['$(BUILD_TARGETS): check_version go.sum $(BUILDDIR)/', '$(BUILD_TARGETS): go.sum $(BUILDDIR)/']
    ])
    await this.exec({ program: 'make', args: ['install'], cwd: this.srcPath, env: this.goEnv() })
  }

  protected async finishGenesis(keys: Key[]) {
    findAndReplaceInFile(this.configPath('genesis.json'), [
      ['"allow_messages": []', `"allow_messages": ${JSON.stringify(icaAllowMessages)}`]
    ])
    const validator = keys.find((key) => key.name === 'val1')
    if (!validator) throw new DevnetError('gaiad: validator key val1 missing from genesis keys')
    await this.cli().gentx(validator, coin(validatorStake, gaiaDenom), gaiaChainId)
    await this.cli().collectGentx()
  }
}
