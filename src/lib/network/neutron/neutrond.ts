import { DevnetContext } from '../../context'
import { findAndReplaceInFile } from '../../utils/index'
import { ibcAtomTrace, NativeChain } from './chain'

export const neutronChainId = 'test-1'
export const neutronDenom = 'untrn'

/** The consumer chain the topology is built around */
export class Neutrond extends NativeChain {
  constructor(ctx: DevnetContext, root: string) {
    super(ctx, root, {
      name: 'neutrond',
      repoUrl: 'https://github.com/neutron-org/neutron.git',
      repoBranch: 'main',
      chainId: neutronChainId,
      denom: neutronDenom,
      ports: { p2p: 26656, rpc: 26657, rest: 1317, grpc: 8090, grpcWeb: 8091, rosetta: 8080 },
      srcDir: 'neutron/src',
      binPath: 'bin/neutrond',
      homeDir: 'neutron/data',
      logfile: 'neutron/neutrond.log'
    })
  }

  protected async build() {
    await this.exec({ program: 'make', args: ['install-test-binary'], cwd: this.srcPath, env: this.goEnv() })
  }

  protected async finishGenesis() {
    await this.exec({ program: this.binPath, args: ['add-consumer-section', '--home', this.homePath] })
    const minimumGasPrices = JSON.stringify([
      { denom: ibcAtomTrace, amount: '0' },
      { denom: neutronDenom, amount: '0' }
    ])
    findAndReplaceInFile(this.configPath('genesis.json'), [
      ['"allow_messages": []', '"allow_messages": ["*"]'],
      ['"signed_blocks_window": "100"', '"signed_blocks_window": "140000"'],
      ['"min_signed_per_window": "0.500000000000000000"', '"min_signed_per_window": "0.050000000000000000"'],
      ['"slash_fraction_double_sign": "0.050000000000000000"', '"slash_fraction_double_sign": "0.010000000000000000"'],
      ['"slash_fraction_downtime": "0.010000000000000000"', '"slash_fraction_downtime": "0.000100000000000000"'],
      ['"minimum_gas_prices": []', `"minimum_gas_prices": ${minimumGasPrices}`]
    ])
  }
}
