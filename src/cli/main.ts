#!/usr/bin/env node

import { Argument, Command, Option } from 'commander'
import { z } from 'zod'
import * as commands from './commands'
import { globalOptionsSchema } from './commands'
import { configFileName, rootEnvVar } from '../lib/config'
import { errorMessage } from '../lib/errors'
import { KeyringBackend } from '../lib/key'
import { isNetworkName, networkNames } from '../lib/network/index'
import { fs, getLogger, levels, path } from '../lib/utils/index'

const log = getLogger()

const packageSchema = z.object({ version: z.string() })
const { version } = packageSchema.parse(
  JSON.parse(fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf-8'))
)

const networkArgument = () => new Argument('<network>', 'The network backend').choices(networkNames)

function parseNetwork(value: string) {
  if (!isNetworkName(value)) throw new Error(`unknown network: ${value}`)
  return value
}

const program = new Command()
  .name('cwdev')
  .helpOption('-h, --help', 'Display help command')
  .description('CosmWasm local networks and contract transactions')
  .addOption(new Option('-l, --log-level <level>', 'Log level').choices(levels))
  .addOption(new Option('-r, --root <dir>', `State directory, $${rootEnvVar} or ./target/cosmwasm-devnet by default`))
  .addOption(new Option('-c, --config <file>', `Configuration file, <root>/${configFileName} by default`))
  .version(version)

const globals = () => globalOptionsSchema.parse(program.opts())

program
  .command('init-local')
  .description('Bootstrap the network, or resume it from its state directory')
  .addArgument(networkArgument())
  .allowExcessArguments(false)
  .action(async (network: string) => await commands.initLocal(parseNetwork(network), globals()))

program
  .command('start-local')
  .description('Start the network and follow its log until interrupted with Ctrl-C')
  .addArgument(networkArgument())
  .allowExcessArguments(false)
  .action(async (network: string) => await commands.startLocal(parseNetwork(network), globals()))

program
  .command('clean')
  .description('Remove the chain state of the network')
  .addArgument(networkArgument())
  .allowExcessArguments(false)
  .action(async (network: string) => await commands.clean(parseNetwork(network), globals()))

program
  .command('clean-all')
  .description('Remove everything the network wrote, including sources and binaries')
  .addArgument(networkArgument())
  .allowExcessArguments(false)
  .action(async (network: string) => await commands.cleanAll(parseNetwork(network), globals()))

program
  .command('deploy')
  .description('Store and instantiate a CW20 contract, mint tokens to the first key and print its balance')
  .addArgument(networkArgument())
  .argument('[wasm]', 'Path to the CW20 contract', commands.defaultDemoWasm)
  .allowExcessArguments(false)
  .action(async (network: string, wasm: string) => await commands.deploy(parseNetwork(network), wasm, globals()))

program
  .command('keys')
  .description('List the keys of the network')
  .addArgument(networkArgument())
  .allowExcessArguments(false)
  .action(async (network: string) => await commands.keys(parseNetwork(network), globals()))

program
  .command('recover')
  .description('Recover a key from a mnemonic read from stdin')
  .addArgument(networkArgument())
  .argument('<name>', 'Name of the key')
  .addOption(
    new Option('-k, --keyring-backend <backend>', 'Keyring backend')
      .choices(Object.values(KeyringBackend))
      .default(KeyringBackend.Test)
  )
  .allowExcessArguments(false)
  .action(async (network: string, name: string, opts: unknown) => {
    const { keyringBackend } = z.object({ keyringBackend: z.nativeEnum(KeyringBackend) }).parse(opts)
    await commands.recover(parseNetwork(network), name, keyringBackend, globals())
  })

program
  .command('wait-for-blocks')
  .description('Wait until the node answers and produces a new block')
  .addArgument(networkArgument())
  .allowExcessArguments(false)
  .action(async (network: string) => await commands.waitForBlocksCmd(parseNetwork(network), globals()))

program
  .command('optimize')
  .description('Build optimized wasm artifacts for a CosmWasm workspace')
  .argument('[dir]', 'Workspace directory, the current directory by default')
  .allowExcessArguments(false)
  .action(async (dir: string | undefined) => await commands.optimize(dir, globals()))

program
  .parseAsync()
  .then(() => process.exit())
  .catch((error: unknown) => {
    log.error(errorMessage(error))
    process.exit(1)
  })
