import { z } from 'zod'
import { defaultRoot, loadConfig } from '../lib/config'
import { createContext, DevnetContext } from '../lib/context'
import { execute, instantiate, query, store } from '../lib/contract'
import { waitForBlocks, blockPollOptions } from '../lib/cosmos/poll'
import { KeyringBackend } from '../lib/key'
import { withHandle } from '../lib/lifecycle'
import { defaultSigner, getBackend, Network, NetworkName } from '../lib/network/index'
import { optimizeWorkspace } from '../lib/ops'
import { levels, path, resolveToAbsDir } from '../lib/utils/index'

export const globalOptionsSchema = z.object({
  logLevel: z.enum(levels).optional(),
  root: z.string().optional(),
  config: z.string().optional()
})

export type GlobalOptions = z.infer<typeof globalOptionsSchema>

/** Where command results are printed; diagnostics go to the logger */
export type Print = (line: string) => void

const print: Print = (line) => console.log(line)

export function contextFromOptions(opts: GlobalOptions, cwd: string = process.cwd()): DevnetContext {
  const root = resolveToAbsDir(cwd, opts.root ?? defaultRoot(cwd))
  const file = opts.config === undefined ? undefined : resolveToAbsDir(cwd, opts.config)
  const config = loadConfig(root, file)
  if (opts.logLevel) config.Logger.Level = opts.logLevel
  return createContext({ cwd, root, config })
}

async function initialize(name: NetworkName, opts: GlobalOptions): Promise<Network> {
  return await getBackend(name).initialize(contextFromOptions(opts))
}

export async function initLocal(name: NetworkName, opts: GlobalOptions) {
  const network = await initialize(name, opts)
  print(`${network.name} (${network.chainId()}) is initialized`)
}

/** Start the network and follow its log until interrupted, then stop everything */
export async function startLocal(name: NetworkName, opts: GlobalOptions) {
  const network = await initialize(name, opts)
  const handle = await network.startLocal()
  await withHandle(handle, (h) => h.intoForeground())
}

export async function clean(name: NetworkName, opts: GlobalOptions) {
  await getBackend(name).clean(contextFromOptions(opts), 'state')
}

export async function cleanAll(name: NetworkName, opts: GlobalOptions) {
  await getBackend(name).clean(contextFromOptions(opts), 'all')
}

export async function keys(name: NetworkName, opts: GlobalOptions) {
  const network = await initialize(name, opts)
  for (const key of network.keys()) print(key.toString())
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/** Recover a key from a mnemonic read from stdin */
export async function recover(name: NetworkName, keyName: string, backend: KeyringBackend, opts: GlobalOptions) {
  const network = await initialize(name, opts)
  const key = await network.recover(keyName, await readStdin(), backend)
  print(key.toString())
}

export async function waitForBlocksCmd(name: NetworkName, opts: GlobalOptions) {
  const network = await initialize(name, opts)
  const height = await waitForBlocks(network, blockPollOptions(network.pollConfig()))
  print(`${network.name} is at height ${height}`)
}

export async function optimize(dir: string | undefined, opts: GlobalOptions) {
  const artifacts = await optimizeWorkspace(contextFromOptions(opts), dir)
  print(`artifacts written to ${artifacts}`)
}

export const defaultDemoWasm = path.join('artifacts', 'cw20_base.wasm')
export const demoMintAmount = 1_000_000_000_000n

const balanceResponseSchema = z.object({ balance: z.string() })

/**
 * Store a CW20 contract, instantiate it with the first key as minter, mint to that key and return
 * its balance.
 */
export async function deployCw20Demo(network: Network, wasmPath: string, out: Print = print): Promise<string> {
  const signer = defaultSigner(network)

  const codeId = await store(wasmPath).send(network, signer)
  out(`Stored CW20 base at code id: ${codeId}`)

  const contract = await instantiate(codeId, 'demo_cw20', {
    name: 'Demo',
    symbol: 'DEMO',
    decimals: 6,
    initial_balances: [],
    mint: { minter: signer.address, cap: null },
    marketing: null
  }).send(network, signer)
  out(`Instantiated CW20 DEMO at address: ${contract}`)

  out(`Minting 1,000,000 DEMO to ${signer.address}`)
  await execute(contract, { mint: { recipient: signer.address, amount: demoMintAmount } }).send(network, signer)

  const { balance } = await query(network, contract, { balance: { address: signer.address } }, balanceResponseSchema)
  out(`Balance of ${signer.address}: ${balance} uDEMO`)
  return balance
}

export async function deploy(name: NetworkName, wasm: string | undefined, opts: GlobalOptions) {
  const network = await initialize(name, opts)
  await deployCw20Demo(network, wasm ?? defaultDemoWasm)
}
