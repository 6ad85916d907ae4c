import test from 'ava'
import { FakeNetwork, FakeWasmChain, testContext, testKey, tmpDir } from '../tests/fakes'
import { NoSignerError } from '../lib/errors'
import { fs, path, rmDir } from '../lib/utils/index'
import { contextFromOptions, deployCw20Demo, globalOptionsSchema } from './commands'

test('the demo stores, instantiates, mints and reads back the balance', async (t) => {
  const chain = new FakeWasmChain()
  const ctx = testContext({ runner: chain })
  t.teardown(() => rmDir(ctx.root))
  const network = new FakeNetwork(ctx, [testKey()])
  const lines: string[] = []

  const balance = await deployCw20Demo(network, 'artifacts/cw20_base.wasm', (line) => lines.push(line))

  t.is(balance, '1000000000000')
  t.deepEqual(lines, [
    'Stored CW20 base at code id: 1',
    'Instantiated CW20 DEMO at address: wasm1contract1',
    'Minting 1,000,000 DEMO to wasm1local0',
    'Balance of wasm1local0: 1000000000000 uDEMO'
  ])
  t.is(chain.contracts.get('wasm1contract1')?.minter, 'wasm1local0')
  t.is(chain.contracts.get('wasm1contract1')?.label, 'demo_cw20')
  t.is(chain.broadcasts.length, 3)
})

test('the demo needs a funded key', async (t) => {
  const ctx = testContext({ runner: new FakeWasmChain() })
  t.teardown(() => rmDir(ctx.root))
  const lines: string[] = []

  await t.throwsAsync(deployCw20Demo(new FakeNetwork(ctx), 'cw20.wasm', (line) => lines.push(line)), {
    instanceOf: NoSignerError
  })
  t.deepEqual(lines, [])
})

test('global options resolve the root against the working directory', (t) => {
  const cwd = tmpDir()
  t.teardown(() => rmDir(cwd))

  const ctx = contextFromOptions({ root: 'devnet', logLevel: 'debug' }, cwd)

  t.is(ctx.root, path.join(cwd, 'devnet'))
  t.is(ctx.cwd, cwd)
  t.is(ctx.config.Logger.Level, 'debug')
})

test('an explicit config file is read', (t) => {
  const cwd = tmpDir()
  t.teardown(() => rmDir(cwd))
  const file = path.join(cwd, 'devnet.yaml')
  fs.writeFileSync(file, 'Poll:\n  TxIntervalMs: 5\n')

  const ctx = contextFromOptions({ root: cwd, config: file }, cwd)

  t.is(ctx.config.Poll.TxIntervalMs, 5)
  t.is(ctx.config.Poll.BlockIntervalMs, 500)
})

test.serial('root and config paths may start with ~', (t) => {
  const home = tmpDir()
  const saved = process.env.HOME
  t.teardown(() => {
    process.env.HOME = saved
    rmDir(home)
  })
  process.env.HOME = home
  fs.writeFileSync(path.join(home, 'devnet.yaml'), 'Poll:\n  TxIntervalMs: 7\n')

  const ctx = contextFromOptions({ root: '~/devnet', config: '~/devnet.yaml' }, '/srv/workspace')

  t.is(ctx.root, path.join(home, 'devnet'))
  t.is(ctx.config.Poll.TxIntervalMs, 7)
})

test('unknown log levels are rejected', (t) => {
  t.false(globalOptionsSchema.safeParse({ logLevel: 'loud' }).success)
  t.true(globalOptionsSchema.safeParse({ logLevel: 'warn', root: '/tmp/devnet' }).success)
})
