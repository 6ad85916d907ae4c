import test from 'ava'
import { fail, ok, ScriptedRunner } from '../../tests/fakes'
import { CommandError, ParseError, TxExecuteError } from '../errors'
import { coin, GasPrice } from '../gas'
import { Key, KeyringBackend } from '../key'
import { Cmd } from './cmd'

const key = new Key('local0', 'archway1local0', KeyringBackend.Test)
const node = 'tcp://172.17.0.2:26657'

function cmd(runner: ScriptedRunner): Cmd {
  return new Cmd(runner, { program: 'archwayd', args: ['--home', '/home'] })
}

test('keys are listed and stamped with the requested backend', async (t) => {
  const runner = new ScriptedRunner().on(
    ['keys', 'list'],
    ok(JSON.stringify([{ name: 'local0', type: 'local', address: 'archway1local0', pubkey: '{}' }]))
  )
  const keys = await cmd(runner).listKeys(KeyringBackend.Test)
  t.is(keys.length, 1)
  t.true(keys[0]?.equals(key))
  t.deepEqual(runner.calls[0]?.args, ['--home', '/home', 'keys', 'list', '--keyring-backend', 'test', '--output', 'json'])
})

test('an empty keyring lists no keys', async (t) => {
  const runner = new ScriptedRunner().on(['keys', 'list'], ok('\n'))
  t.deepEqual(await cmd(runner).listKeys(KeyringBackend.Os), [])
})

test('added keys are read from stderr when stdout is empty', async (t) => {
  const runner = new ScriptedRunner().on(['keys', 'add'], {
    stdout: '',
    stderr: JSON.stringify({ name: 'local1', address: 'archway1local1', mnemonic: 'placeholder words' })
  })
  const added = await cmd(runner).addKey('local1', KeyringBackend.Test)
  t.is(added.toString(), 'local1 archway1local1 (test)')
})

test('keys are recovered with the mnemonic on stdin', async (t) => {
  const runner = new ScriptedRunner().on(['--recover'], ok(JSON.stringify({ name: 'rly1', address: 'neutron1rly1' })))
  const recovered = await cmd(runner).recoverKey('rly1', 'test mnemonic words', KeyringBackend.Test)
  t.is(recovered.address, 'neutron1rly1')
  const [call] = runner.calls
  t.is(call?.stdin, 'test mnemonic words\n')
  t.deepEqual(call?.args.slice(2), ['keys', 'add', 'rly1', '--keyring-backend', 'test', '--recover', '--output', 'json'])
})

test('genesis setup commands', async (t) => {
  const runner = new ScriptedRunner()
  const c = cmd(runner)
  await c.initChain('test', 'test-2')
  await c.addGenesisAccount(key, [coin(100n, 'uatom'), coin(5n, 'uibcatom')])
  await c.gentx(key, coin(7_000_000_000n, 'uatom'), 'test-2')
  await c.gentx(key, coin(9n, 'stake'), 'localnet', 180n)
  await c.collectGentx()
  await c.validateGenesis()
  t.deepEqual(
    runner.calls.map((call) => call.args.slice(2).join(' ')),
    [
      'init test --chain-id test-2',
      'add-genesis-account local0 100uatom,5uibcatom --keyring-backend test',
      'gentx local0 7000000000uatom --chain-id test-2 --keyring-backend test',
      'gentx local0 9stake --gas 180 --chain-id localnet --keyring-backend test',
      'collect-gentxs',
      'validate-genesis'
    ]
  )
})

test('setup failures surface as command errors', async (t) => {
  const runner = new ScriptedRunner().on(['init'], fail('Error: genesis.json file already exists'))
  const error = await t.throwsAsync(cmd(runner).initChain('test', 'test-1'), { instanceOf: CommandError })
  t.is(error?.stderr, 'Error: genesis.json file already exists')
})

test('contract addresses are predicted with a hex encoded salt', async (t) => {
  const runner = new ScriptedRunner().on(['build-address'], ok('archway1predicted\nextra\n'))
  t.is(await cmd(runner).buildAddress('AABB', key, 'salt'), 'archway1predicted')
  t.deepEqual(runner.calls[0]?.args.slice(2), ['query', 'wasm', 'build-address', 'AABB', 'archway1local0', '73616c74'])
})

test('transactions carry signer, chain and node flags', async (t) => {
  const runner = new ScriptedRunner().on(['tx', 'wasm'], ok(JSON.stringify({ txhash: 'ABC123', code: 0, raw_log: '[]' })))
  const ready = cmd(runner).tx(key, 'localnet', node).wasmInstantiate(3n, 'demo', '{"count":0}').amount(10n, 'stake')
  const txhash = await ready.execute(new GasPrice(100, 'stake').units(250_000n))
  t.is(txhash, 'ABC123')
  t.deepEqual(runner.calls[0]?.args.slice(2), [
    'tx',
    'wasm',
    'instantiate',
    '3',
    '{"count":0}',
    '--label',
    'demo',
    '--no-admin',
    '--from',
    'local0',
    '--keyring-backend',
    'test',
    '--chain-id',
    'localnet',
    '--node',
    node,
    '--yes',
    '--amount',
    '10stake',
    '--gas',
    '250000',
    '--gas-prices',
    '100stake',
    '--output',
    'json'
  ])
})

test('an admin replaces --no-admin', (t) => {
  const ready = cmd(new ScriptedRunner()).tx(key, 'localnet', node).wasmInstantiate(1n, 'demo', '{}', 'archway1admin')
  t.deepEqual(ready.invocation.args.slice(8, 11), ['demo', '--admin', 'archway1admin'])
})

test('a rejected broadcast is a tx execute error with the raw log', async (t) => {
  const runner = new ScriptedRunner().on(
    ['tx', 'wasm'],
    ok(JSON.stringify({ txhash: 'ABC123', code: 5, raw_log: 'insufficient funds' }))
  )
  const tx = cmd(runner).tx(key, 'localnet', node).wasmExecute('archway1contract', '{}')
  await t.throwsAsync(tx.execute(new GasPrice(100, 'stake').units(1n)), {
    instanceOf: TxExecuteError,
    message: 'insufficient funds'
  })
})

test('unparsable broadcast output is a parse error', async (t) => {
  const runner = new ScriptedRunner().on(['tx', 'wasm'], ok('gas estimate: 12345'))
  const tx = cmd(runner).tx(key, 'localnet', node).wasmStore('/work/contract.wasm')
  const error = await t.throwsAsync(tx.execute(new GasPrice(100, 'stake').units(1n)), { instanceOf: ParseError })
  t.is(error?.input, 'gas estimate: 12345')
})

test('an unknown transaction is not an error', async (t) => {
  const runner = new ScriptedRunner().on(['query', 'tx'], fail('Error: tx (ABC123) not found'))
  t.is(await cmd(runner).query(node).tx('ABC123'), undefined)
  t.deepEqual(runner.calls[0]?.args.slice(2), ['query', 'tx', 'ABC123', '--output', 'json', '--node', node])
})

test('other query failures are command errors', async (t) => {
  const runner = new ScriptedRunner().on(['query', 'tx'], fail('Error: post failed: i/o timeout'))
  await t.throwsAsync(cmd(runner).query(node).tx('ABC123'), { instanceOf: CommandError })
})

test('node status in either casing', async (t) => {
  const runner = new ScriptedRunner().on(
    ['status'],
    ok(JSON.stringify({ SyncInfo: { latest_block_height: '41' } })),
    { stdout: '', stderr: JSON.stringify({ sync_info: { latest_block_height: '42' } }) }
  )
  t.deepEqual(await cmd(runner).query(node).status(), { latestBlockHeight: 41 })
  t.deepEqual(await cmd(runner).query(node).status(), { latestBlockHeight: 42 })
})

test('a refused connection means no status yet', async (t) => {
  const runner = new ScriptedRunner().on(['status'], fail('dial tcp 127.0.0.1:26657: connect: connection refused'))
  t.is(await cmd(runner).query(node).status(), undefined)
})

test('smart queries return the raw output and code info is parsed', async (t) => {
  const runner = new ScriptedRunner()
    .on(['smart'], ok('{"data":{"balance":"5"}}'))
    .on(['code-info'], ok(JSON.stringify({ code_id: '1', creator: 'archway1local0', data_hash: 'AABB' })))
  t.is(await cmd(runner).query(node).wasmSmart('archway1contract', '{"balance":{}}'), '{"data":{"balance":"5"}}')
  t.deepEqual(await cmd(runner).query(node).codeInfo(1n), { creator: 'archway1local0', data_hash: 'AABB' })
})
