import test from 'ava'
import { ok, ScriptedRunner, testContext, tmpDir } from '../../tests/fakes'
import { generateMnemonic, KeyringBackend } from '../key'
import { fs, path, rmDir } from '../utils/index'
import { ArchwayLocal, archwayLocal } from './archway'
import { defaultSigner } from './network'

const keyJson = (name: string) => ok(JSON.stringify({ name, type: 'local', address: `archway1${name}` }))

function archwayRunner() {
  return new ScriptedRunner()
    .on(['keys', 'add', 'local0'], keyJson('local0'))
    .on(['keys', 'add', 'local1'], keyJson('local1'))
    .on(['keys', 'list'], ok(JSON.stringify([{ name: 'local0', address: 'archway1local0' }, { name: 'local1', address: 'archway1local1' }])))
    .on(['inspect'], ok('172.17.0.3\n'))
}

function setup() {
  const root = tmpDir()
  const runner = archwayRunner()
  return { root, runner, ctx: testContext({ root, runner }) }
}

test('bootstrap creates the genesis and funds two keys', async (t) => {
  const { root, runner, ctx } = setup()
  t.teardown(() => rmDir(root))

  const network = await ArchwayLocal.initialize(ctx)

  t.true(fs.existsSync(path.join(root, 'archway', '.archwayd')))
  t.deepEqual(
    network.keys().map((k) => k.toString()),
    ['local0 archway1local0 (test)', 'local1 archway1local1 (test)']
  )
  t.is(defaultSigner(network).name, 'local0')

  const steps = runner.calls.map((c) => {
    const image = c.args.findIndex((a) => a.startsWith('ghcr.io/'))
    return c.args.slice(image + 1).filter((a) => a !== '--home' && a !== '/home').slice(0, 2).join(' ')
  })
  t.deepEqual(steps, [
    '',
    'init archway-local',
    'keys add',
    'add-genesis-account local0',
    'keys add',
    'add-genesis-account local1',
    'gentx local0',
    'collect-gentxs',
    'validate-genesis',
    '',
    '-i s/127.0.0.1/0.0.0.0/g',
    '-i s/cors_allowed_origins = \\[\\]/cors_allowed_origins = \\["*"\\]/g'
  ])
  t.deepEqual(runner.find('gentx')[0]?.args.slice(-9), [
    'gentx',
    'local0',
    '9500000000000000000stake',
    '--gas',
    '180000000000000000',
    '--chain-id',
    'localnet',
    '--keyring-backend',
    'test'
  ])
})

test('a second initialize resumes from the state directory', async (t) => {
  const { root, runner, ctx } = setup()
  t.teardown(() => rmDir(root))

  await ArchwayLocal.initialize(ctx)
  const before = runner.calls.length
  const resumed = await archwayLocal.initialize(ctx)

  t.deepEqual(
    runner.calls.slice(before).map((c) => c.args.slice(0, 2).join(' ')),
    ['pull ghcr.io/archway-network/archwayd:v1.0.0', 'container run']
  )
  t.is(runner.find('init', 'archway-local').length, 1)
  t.deepEqual(
    resumed.keys().map((k) => k.address),
    ['archway1local0', 'archway1local1']
  )
})

test('the node address is resolved once', async (t) => {
  const { root, runner, ctx } = setup()
  t.teardown(() => rmDir(root))
  const network = new ArchwayLocal(ctx)

  const [a, b] = await Promise.all([network.nodeAddress(), network.nodeAddress()])
  t.is(a, 'tcp://172.17.0.3:26657')
  t.is(b, a)
  t.is(await network.nodeAddress(), a)
  t.is(runner.find('inspect').length, 1)
})

test('commands run the chain binary in a throwaway container', (t) => {
  const ctx = testContext({ root: '/state', runner: new ScriptedRunner() })
  const network = new ArchwayLocal(ctx)
  const { invocation } = network.command().args('keys', 'list')
  t.deepEqual(invocation.args, [
    'container',
    'run',
    '--rm',
    '--interactive',
    '--volume',
    '/state/archway/.archwayd:/home',
    '--volume',
    '/state:/work',
    '--workdir',
    '/work',
    '--label',
    'org.cosmwasm-devnet.label=main',
    '--label',
    'org.cosmwasm-devnet.runner=cosmwasm-devnet',
    'ghcr.io/archway-network/archwayd:v1.0.0',
    '--home',
    '/home',
    'keys',
    'list'
  ])
})

test('the node runs detached and stops on release', async (t) => {
  const { root, runner, ctx } = setup()
  t.teardown(() => rmDir(root))
  const network = new ArchwayLocal(ctx)
  const handle = await network.startLocal()
  const [run] = runner.calls
  t.true(run?.args.includes('--detach'))
  t.deepEqual(run?.args.slice(-3), ['start', '--home', '/home'])
  await handle.release()
  t.deepEqual(runner.calls[1]?.args, ['stop', 'cosmwasm_devnet_archwayd'])
})

test('clean removes the chain state or the whole backend directory', async (t) => {
  const { root, runner, ctx } = setup()
  t.teardown(() => rmDir(root))

  await archwayLocal.clean(ctx, 'state')
  t.is(runner.calls.length, 0)

  fs.mkdirSync(path.join(root, 'archway', '.archwayd'), { recursive: true })
  await archwayLocal.clean(ctx, 'state')
  await archwayLocal.clean(ctx, 'all')
  const [state, all] = runner.calls
  t.true(state?.args.includes(`${path.join(root, 'archway')}:/work`))
  t.deepEqual(state?.args.slice(-3), ['ghcr.io/archway-network/archwayd-debug:v1.0.0', '-rf', '.archwayd'])
  t.true(all?.args.includes(`${root}:/work`))
  t.deepEqual(all?.args.slice(-2), ['-rf', 'archway'])
})

test('recovered keys join the inventory', async (t) => {
  const { root, ctx } = setup()
  t.teardown(() => rmDir(root))
  const runner = new ScriptedRunner().on(['--recover'], keyJson('imported'))
  const network = new ArchwayLocal({ ...ctx, runner })
  const words = generateMnemonic()
  const key = await network.recover('imported', words, KeyringBackend.Os)
  t.is(key.toString(), 'imported archway1imported (os)')
  t.is(network.keys().length, 1)
  t.is(runner.calls[0]?.stdin, words + '\n')
})
