import test from 'ava'
import { tmpDir } from '../../tests/fakes'
import * as utils from './index'

test('expand user home dir', (t) => {
  const home = process.env.HOME
  t.teardown(() => {
    process.env.HOME = home
  })
  process.env.HOME = '/home/tester'
  t.is(utils.expandUserHomeDir('~/devnet'), '/home/tester/devnet')
  t.is(utils.expandUserHomeDir('$HOME/devnet'), '/home/tester/devnet')
  t.is(utils.expandUserHomeDir('/abs/~/devnet'), '/abs/~/devnet')
  t.is(utils.resolveToAbsDir('~', 'a', '..', 'b'), '/home/tester/b')
})

test('find and replace matches patterns literally and in order', (t) => {
  const dir = tmpDir()
  t.teardown(() => utils.rmDir(dir))
  const file = utils.path.join(dir, 'config.toml')
  utils.fs.writeFileSync(
    file,
    ['cors_allowed_origins = []', 'laddr = "tcp://127.0.0.1:26657"', 'proxy = "tcp://127.0.0.1:26657"', ''].join('\n')
  )

  utils.findAndReplaceInFile(file, [
    ['cors_allowed_origins = []', 'cors_allowed_origins = ["*"]'],
    ['tcp://127.0.0.1:26657', 'tcp://127.0.0.1:$1'],
    ['$1', '16657']
  ])

  t.is(
    utils.fs.readFileSync(file, 'utf-8'),
    ['cors_allowed_origins = ["*"]', 'laddr = "tcp://127.0.0.1:16657"', 'proxy = "tcp://127.0.0.1:16657"', ''].join('\n')
  )
})

test('path helpers', (t) => {
  const dir = tmpDir()
  t.teardown(() => utils.rmDir(dir))
  const nested = utils.path.join(dir, 'a', 'b')
  t.false(utils.pathExists(dir, nested))
  utils.ensureDir(nested, true)
  t.true(utils.pathExists(dir, nested))
  utils.rmDir(utils.path.join(dir, 'a'))
  t.false(utils.pathExists(nested))
  t.notThrows(() => utils.rmDir(nested))
})

test('toml files', (t) => {
  const dir = tmpDir()
  t.teardown(() => utils.rmDir(dir))
  const file = utils.path.join(dir, 'relayer.toml')
  utils.dumpTomlToFile(file, { global: { log_level: 'info' }, chains: [{ id: 'test-1' }, { id: 'test-2' }] })
  t.deepEqual(JSON.parse(JSON.stringify(utils.readTomlFile(file))), { global: { log_level: 'info' }, chains: [{ id: 'test-1' }, { id: 'test-2' }] })
})
