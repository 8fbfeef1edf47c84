import process from 'node:process'
import {fileURLToPath} from 'node:url'
import test from 'ava'
import {execa} from 'execa'

const fixture = fileURLToPath(new URL('fixtures/up-without-wait.ts', import.meta.url))

test('up without waiting exits while the application keeps running', async t => {
  const startedAt = Date.now()
  // Ignored stdio: the application inherits it and would hold a pipe open
  const result = await execa(process.execPath, ['--import=tsx', fixture, '20'], {stdio: 'ignore', reject: false})

  t.is(result.exitCode, 0)
  t.true(Date.now() - startedAt < 15_000)
})
