import {chmod} from 'node:fs/promises'
import {delimiter, join} from 'node:path'
import process from 'node:process'
import test from 'ava'
import {DockerCliRuntime} from '../docker-runtime.js'
import {createTmpDir, writeTree} from '../../__tests__/helpers.js'

// Stand-in `docker` on PATH: `wait slow` blocks, any other wait prints 3
test.before(async () => {
  const bin = await createTmpDir()
  await writeTree(bin, {docker: '#!/bin/sh\nif [ "$2" = slow ]; then exec sleep 30; fi\necho 3\n'})
  await chmod(join(bin, 'docker'), 0o755)
  process.env.PATH = `${bin}${delimiter}${process.env.PATH ?? ''}`
})

test('waitContainer: resolves with the exit code printed by docker wait', async t => {
  const runtime = new DockerCliRuntime()
  t.is(await runtime.waitContainer('fast'), 3)
})

test('waitContainer: an aborted wait resolves undefined', async t => {
  const runtime = new DockerCliRuntime()
  const abort = new AbortController()
  const waiting = runtime.waitContainer('slow', abort.signal)
  setTimeout(() => {
    abort.abort()
  }, 100)

  t.is(await waiting, undefined)
})
