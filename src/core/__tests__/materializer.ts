import test from 'ava'
import {ContainerCreateError} from '../../errors.js'
import type {RunContext, Settings} from '../../types.js'
import {parseDevContainer} from '../descriptor.js'
import {HookRunner} from '../hook-runner.js'
import {imageBaseName, materialize, maxNameProbes, probeContainerName, type MaterializeOptions} from '../materializer.js'
import {FakeRuntime, eventNames, noopReporter, recordingReporter} from '../../__tests__/helpers.js'
import type {Reporter} from '../reporter.js'

const hooked = {
  image: 'alpine',
  postCreateCommand: 'create',
  postStartCommand: 'start',
  postAttachCommand: 'attach'
}

function options(runtime: FakeRuntime, reporter: Reporter = noopReporter, settings: Settings = {}): MaterializeOptions & {context: RunContext} {
  const devcontainer = parseDevContainer(hooked)
  return {
    runtime,
    reporter,
    hooks: new HookRunner({runtime, reporter, devcontainer, settings}),
    devcontainer,
    settings,
    projectPath: '/home/me/api',
    context: {projectName: 'api'},
    allocatePort: async () => 45_000
  }
}

function hookLines(runtime: FakeRuntime): string[] {
  return runtime.execs.map(({cmd}) => cmd.at(-1) ?? '')
}

// -- Names -------------------------------------------------------------------

test('imageBaseName: strips registry, path, tag and digest', t => {
  t.is(imageBaseName('alpine:latest'), 'alpine')
  t.is(imageBaseName('mcr.microsoft.com/devcontainers/base:ubuntu'), 'base')
  t.is(imageBaseName('localhost:5000/team/tool:1.2'), 'tool')
  t.is(imageBaseName('alpine@sha256:0123abcd'), 'alpine')
  t.is(imageBaseName('devcontainer_0123456789'), 'devcontainer_0123456789')
})

test('probeContainerName: first free index', async t => {
  const runtime = new FakeRuntime()
  runtime.addContainer({id: 'a', name: 'api_devcontainer_alpine_1'})
  runtime.addContainer({id: 'b', name: 'api_devcontainer_alpine_2'})

  t.is(await probeContainerName(runtime, '/home/me/api', 'alpine:latest'), 'api_devcontainer_alpine_3')
})

test('probeContainerName: sanitizes the directory name', async t => {
  const runtime = new FakeRuntime()
  t.is(await probeContainerName(runtime, '/home/me/my project', 'alpine:latest'), 'my_project_devcontainer_alpine_1')
})

test('probeContainerName: undefined once every index is taken', async t => {
  const runtime = new FakeRuntime()
  for (let n = 1; n <= maxNameProbes; n++) {
    runtime.addContainer({id: `c${n}`, name: `api_devcontainer_alpine_${n}`})
  }

  t.is(await probeContainerName(runtime, '/home/me/api', 'alpine:latest'), undefined)
  t.is(runtime.calls.length, 20)
})

// -- Materialization ---------------------------------------------------------

test('materialize: creates, starts and runs every hook in order', async t => {
  const runtime = new FakeRuntime()
  const {reporter, events} = recordingReporter()
  const opts = options(runtime, reporter)

  const id = await materialize('alpine:latest', opts)

  t.is(id, 'container-1')
  t.is(opts.context.applicationPort, 45_000)
  t.deepEqual(hookLines(runtime), ['create', 'start', 'attach'])
  t.is(runtime.created[0].name, 'api_devcontainer_alpine_1')
  t.deepEqual(eventNames(events).filter(name => name.startsWith('CONTAINER')), ['CONTAINER_CREATED', 'CONTAINER_STARTED'])
})

test('materialize: second run against a running container only attaches', async t => {
  const runtime = new FakeRuntime()
  const first = await materialize('alpine:latest', options(runtime))
  runtime.execs.length = 0

  const opts = options(runtime)
  const second = await materialize('alpine:latest', opts)

  t.is(second, first)
  t.is(runtime.created.length, 1)
  t.deepEqual(hookLines(runtime), ['attach'])
  t.is(opts.context.applicationPort, 45_000)
})

test('materialize: stopped container is started, then start and attach hooks', async t => {
  const runtime = new FakeRuntime()
  runtime.addContainer({
    id: 'old',
    state: 'exited',
    labels: {devcontainer: 'true', devcontainer_name: 'api', devcontainer_application_port: '41000'}
  })

  const opts = options(runtime)
  const id = await materialize('alpine:latest', opts)

  t.is(id, 'old')
  t.true(runtime.calls.includes('start old'))
  t.deepEqual(hookLines(runtime), ['start', 'attach'])
  t.is(opts.context.applicationPort, 41_000)
  t.is(runtime.created.length, 0)
})

test('materialize: settings hooks follow descriptor hooks', async t => {
  const runtime = new FakeRuntime()
  await materialize('alpine:latest', options(runtime, noopReporter, {postCreateCommand: 'dotfiles'}))
  t.deepEqual(hookLines(runtime), ['create', 'dotfiles', 'start', 'attach'])
})

test('materialize: creation failure is a ContainerCreateError', async t => {
  const runtime = new FakeRuntime()
  runtime.createError = new Error('Conflict. The container name is already in use')

  const error = await t.throwsAsync(materialize('alpine:latest', options(runtime)), {instanceOf: ContainerCreateError})
  t.is(error?.message, 'Failed to create container: Conflict. The container name is already in use')
  t.deepEqual(runtime.execs, [])
})
