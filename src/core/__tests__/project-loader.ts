import {join} from 'node:path'
import test from 'ava'
import {ConfigInvalidError, ConfigMissingError, SettingsInvalidError} from '../../errors.js'
import {
  defaultSettingsPath,
  findProjectRoot,
  loadDevContainer,
  loadProject,
  loadSettings,
  parseLenientJson
} from '../project-loader.js'
import {createTmpDir, eventNames, recordingReporter, writeTree} from '../../__tests__/helpers.js'

const descriptor = `{
  // Development image
  "name": "api",
  "image": "node:20",
  "forwardPorts": [3000,],
}
`

test('parseLenientJson: comments and trailing commas', t => {
  t.deepEqual(parseLenientJson('{/* c */ "a": [1, 2,], // end\n}', message => new Error(message)), {a: [1, 2]})
})

test('parseLenientJson: syntax errors go through fail', t => {
  const error = t.throws(() => parseLenientJson('{"a": }', message => new ConfigInvalidError(message)), {instanceOf: ConfigInvalidError})
  t.regex(error?.message ?? '', /^Config is not valid: ValueExpected at offset \d+$/)
})

// -- Root discovery ----------------------------------------------------------

test('findProjectRoot: walks up to the folder holding .devcontainer', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'.devcontainer/devcontainer.json': '{}', 'src/lib/index.ts': ''})
  t.is(await findProjectRoot(join(root, 'src', 'lib')), root)
})

test('findProjectRoot: keeps the start directory without .devcontainer', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'src/index.ts': ''})
  t.is(await findProjectRoot(join(root, 'src')), join(root, 'src'))
})

test('findProjectRoot: missing start directory', async t => {
  const root = await createTmpDir()
  await t.throwsAsync(findProjectRoot(join(root, 'missing')), {instanceOf: ConfigInvalidError})
})

// -- Descriptor --------------------------------------------------------------

test('loadDevContainer: reads JSON with comments', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'.devcontainer/devcontainer.json': descriptor})

  const devcontainer = await loadDevContainer(root)
  t.is(devcontainer.name, 'api')
  t.deepEqual(devcontainer.forwardPorts, [3000])
})

test('loadDevContainer: custom file name', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'.devcontainer/alt.json': '{"image": "alpine"}'})
  t.is((await loadDevContainer(root, 'alt.json')).image, 'alpine')
})

test('loadDevContainer: missing file', async t => {
  const root = await createTmpDir()
  const error = await t.throwsAsync(loadDevContainer(root), {instanceOf: ConfigMissingError})
  t.is(error?.file, join(root, '.devcontainer', 'devcontainer.json'))
})

test('loadDevContainer: invalid descriptor', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'.devcontainer/devcontainer.json': '{"image": "a", "build": {"dockerfile": "Dockerfile"}}'})
  await t.throwsAsync(loadDevContainer(root), {instanceOf: ConfigInvalidError})
})

// -- Settings ----------------------------------------------------------------

test('defaultSettingsPath: override, XDG then home', t => {
  t.is(defaultSettingsPath({DEVRUN_SETTINGS: '/etc/devrun.json'}), '/etc/devrun.json')
  t.is(defaultSettingsPath({XDG_CONFIG_HOME: '/cfg'}), join('/cfg', 'devrun', 'settings.json'))
})

test('loadSettings: missing file yields empty settings', async t => {
  const root = await createTmpDir()
  t.deepEqual(await loadSettings(join(root, 'settings.json')), {})
})

test('loadSettings: reads the file', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'settings.json': '{"application": {"cmd": "code ."}, "envs": {"EDITOR": "vim"},}'})

  const settings = await loadSettings(join(root, 'settings.json'))
  t.deepEqual(settings.application, {cmd: 'code .'})
  t.deepEqual(settings.envs, {EDITOR: 'vim'})
})

test('loadSettings: invalid content', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'bad.json': '{"forwardPorts": "3000"}', 'broken.json': '{"envs": '})

  await t.throwsAsync(loadSettings(join(root, 'bad.json')), {instanceOf: SettingsInvalidError})
  await t.throwsAsync(loadSettings(join(root, 'broken.json')), {instanceOf: SettingsInvalidError})
})

// -- Project -----------------------------------------------------------------

test('loadProject: root, descriptor and settings', async t => {
  const root = await createTmpDir()
  await writeTree(root, {
    '.devcontainer/devcontainer.json': descriptor,
    'settings.json': '{"forwardPorts": [9229]}',
    'src/.keep': ''
  })
  const {reporter, events} = recordingReporter()

  const loaded = await loadProject({path: join(root, 'src'), settingsPath: join(root, 'settings.json'), reporter})

  t.is(loaded.projectPath, root)
  t.is(loaded.devcontainer.image, 'node:20')
  t.deepEqual(loaded.settings.forwardPorts, [9229])
  t.deepEqual(events, [{event: 'PROJECT_LOADED', projectName: 'api', projectPath: root, mode: 'image'}])
})

test('loadProject: settings can be skipped', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'.devcontainer/devcontainer.json': descriptor, 'settings.json': '{"forwardPorts": "nope"}'})
  const {reporter, events} = recordingReporter()

  const loaded = await loadProject({path: root, loadSettings: false, settingsPath: join(root, 'settings.json'), reporter})

  t.deepEqual(loaded.settings, {})
  t.deepEqual(eventNames(events), ['SETTINGS_SKIPPED', 'PROJECT_LOADED'])
})
