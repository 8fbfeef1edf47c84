export {Project} from './project.js'
export type {ProjectOptions, UpOptions, DownOptions, RaceOutcome} from './project.js'
export {
  loadProject,
  loadDevContainer,
  loadSettings,
  findProjectRoot,
  defaultSettingsPath,
  defaultDescriptorFile
} from './project-loader.js'
export type {LoadProjectOptions, LoadedProject} from './project-loader.js'
export {
  parseDevContainer,
  parseSettings,
  validateDevContainer,
  getMode,
  getProjectName,
  formatImage
} from './descriptor.js'
export {parseMount, parseColonMount, parseCommaMount} from './mount-parser.js'
export {composeOverride, generateComposeOverride} from './compose-overlay.js'
export type {ComposeOverride, ComposeOverrideInput} from './compose-overlay.js'
export {buildContainerSpec, identityLabels, devcontainerEnvs} from './container-spec.js'
export {HookRunner} from './hook-runner.js'
export {materialize, probeContainerName} from './materializer.js'
export {provisionerFor, imageProvisioner, buildProvisioner, composeProvisioner} from './provisioners.js'
export type {Provisioner, ProvisionContext} from './provisioners.js'
export {requestOpenPort, resolveApplicationPort, applicationPortLabel} from './port-allocator.js'
export type {AllocatePort} from './port-allocator.js'
export {shouldStop, stopActionFor} from './shutdown.js'
export {watchProcessInterrupt} from './interrupt.js'
export type {InterruptWatch, WatchInterrupt} from './interrupt.js'
export {ConsoleReporter} from './reporter.js'
export type {Reporter, ProjectEvent, HookSource} from './reporter.js'
export {formatDuration} from './utils.js'
