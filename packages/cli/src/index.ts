/**
 * @adbcam/cli
 * Interactive front end for an adbcam session
 */

export { runCli, createDefaultDependencies, isPromptCancel } from './cli';
export type { CliDependencies, InterruptHandle } from './cli';

export {
  SessionSelector,
  InquirerPrompter,
  orderResolutions,
  defaultResolution,
  defaultFps,
  defaultCamera,
  describeCamera,
} from './selection';
export type { Prompter, Choice, CameraLister } from './selection';

export {
  buildSessionConfiguration,
  ensureDevicePresent,
  offeredResolutions,
  offeredFps,
} from './session';
export type { SessionSelection, DiscoveredOptions, DevicePresence } from './session';

export { printBanner, printSummary, printError, printOutcome, describeOutcome, hintsOf } from './output';
