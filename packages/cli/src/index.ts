/**
 * @notesync/cli - CLI for NoteSync
 */

export {
  runJobs,
  runWorkspaceJobs,
  openWorkspace,
  createManagerForJob,
  createPollerForJob,
  engineConfigForJob,
  executorFor,
  selectJobs,
  recordPass,
  summarizeReport,
  type JobRunResult,
  type RunJobsOptions,
  type Workspace,
} from "./runner.js";
export { loadConfigFile, parseConfigText, expandEnvironmentVariables, validateConfig } from "./parser.js";
export { loadRemote, loadCursorStore, loadSnapshot, writeRecords, type LoadedRemote } from "./loaders.js";
export type {
  ConfigFile,
  JobConfigRaw,
  RemoteConfigRaw,
  StateConfigRaw,
  EngineConfigRaw,
  PollConfigRaw,
} from "./config.js";
