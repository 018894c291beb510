export { publish, type PublishContext, type PublishOptions } from './publisher.js';
export {
  exitCodeFor,
  type ActionFailedReport,
  type ExitCodeOptions,
  type ManualActionReport,
  type PublishReport,
  type PublishStage,
  type PushedReport,
  type StepName,
  type StepRecord,
  type ToolNotFoundReport,
} from './report.js';
export {
  INSTALL_HINT,
  OWNER_PLACEHOLDER,
  REPOSITORY_PLACEHOLDER,
  buildManualCommands,
  buildRemoteUrl,
  shellQuote,
  toRepositoryName,
  type ManualCommandsInput,
  type RemoteTemplate,
} from './templates.js';
