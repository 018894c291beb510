export type PublishStage = 'init' | 'stage' | 'commit' | 'set-remote' | 'push';

export type StepName = 'init' | 'stage' | 'commit' | 'rename-branch' | 'push';

export interface StepRecord {
  step: StepName;
  outcome: 'done' | 'skipped';
  detail: string;
}

export interface PushedReport {
  kind: 'pushed';
  remoteUrl: string;
  branch: string;
  steps: StepRecord[];
}

export interface ManualActionReport {
  kind: 'manual-action-required';
  /** Commands to run in order, verbatim. */
  suggestedCommands: string[];
  steps: StepRecord[];
}

export interface ToolNotFoundReport {
  kind: 'tool-not-found';
  installHint: string;
}

export interface ActionFailedReport {
  kind: 'action-failed';
  stage: PublishStage;
  underlyingMessage: string;
  steps: StepRecord[];
}

export type PublishReport =
  | PushedReport
  | ManualActionReport
  | ToolNotFoundReport
  | ActionFailedReport;

export interface ExitCodeOptions {
  failOnManual?: boolean;
}

/**
 * Pushed and manual-action-required are both successful runs unless the
 * caller asks to tell them apart.
 */
export function exitCodeFor(report: PublishReport, options: ExitCodeOptions = {}): number {
  switch (report.kind) {
    case 'pushed':
      return 0;
    case 'manual-action-required':
      return options.failOnManual ? 2 : 0;
    case 'tool-not-found':
    case 'action-failed':
      return 1;
  }
}
