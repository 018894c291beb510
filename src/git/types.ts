/**
 * The version-control operations publishing needs. Everything else about the
 * repository stays opaque.
 */
export interface VersionControl {
  /** Whether the tool can be started at all. */
  isAvailable(): Promise<boolean>;
  /** Whether the working directory itself holds repository metadata. */
  isInitialized(): Promise<boolean>;
  init(): Promise<void>;
  stageAll(): Promise<void>;
  commit(message: string): Promise<void>;
  /** Whether the working tree or index differs from the last commit. */
  hasChanges(): Promise<boolean>;
  /** Whether the index holds anything a commit would record. */
  hasStagedChanges(): Promise<boolean>;
  getRemoteUrl(remote: string): Promise<string | undefined>;
  /** Empty string when HEAD is detached. */
  getCurrentBranch(): Promise<string>;
  renameBranch(name: string): Promise<void>;
  pushWithUpstream(remote: string, branch: string): Promise<void>;
}

export interface RepositoryState {
  isInitialized: boolean;
  hasUncommittedChanges: boolean;
  remoteUrl?: string;
  currentBranch: string;
}
