import type { IGitModule } from "../git";
import type { Logger } from "../logger";

/**
 * User-facing progress lines printed by the runner
 */
export const COMMIT_PUSH_NOTICES = {
  staging: "Staging changes...",
  committing: (message: string) => `Committing ("${message}")...`,
  commitSkipped: "Nothing to commit or commit skipped; continuing.",
  pushing: "Pushing...",
} as const;

export type CommitPushModuleDependencies = {
  git: IGitModule;
  /** Sink for progress notices (stdout in the CLI) */
  log: (line: string) => void;
  /** Diagnostics; defaults to a "[CommitPush] " logger */
  logger?: Logger;
};

export type CommitPushOptions = {
  /** Raw argument tokens; joined into the commit message */
  messageParts: string[];
  remote: string;
  branch: string;
  /** Used when messageParts join to "" */
  defaultMessage?: string;
};

export type CommitPushResult = {
  message: string;
  /** false when staging reported a failure */
  staged: boolean;
  /** false when the commit was skipped */
  committed: boolean;
  commitHash?: string;
  remote: string;
  branch: string;
};
