export { CommitPushModule } from "./commit_push_module";
export { COMMIT_PUSH_NOTICES } from "./types";
export type {
  CommitPushModuleDependencies,
  CommitPushOptions,
  CommitPushResult,
} from "./types";
export { PushFailedError } from "./errors";
