export * as CommitMessage from "./commit_message";
export * as CommitPush from "./commit_push";
export * as Config from "./config_manager";
export * as Git from "./git";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as Validation from "./validation";

// Backend-specific implementations
export * as Fs from "./fs";
export * as Memory from "./memory";
