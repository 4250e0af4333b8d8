export { DEFAULT_COMMIT_MESSAGE, resolveCommitMessage } from './commit_message';
