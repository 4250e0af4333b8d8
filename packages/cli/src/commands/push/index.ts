export { PushCommand } from './push-command';
export type { PushCommandOptions } from './push-command';
export { registerPushCommand } from './push';
