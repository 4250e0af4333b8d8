import { Command } from 'commander';
import { PushCommand } from './push-command';

/**
 * Registers the push flow as the program's default action
 */
export function registerPushCommand(program: Command): PushCommand {
  const pushCommand = new PushCommand();
  pushCommand.register(program);
  return pushCommand;
}
