/**
 * ConfigManager Types
 */

/**
 * Fully resolved run settings
 */
export type QuickpushConfig = {
  /** Remote to push to */
  remote: string;
  /** Remote branch to push to and record as upstream */
  branch: string;
  /** Commit message used when no message is given */
  defaultMessage: string;
  /** Wait for a keypress before exiting */
  pause: boolean;
};

/**
 * Contents of .quickpush.json; every field is optional
 */
export type QuickpushConfigFile = Partial<QuickpushConfig>;

/**
 * Values supplied on the command line. `undefined` means "not given".
 */
export type ConfigOverrides = {
  remote?: string | undefined;
  branch?: string | undefined;
  defaultMessage?: string | undefined;
  pause?: boolean | undefined;
};

export interface IConfigManager {
  loadConfig(): Promise<QuickpushConfigFile | null>;
  resolveConfig(overrides?: ConfigOverrides): Promise<QuickpushConfig>;
}
