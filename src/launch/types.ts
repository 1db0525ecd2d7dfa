export type Platform = NodeJS.Platform;

export type EnvEntry = readonly [name: string, value: string];

/** What the host needs to spawn the agent; built once and never mutated. */
export interface LaunchCommand {
  readonly executable: string;
  readonly args: readonly string[];
  readonly env: readonly EnvEntry[];
}

export type LaunchStrategyKind = 'script' | 'module';

export interface LaunchStrategy {
  strategy: LaunchStrategyKind;
  executable: string;
  args: string[];
}

export type FileExists = (path: string) => boolean;
