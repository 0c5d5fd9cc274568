export type CommandResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type CommandOptions = {
  cwd?: string;
  timeoutMs?: number;
};

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

export interface Downloader {
  download(url: string, destPath: string): Promise<number>;
}

export interface ArchiveExtractor {
  extract(archivePath: string, destDir: string): Promise<void>;
}

export interface DependencyInstaller {
  install(): Promise<void>;
}

/**
 * "directory": the archive's top-level folder becomes the target.
 * "file": one entry inside the extracted staging folder becomes the target.
 */
export type ModelResourceKind = "directory" | "file";

export type ModelResource = {
  id: string;
  /** Short label for progress lines, e.g. "Vosk". */
  label: string;
  name: string;
  kind: ModelResourceKind;
  url: string;
  archivePath: string;
  extractDir: string;
  extractedPath: string;
  targetPath: string;
  /** Extra paths removed after the target is in place. */
  cleanupPaths: string[];
};

export type StepName = "install-dependencies" | "speech-model" | "detection-model";

export type StepStatus = "installed" | "downloaded" | "skipped" | "failed";

export type StepOutcome = {
  step: StepName;
  status: StepStatus;
  durationMs: number;
  error?: string;
};
