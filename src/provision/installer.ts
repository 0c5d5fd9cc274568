import fs from "fs/promises";
import path from "path";
import { commandSucceeded, describeFailure } from "./commandRunner";
import { InstallFailedError, ManifestMissingError } from "./errors";
import type { CommandResult, CommandRunner, DependencyInstaller } from "./types";

export type PipInstallerConfig = {
  pythonBin: string;
  manifestPath: string;
  cwd: string;
};

/**
 * Installs the packages listed in a requirements manifest with `python -m pip`.
 */
export class PipInstaller implements DependencyInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly config: PipInstallerConfig
  ) {}

  async install(): Promise<void> {
    const { manifestPath, pythonBin, cwd } = this.config;
    try {
      await fs.access(manifestPath, fs.constants.R_OK);
    } catch {
      throw new ManifestMissingError(manifestPath);
    }

    console.log(`Installing Python dependencies from ${path.basename(manifestPath)}...`);

    let result: CommandResult;
    try {
      result = await this.runner.run(
        pythonBin,
        ["-m", "pip", "install", "--disable-pip-version-check", "-r", manifestPath],
        { cwd }
      );
    } catch (error) {
      throw new InstallFailedError(`${pythonBin}: ${(error as Error).message}`, null);
    }

    if (!commandSucceeded(result)) {
      throw new InstallFailedError(describeFailure(result, "pip install failed"), result.code);
    }
  }
}
