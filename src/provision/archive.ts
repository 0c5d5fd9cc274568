import fs from "fs/promises";
import { commandSucceeded, describeFailure } from "./commandRunner";
import { ExtractionFailedError } from "./errors";
import type { ArchiveExtractor, CommandResult, CommandRunner } from "./types";

export class UnzipExtractor implements ArchiveExtractor {
  constructor(
    private readonly runner: CommandRunner,
    private readonly unzipBin = "unzip"
  ) {}

  async extract(archivePath: string, destDir: string): Promise<void> {
    await fs.mkdir(destDir, { recursive: true });

    // -o: never stop at an overwrite prompt, stdin is closed
    let result: CommandResult;
    try {
      result = await this.runner.run(this.unzipBin, ["-q", "-o", archivePath, "-d", destDir]);
    } catch (error) {
      throw new ExtractionFailedError(archivePath, `${this.unzipBin}: ${(error as Error).message}`, null);
    }

    if (!commandSucceeded(result)) {
      throw new ExtractionFailedError(archivePath, describeFailure(result, "unzip failed"), result.code);
    }
  }
}
