import fs from "fs/promises";
import path from "path";
import type { Config } from "../config";
import { UnzipExtractor } from "./archive";
import { createAuditLog, type AuditSink } from "./auditLog";
import { SpawnCommandRunner } from "./commandRunner";
import { HttpDownloader } from "./downloader";
import { ExtractedPathMissingError, RelocateFailedError } from "./errors";
import { PipInstaller } from "./installer";
import { detectionModelResource, speechModelResource } from "./resources";
import type {
  ArchiveExtractor,
  DependencyInstaller,
  Downloader,
  ModelResource,
  StepName,
  StepOutcome,
  StepStatus
} from "./types";

export type ProvisionerOptions = {
  installer: DependencyInstaller;
  downloader: Downloader;
  extractor: ArchiveExtractor;
  speechModel: ModelResource;
  detectionModel: ModelResource;
  audit?: AuditSink;
};

/**
 * Runs install → speech model → detection model, stopping at the first failure.
 * An existing target is never re-validated or removed.
 */
export class Provisioner {
  constructor(private readonly options: ProvisionerOptions) {}

  async run(): Promise<StepOutcome[]> {
    const outcomes: StepOutcome[] = [];

    outcomes.push(
      await this.runStep("install-dependencies", async (): Promise<StepStatus> => {
        await this.installDependencies();
        return "installed";
      })
    );
    outcomes.push(await this.runStep("speech-model", () => this.ensureSpeechModel()));
    outcomes.push(await this.runStep("detection-model", () => this.ensureDetectionModel()));

    console.log("Setup complete!");
    return outcomes;
  }

  installDependencies(): Promise<void> {
    return this.options.installer.install();
  }

  ensureSpeechModel(): Promise<StepStatus> {
    return this.ensureModel(this.options.speechModel);
  }

  ensureDetectionModel(): Promise<StepStatus> {
    return this.ensureModel(this.options.detectionModel);
  }

  private async ensureModel(resource: ModelResource): Promise<StepStatus> {
    console.log(`Setting up ${resource.label} model...`);

    if (await targetExists(resource)) {
      console.log(`${resource.label} model already exists.`);
      return "skipped";
    }

    await fs.mkdir(path.dirname(resource.targetPath), { recursive: true });
    await removeAll([resource.archivePath, resource.extractedPath, ...resource.cleanupPaths]);

    console.log(`Downloading ${resource.name}...`);
    const bytes = await this.options.downloader.download(resource.url, resource.archivePath);
    console.log(`[provision] ${resource.id}: downloaded ${bytes} bytes`);

    await this.options.extractor.extract(resource.archivePath, resource.extractDir);

    if (!(await pathExists(resource.extractedPath))) {
      throw new ExtractedPathMissingError(resource.extractedPath);
    }

    try {
      await fs.rename(resource.extractedPath, resource.targetPath);
    } catch (error) {
      throw new RelocateFailedError(resource.extractedPath, resource.targetPath, (error as Error).message);
    }

    await removeAll([...resource.cleanupPaths, resource.archivePath]);
    return "downloaded";
  }

  private async runStep(step: StepName, action: () => Promise<StepStatus>): Promise<StepOutcome> {
    const startedAt = Date.now();
    let status: StepStatus;
    try {
      status = await action();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[provision] ${step} failed: ${message}`);
      this.writeAudit({ step, status: "failed", durationMs: Date.now() - startedAt, error: message });
      throw error;
    }

    const outcome: StepOutcome = { step, status, durationMs: Date.now() - startedAt };
    this.writeAudit(outcome);
    return outcome;
  }

  // the audit log never decides the outcome of a step
  private writeAudit(outcome: StepOutcome): void {
    if (!this.options.audit) {
      return;
    }
    try {
      this.options.audit(outcome);
    } catch (error) {
      console.warn(`[provision] audit write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export function createProvisioner(config: Config): Provisioner {
  const runner = new SpawnCommandRunner(config.commandTimeoutMs);
  return new Provisioner({
    installer: new PipInstaller(runner, {
      pythonBin: config.pythonBin,
      manifestPath: config.manifestPath,
      cwd: config.rootDir
    }),
    downloader: new HttpDownloader(),
    extractor: new UnzipExtractor(runner, config.unzipBin),
    speechModel: speechModelResource(config),
    detectionModel: detectionModelResource(config),
    audit: config.auditPath ? createAuditLog(config.auditPath) : undefined
  });
}

async function targetExists(resource: ModelResource): Promise<boolean> {
  try {
    const stats = await fs.stat(resource.targetPath);
    return resource.kind === "directory" ? stats.isDirectory() : stats.isFile();
  } catch {
    return false;
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function removeAll(paths: string[]): Promise<void> {
  for (const target of paths) {
    await fs.rm(target, { recursive: true, force: true });
  }
}
