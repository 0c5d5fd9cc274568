export const ProvisionErrorCode = {
  MANIFEST_MISSING: "PROVISION_001",
  INSTALL_FAILED: "PROVISION_002",
  DOWNLOAD_FAILED: "PROVISION_003",
  EXTRACTION_FAILED: "PROVISION_004",
  EXTRACTED_PATH_MISSING: "PROVISION_005",
  RELOCATE_FAILED: "PROVISION_006"
} as const;

export type ProvisionErrorCodeType = (typeof ProvisionErrorCode)[keyof typeof ProvisionErrorCode];

/**
 * Base error for a failed provisioning step.
 * `exitCode` is what the CLI exits with: the failing tool's own code when there is one.
 */
export class ProvisionError extends Error {
  readonly code: ProvisionErrorCodeType;
  readonly exitCode: number;

  constructor(
    code: ProvisionErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    exitCode?: number | null
  ) {
    super(message);
    this.code = code;
    this.exitCode = typeof exitCode === "number" && exitCode > 0 ? exitCode : 1;
    this.name = "ProvisionError";
  }
}

export class ManifestMissingError extends ProvisionError {
  constructor(manifestPath: string) {
    super(ProvisionErrorCode.MANIFEST_MISSING, `Dependency manifest not found: ${manifestPath}`, {
      manifestPath
    });
    this.name = "ManifestMissingError";
  }
}

export class InstallFailedError extends ProvisionError {
  constructor(detail: string, exitCode: number | null) {
    super(
      ProvisionErrorCode.INSTALL_FAILED,
      `Dependency install failed${exitCode !== null ? ` (exit ${exitCode})` : ""}: ${detail}`,
      { detail, exitCode },
      exitCode
    );
    this.name = "InstallFailedError";
  }
}

export class DownloadFailedError extends ProvisionError {
  constructor(url: string, reason: string) {
    super(ProvisionErrorCode.DOWNLOAD_FAILED, `Failed to download ${url}: ${reason}`, { url, reason });
    this.name = "DownloadFailedError";
  }
}

export class ExtractionFailedError extends ProvisionError {
  constructor(archivePath: string, detail: string, exitCode: number | null) {
    super(
      ProvisionErrorCode.EXTRACTION_FAILED,
      `Failed to extract ${archivePath}${exitCode !== null ? ` (exit ${exitCode})` : ""}: ${detail}`,
      { archivePath, detail, exitCode },
      exitCode
    );
    this.name = "ExtractionFailedError";
  }
}

/**
 * The archive unpacked, but not into the layout we expect (upstream changed it).
 */
export class ExtractedPathMissingError extends ProvisionError {
  constructor(expectedPath: string) {
    super(
      ProvisionErrorCode.EXTRACTED_PATH_MISSING,
      `Expected ${expectedPath} after extraction, but it does not exist`,
      { expectedPath }
    );
    this.name = "ExtractedPathMissingError";
  }
}

export class RelocateFailedError extends ProvisionError {
  constructor(from: string, to: string, reason: string) {
    super(ProvisionErrorCode.RELOCATE_FAILED, `Failed to move ${from} to ${to}: ${reason}`, {
      from,
      to,
      reason
    });
    this.name = "RelocateFailedError";
  }
}
