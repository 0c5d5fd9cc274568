export { Provisioner, createProvisioner } from "./provisioner";
export type { ProvisionerOptions } from "./provisioner";
export { PipInstaller } from "./installer";
export { HttpDownloader } from "./downloader";
export { UnzipExtractor } from "./archive";
export { SpawnCommandRunner } from "./commandRunner";
export { createAuditLog } from "./auditLog";
export { speechModelResource, detectionModelResource } from "./resources";
export * from "./errors";
export type * from "./types";
