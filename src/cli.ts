import { ProvisionError, type Provisioner } from "./provision";

export function exitCodeFor(error: unknown): number {
  return error instanceof ProvisionError ? error.exitCode : 1;
}

export async function runCli(provisioner: Pick<Provisioner, "run">): Promise<number> {
  try {
    await provisioner.run();
    return 0;
  } catch (error) {
    // step failures are already logged by the provisioner
    if (!(error instanceof ProvisionError)) {
      console.error("[provision] unexpected error:", error);
    }
    return exitCodeFor(error);
  }
}
