import path from "path";

export const DEFAULT_VOSK_MODEL_URL = "https://alphacephei.com/vosk/models/vosk-model-small-en-us-0.15.zip";
export const DEFAULT_DETECTION_MODEL_URL =
  "https://storage.googleapis.com/download.tensorflow.org/models/tflite/coco_ssd_mobilenet_v1_1.0_quant_2018_06_29.zip";

export type Config = {
  rootDir: string;
  manifestPath: string;
  pythonBin: string;
  unzipBin: string;
  modelsDir: string;
  voskModelUrl: string;
  detectionModelUrl: string;
  auditPath?: string;
  commandTimeoutMs?: number;
};

type Env = Record<string, string | undefined>;

export function loadConfig(overrides?: Partial<Config>, env: Env = process.env): Config {
  const rootDir = path.resolve(overrides?.rootDir ?? env.PROVISION_ROOT ?? process.cwd());
  const auditPath = overrides?.auditPath ?? env.PROVISION_AUDIT_PATH ?? "";

  return {
    rootDir,
    manifestPath: path.resolve(rootDir, overrides?.manifestPath ?? env.PROVISION_MANIFEST ?? "requirements.txt"),
    pythonBin: overrides?.pythonBin ?? env.PROVISION_PYTHON ?? "python3",
    unzipBin: overrides?.unzipBin ?? env.PROVISION_UNZIP ?? "unzip",
    modelsDir: path.resolve(rootDir, overrides?.modelsDir ?? env.PROVISION_MODELS_DIR ?? "models"),
    voskModelUrl: overrides?.voskModelUrl ?? env.VOSK_MODEL_URL ?? DEFAULT_VOSK_MODEL_URL,
    detectionModelUrl: overrides?.detectionModelUrl ?? env.DETECTION_MODEL_URL ?? DEFAULT_DETECTION_MODEL_URL,
    // no path, no audit log
    auditPath: auditPath.trim() ? path.resolve(rootDir, auditPath) : undefined,
    commandTimeoutMs: overrides?.commandTimeoutMs ?? parseInteger(env.PROVISION_COMMAND_TIMEOUT_MS)
  };
}

function parseInteger(input: string | undefined): number | undefined {
  if (!input) {
    return undefined;
  }
  const value = Number.parseInt(input, 10);
  if (!Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return value;
}
