import path from "path";
import type { Config } from "../config";
import type { ModelResource } from "./types";

const VOSK_ARCHIVE_FOLDER = "vosk-model-small-en-us-0.15";
const DETECTION_STAGING_FOLDER = "coco_ssd_mobilenet_v1_1.0_quant_2018_06_29";
const DETECTION_MODEL_ENTRY = "detect.tflite";

export function speechModelResource(config: Pick<Config, "modelsDir" | "voskModelUrl">): ModelResource {
  const { modelsDir } = config;
  return {
    id: "vosk",
    label: "Vosk",
    name: "Vosk small English model",
    kind: "directory",
    url: config.voskModelUrl,
    archivePath: path.join(modelsDir, "vosk.zip"),
    extractDir: modelsDir,
    extractedPath: path.join(modelsDir, VOSK_ARCHIVE_FOLDER),
    targetPath: path.join(modelsDir, "vosk"),
    cleanupPaths: []
  };
}

export function detectionModelResource(config: Pick<Config, "modelsDir" | "detectionModelUrl">): ModelResource {
  const { modelsDir } = config;
  const stagingDir = path.join(modelsDir, DETECTION_STAGING_FOLDER);
  return {
    id: "mobilenet_ssd",
    label: "TensorFlow Lite",
    name: "MobileNet SSD TFLite model",
    kind: "file",
    url: config.detectionModelUrl,
    archivePath: path.join(modelsDir, "mobilenet_ssd.zip"),
    extractDir: stagingDir,
    extractedPath: path.join(stagingDir, DETECTION_MODEL_ENTRY),
    targetPath: path.join(modelsDir, "mobilenet_ssd.tflite"),
    cleanupPaths: [stagingDir]
  };
}
