import { readFile } from "fs/promises";
import { ConfigurationError, errorMessage } from "../core/errors";
import { isRecord } from "../core/guards";
import type { DeviceIdentityConfig } from "../types/configuration";

export interface DeviceIdentity {
  id: string;
  modelId: string;
}

/**
 * Resolves the device identity. Explicit values win over the device config
 * file, which is only read when one of them is missing.
 */
export async function resolveDeviceIdentity(
  config: DeviceIdentityConfig,
  read: (path: string) => Promise<string> = (path) => readFile(path, "utf8"),
): Promise<DeviceIdentity> {
  if (config.id && config.modelId) {
    return { id: config.id, modelId: config.modelId };
  }

  let text: string;
  try {
    text = await read(config.configPath);
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Device identifiers are not configured and ${config.configPath} cannot be read: ${errorMessage(error)}`,
      [
        {
          path: "device",
          message: "Missing device id and model id",
          code: "DEVICE_IDENTITY_MISSING",
          severity: "error",
          remediation: "Pass --device-id and --device-model-id or register the device and save its config file.",
        },
      ],
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw new ConfigurationError(`Device config ${config.configPath} is not valid JSON`, [], { cause: error });
  }
  const fileId = isRecord(parsed) && typeof parsed.id === "string" ? parsed.id : undefined;
  const fileModelId = isRecord(parsed) && typeof parsed.model_id === "string" ? parsed.model_id : undefined;

  const id = config.id ?? fileId;
  const modelId = config.modelId ?? fileModelId;
  if (!id || !modelId) {
    throw new ConfigurationError(
      `Device config ${config.configPath} must contain "id" and "model_id"`,
      [
        {
          path: "device",
          message: "Incomplete device config file",
          code: "DEVICE_IDENTITY_INCOMPLETE",
          severity: "error",
        },
      ],
    );
  }
  return { id, modelId };
}
