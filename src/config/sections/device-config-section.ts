import { homedir } from "os";
import { join } from "path";
import type { DeviceIdentityConfig } from "../../types/configuration";
import type { LayeredConfigurationSource } from "../configuration-source";

export const DEFAULT_DEVICE_CONFIG_PATH = join(
  homedir(),
  ".config",
  "assistant-turn",
  "device_config.json",
);

export class DeviceSection {
  read(source: LayeredConfigurationSource): DeviceIdentityConfig {
    const c = source.getSection("device");
    return {
      modelId: c.optionalString("modelId"),
      id: c.optionalString("id"),
      configPath: c.string("configPath", DEFAULT_DEVICE_CONFIG_PATH),
    };
  }
}
