import type { ConfigurationLayer } from "./configuration-source";

type EnvValueType = "string" | "number" | "boolean";

interface EnvBinding {
  variable: string;
  section: string;
  key: string;
  type: EnvValueType;
}

export const ENVIRONMENT_BINDINGS: readonly EnvBinding[] = [
  { variable: "ASSISTANT_ENDPOINT", section: "assistant", key: "endpoint", type: "string" },
  { variable: "ASSISTANT_LANGUAGE", section: "assistant", key: "languageCode", type: "string" },
  { variable: "ASSISTANT_DEADLINE_SECONDS", section: "assistant", key: "deadlineSeconds", type: "number" },
  { variable: "ASSISTANT_DISPLAY", section: "assistant", key: "displayEnabled", type: "boolean" },
  { variable: "ASSISTANT_CREDENTIALS", section: "assistant", key: "credentialsPath", type: "string" },
  { variable: "ASSISTANT_ACCESS_TOKEN", section: "assistant", key: "accessToken", type: "string" },
  { variable: "ASSISTANT_DEVICE_ID", section: "device", key: "id", type: "string" },
  { variable: "ASSISTANT_DEVICE_MODEL_ID", section: "device", key: "modelId", type: "string" },
  { variable: "ASSISTANT_DEVICE_CONFIG", section: "device", key: "configPath", type: "string" },
  { variable: "ASSISTANT_RETRY_MAX_ATTEMPTS", section: "retry", key: "maxAttempts", type: "number" },
  { variable: "ASSISTANT_HARDWARE", section: "hardware", key: "enabled", type: "boolean" },
  { variable: "ASSISTANT_LOG_LEVEL", section: "logging", key: "level", type: "string" },
];

/**
 * Values that do not parse are kept as strings so schema validation reports them.
 */
function convert(raw: string, type: EnvValueType): unknown {
  switch (type) {
    case "number": {
      const value = Number(raw);
      return raw.trim() !== "" && Number.isFinite(value) ? value : raw;
    }
    case "boolean":
      if (/^(1|true|yes|on)$/i.test(raw)) {
        return true;
      }
      if (/^(0|false|no|off)$/i.test(raw)) {
        return false;
      }
      return raw;
    default:
      return raw;
  }
}

export function readEnvironmentLayer(env: NodeJS.ProcessEnv = process.env): ConfigurationLayer {
  const layer: ConfigurationLayer = {};
  for (const binding of ENVIRONMENT_BINDINGS) {
    const raw = env[binding.variable];
    if (raw === undefined || raw === "") {
      continue;
    }
    (layer[binding.section] ??= {})[binding.key] = convert(raw, binding.type);
  }
  return layer;
}
