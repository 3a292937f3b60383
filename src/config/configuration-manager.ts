import { readFile } from "fs/promises";
import { ConfigurationError, errorMessage } from "../core/errors";
import type { Logger } from "../core/logger";
import type { ServiceInitializable } from "../core/service-initializable";
import type {
  ActionsConfig,
  AssistantServiceConfig,
  AudioConfig,
  ClientConfiguration,
  DeviceIdentityConfig,
  HardwareConfig,
  LoggingConfig,
  ValidationResult,
} from "../types/configuration";
import type { RetryEnvelope } from "../types/retry";
import {
  LayeredConfigurationSource,
  toConfigurationLayer,
  type ConfigurationLayer,
} from "./configuration-source";
import { readEnvironmentLayer } from "./environment-layer";
import { ActionsSection } from "./sections/actions-config-section";
import { AssistantSection } from "./sections/assistant-config-section";
import { AudioSection } from "./sections/audio-config-section";
import { DeviceSection } from "./sections/device-config-section";
import { HardwareSection } from "./sections/hardware-config-section";
import { LoggingSection } from "./sections/logging-config-section";
import { RetrySection } from "./sections/retry-config-section";
import { ConfigurationValidator } from "./validators/configuration-validator";

export interface ConfigurationManagerOptions {
  /** JSON file with one object per section. */
  configFile?: string;
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Values from the command line; highest precedence. */
  overrides?: ConfigurationLayer;
}

type SectionKey = keyof ClientConfiguration;

/**
 * Central configuration manager. Responsibilities:
 *  - Merge the config file, environment and command line layers
 *  - Provide typed accessors to configuration sections
 *  - Cache values for fast repeated access
 *  - Reject invalid configuration before any component starts
 */
export class ConfigurationManager implements ServiceInitializable {
  private initialized = false;
  private cache: Partial<ClientConfiguration> = {};
  private readonly source = new LayeredConfigurationSource();
  private lastValidation: ValidationResult | undefined;

  private readonly assistantSection = new AssistantSection();
  private readonly deviceSection = new DeviceSection();
  private readonly audioSection = new AudioSection();
  private readonly retrySection = new RetrySection();
  private readonly actionsSection = new ActionsSection();
  private readonly hardwareSection = new HardwareSection();
  private readonly loggingSection = new LoggingSection();
  private readonly validator: ConfigurationValidator;

  constructor(
    private readonly logger: Logger,
    private readonly options: ConfigurationManagerOptions = {},
  ) {
    this.validator = new ConfigurationValidator(this.logger, {
      getAssistant: () => this.getAssistantConfig(),
      getDevice: () => this.getDeviceConfig(),
      getAudio: () => this.getAudioConfig(),
      getRetry: () => this.getRetryConfig(),
      getActions: () => this.getActionsConfig(),
      getHardware: () => this.getHardwareConfig(),
      getLogging: () => this.getLoggingConfig(),
    });
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    if (this.options.configFile) {
      this.source.addLayer("file", await this.readConfigFile(this.options.configFile));
    }
    this.source.addLayer("environment", readEnvironmentLayer(this.options.env ?? process.env));
    if (this.options.overrides) {
      this.source.addLayer("cli", this.options.overrides);
    }

    const structural = this.validator.validateRaw(this.source.merged());
    if (!structural.isValid) {
      this.lastValidation = structural;
      throw new ConfigurationError(
        `Configuration is invalid: ${structural.errors.map((e) => e.message).join("; ")}`,
        structural.errors,
      );
    }

    this.cache = {};
    this.lastValidation = await this.validator.validateAll();
    for (const warning of this.lastValidation.warnings) {
      this.logger.warn("Configuration warning", warning);
    }
    if (!this.lastValidation.isValid) {
      throw new ConfigurationError(
        `Configuration is invalid: ${this.lastValidation.errors.map((e) => `${e.path}: ${e.message}`).join("; ")}`,
        this.lastValidation.errors,
      );
    }
    this.logger.debug("Configuration loaded", { layers: this.source.layerNames });
    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  dispose(): void {
    this.cache = {};
    this.initialized = false;
  }

  // Accessors --------------------------------------------------------------
  getAssistantConfig(): AssistantServiceConfig {
    return this.cached("assistant", () => this.assistantSection.read(this.source));
  }
  getDeviceConfig(): DeviceIdentityConfig {
    return this.cached("device", () => this.deviceSection.read(this.source));
  }
  getAudioConfig(): AudioConfig {
    return this.cached("audio", () => this.audioSection.read(this.source));
  }
  getRetryConfig(): RetryEnvelope {
    return this.cached("retry", () => this.retrySection.read(this.source));
  }
  getActionsConfig(): ActionsConfig {
    return this.cached("actions", () => this.actionsSection.read(this.source));
  }
  getHardwareConfig(): HardwareConfig {
    return this.cached("hardware", () => this.hardwareSection.read(this.source));
  }
  getLoggingConfig(): LoggingConfig {
    return this.cached("logging", () => this.loggingSection.read(this.source));
  }

  getConfiguration(): ClientConfiguration {
    return {
      assistant: this.getAssistantConfig(),
      device: this.getDeviceConfig(),
      audio: this.getAudioConfig(),
      retry: this.getRetryConfig(),
      actions: this.getActionsConfig(),
      hardware: this.getHardwareConfig(),
      logging: this.getLoggingConfig(),
    };
  }

  getDiagnostics(): ValidationResult | undefined {
    return this.lastValidation;
  }

  // Internal ---------------------------------------------------------------
  private cached<K extends SectionKey>(key: K, loader: () => ClientConfiguration[K]): ClientConfiguration[K] {
    const hit = this.cache[key];
    if (hit !== undefined) {
      return hit;
    }
    const value = loader();
    this.cache[key] = value;
    return value;
  }

  private async readConfigFile(path: string): Promise<ConfigurationLayer> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error: unknown) {
      throw new ConfigurationError(
        `Cannot read config file ${path}: ${errorMessage(error)}`,
        [{ path: "configFile", message: `Cannot read ${path}`, code: "CONFIG_FILE_UNREADABLE", severity: "error", remediation: "Pass an existing JSON file with --config." }],
        { cause: error },
      );
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error: unknown) {
      throw new ConfigurationError(
        `Config file ${path} is not valid JSON: ${errorMessage(error)}`,
        [{ path: "configFile", message: "Invalid JSON", code: "CONFIG_FILE_INVALID_JSON", severity: "error" }],
        { cause: error },
      );
    }
    const layer = toConfigurationLayer(parsed);
    if (!layer) {
      throw new ConfigurationError(
        `Config file ${path} must hold an object of section objects`,
        [{ path: "configFile", message: "Expected an object of section objects", code: "CONFIG_FILE_INVALID_SHAPE", severity: "error" }],
      );
    }
    return layer;
  }
}
