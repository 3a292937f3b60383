import type { LogLevel } from "../core/logger";
import type { RetryEnvelope } from "./retry";

/**
 * Connection settings for the remote assistant service.
 */
export interface AssistantServiceConfig {
  /** WebSocket endpoint of the assist service (`ws://` or `wss://`). */
  endpoint: string;
  /** BCP-47 language code sent with every turn. */
  languageCode: string;
  /** Deadline applied to one duplex assist call, in seconds. */
  deadlineSeconds: number;
  /** Requests screen output and forwards it to the display collaborator. */
  displayEnabled: boolean;
  /** Path of a JSON credentials file holding an access token. */
  credentialsPath?: string;
  /** Access token supplied directly (environment or CLI). Takes precedence over the file. */
  accessToken?: string;
}

/**
 * Identity of this device as registered with the assistant service.
 */
export interface DeviceIdentityConfig {
  /** Device model identifier; read from the device config file when omitted. */
  modelId?: string;
  /** Device instance identifier; read from the device config file when omitted. */
  id?: string;
  /** Location of the `{ id, model_id }` device config file. */
  configPath: string;
}

/**
 * Audio format and source/sink selection.
 */
export interface AudioConfig {
  /** Sample rate for both recording and playback, in hertz. */
  sampleRate: number;
  /** Bytes per sample. Only 16-bit linear PCM is streamed. */
  sampleWidth: 2;
  /** Bytes read from the source for each outbound audio chunk. */
  iterSize: number;
  /** Initial output volume, 1-100. */
  volumePercentage: number;
  /** Recorder writing raw PCM to stdout; `{rate}` is replaced by the sample rate. */
  captureCommand: string[];
  /** Player reading raw PCM from stdin; `{rate}` is replaced by the sample rate. */
  playbackCommand: string[];
  /** Raw PCM file used instead of live capture. */
  inputFile?: string;
  /** Raw PCM file used instead of live playback. */
  outputFile?: string;
}

/**
 * Credentials and owner mapping used by the commit count report action.
 */
export interface CommitReportConfig {
  endpoint: string;
  /** Reporting target forwarded to the workflow; defaults to the repository owner. */
  target?: string;
  username?: string;
  password?: string;
  /** Repository name to owner login. */
  owners: Record<string, string>;
  timeoutMs: number;
}

/**
 * Local device action execution settings.
 */
export interface ActionsConfig {
  /** Maximum number of device commands executing at the same time. */
  maxConcurrent: number;
  /** Executable and arguments run for `OnOff` with `on: true`. */
  onCommand?: string[];
  /** Executable and arguments run for `OnOff` with `on: false`. */
  offCommand?: string[];
  /** Executable and arguments used to speak text; the text is appended as last argument. */
  speechCommand?: string[];
  commitReport?: CommitReportConfig;
}

/**
 * Optional sensor and indicator hardware exposed through sysfs-style files.
 */
export interface HardwareConfig {
  enabled: boolean;
  lightSensorPath?: string;
  /** Maximum raw value of the light sensor ADC; used to compute a percentage. */
  lightSensorMaxRaw: number;
  humidityPath?: string;
  temperaturePath?: string;
  pressurePath?: string;
  indicatorPath?: string;
  /** Reference pressure used for the barometric altitude estimate, in pascals. */
  seaLevelPressurePa: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

/**
 * Fully resolved client configuration.
 */
export interface ClientConfiguration {
  assistant: AssistantServiceConfig;
  device: DeviceIdentityConfig;
  audio: AudioConfig;
  retry: RetryEnvelope;
  actions: ActionsConfig;
  hardware: HardwareConfig;
  logging: LoggingConfig;
}

/**
 * Non-blocking configuration issue surfaced as a log warning.
 */
export interface ValidationWarning {
  /** Configuration path that triggered the warning. */
  path: string;
  /** Human-readable warning details. */
  message: string;
  /** Project-specific identifier describing the warning category. */
  code: string;
  /** Optional remediation guidance that can be surfaced to the user. */
  remediation?: string;
}

/**
 * Blocking validation failure; any of these aborts startup.
 */
export interface ValidationError {
  /** Configuration path that failed validation. */
  path: string;
  /** Human-readable error details. */
  message: string;
  /** Project-specific identifier describing the error category. */
  code: string;
  severity: "error";
  /** Optional remediation guidance that can be surfaced to the user. */
  remediation?: string;
}

export interface ValidationResult {
  /** Indicates whether the configuration passed validation. */
  isValid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Typed accessors consumed by the configuration validator.
 */
export interface ConfigurationAccessors {
  getAssistant(): AssistantServiceConfig;
  getDevice(): DeviceIdentityConfig;
  getAudio(): AudioConfig;
  getRetry(): RetryEnvelope;
  getActions(): ActionsConfig;
  getHardware(): HardwareConfig;
  getLogging(): LoggingConfig;
}
