import { RETRY_GUARDRAILS } from "../../core/retry/retry-envelopes";
import type {
    ActionsConfig,
    AssistantServiceConfig,
    AudioConfig,
    DeviceIdentityConfig,
    HardwareConfig,
    ValidationError,
    ValidationWarning,
} from "../../types/configuration";
import type { RetryEnvelope } from "../../types/retry";

export interface RuleContext {
  assistant: AssistantServiceConfig;
  device: DeviceIdentityConfig;
  audio: AudioConfig;
  retry: RetryEnvelope;
  actions: ActionsConfig;
  hardware: HardwareConfig;
}
export type RuleResult = { errors: ValidationError[]; warnings: ValidationWarning[] };
export type ValidationRule = (ctx: RuleContext) => RuleResult | Promise<RuleResult>;

function err(path: string, message: string, code: string, remediation?: string): ValidationError {
  return { path, message, code, severity: "error", remediation };
}

export const endpointRule: ValidationRule = ({ assistant }) => {
  const errors: ValidationError[] = []; const warnings: ValidationWarning[] = [];
  if (!/^wss?:\/\/[^\s/]+/.test(assistant.endpoint)) {
    errors.push(err("assistant.endpoint", "Assistant endpoint must be a ws:// or wss:// URL", "INVALID_ENDPOINT_FORMAT", "Example: wss://assistant.example.com/v1/assist"));
  } else if (assistant.endpoint.startsWith("ws://") && !/^ws:\/\/(localhost|127\.0\.0\.1|\[::1\])([:/]|$)/.test(assistant.endpoint)) {
    warnings.push({ path: "assistant.endpoint", message: "Access tokens will be sent without TLS", code: "INSECURE_ENDPOINT", remediation: "Use a wss:// endpoint outside local development." });
  }
  return { errors, warnings };
};

export const deadlineRule: ValidationRule = ({ assistant }) => {
  const errors: ValidationError[] = []; const warnings: ValidationWarning[] = [];
  if (!(assistant.deadlineSeconds > 0)) {
    errors.push(err("assistant.deadlineSeconds", "Deadline must be greater than zero", "OUT_OF_RANGE", "The default is 185 seconds."));
  } else if (assistant.deadlineSeconds < 10) {
    warnings.push({ path: "assistant.deadlineSeconds", message: "Short deadlines can cut off long answers", code: "DEADLINE_SHORT" });
  }
  return { errors, warnings };
};

export const audioFormatRule: ValidationRule = ({ audio }) => {
  const errors: ValidationError[] = []; const warnings: ValidationWarning[] = [];
  if (audio.iterSize % audio.sampleWidth !== 0) {
    errors.push(err("audio.iterSize", "Chunk size must be a whole number of samples", "ITER_SIZE_UNALIGNED", `Use a multiple of ${audio.sampleWidth} bytes.`));
  }
  if (audio.volumePercentage < 1 || audio.volumePercentage > 100) {
    errors.push(err("audio.volumePercentage", "Volume must be between 1 and 100", "OUT_OF_RANGE"));
  }
  if (audio.sampleRate !== 16000) {
    warnings.push({ path: "audio.sampleRate", message: "The service is tuned for 16000 Hz audio", code: "UNUSUAL_SAMPLE_RATE" });
  }
  return { errors, warnings };
};

export const retryRule: ValidationRule = ({ retry }) => {
  const errors: ValidationError[] = []; const warnings: ValidationWarning[] = [];
  if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < RETRY_GUARDRAILS.minAttempts || retry.maxAttempts > RETRY_GUARDRAILS.maxAttempts) {
    errors.push(err("retry.maxAttempts", `maxAttempts must be between ${RETRY_GUARDRAILS.minAttempts} and ${RETRY_GUARDRAILS.maxAttempts}`, "RETRY_ATTEMPTS_OUT_OF_RANGE"));
  }
  if (retry.initialDelayMs < RETRY_GUARDRAILS.minInitialDelayMs || retry.initialDelayMs > RETRY_GUARDRAILS.maxInitialDelayMs) {
    errors.push(err("retry.initialDelayMs", `initialDelayMs must be between ${RETRY_GUARDRAILS.minInitialDelayMs} and ${RETRY_GUARDRAILS.maxInitialDelayMs}`, "RETRY_DELAY_OUT_OF_RANGE"));
  }
  if (retry.policy === "exponential" && (retry.multiplier < RETRY_GUARDRAILS.minMultiplier || retry.multiplier > RETRY_GUARDRAILS.maxMultiplier)) {
    errors.push(err("retry.multiplier", `multiplier must be between ${RETRY_GUARDRAILS.minMultiplier} and ${RETRY_GUARDRAILS.maxMultiplier}`, "RETRY_MULTIPLIER_OUT_OF_RANGE"));
  }
  if (retry.maxDelayMs < RETRY_GUARDRAILS.minMaxDelayMs || retry.maxDelayMs > RETRY_GUARDRAILS.maxMaxDelayMs) {
    errors.push(err("retry.maxDelayMs", `maxDelayMs must be between ${RETRY_GUARDRAILS.minMaxDelayMs} and ${RETRY_GUARDRAILS.maxMaxDelayMs}`, "RETRY_DELAY_OUT_OF_RANGE"));
  }
  return { errors, warnings };
};

export const actionsRule: ValidationRule = ({ actions }) => {
  const errors: ValidationError[] = []; const warnings: ValidationWarning[] = [];
  if (!Number.isInteger(actions.maxConcurrent) || actions.maxConcurrent < 1) {
    errors.push(err("actions.maxConcurrent", "maxConcurrent must be a positive integer", "OUT_OF_RANGE"));
  }
  if (actions.commitReport && Object.keys(actions.commitReport.owners).length === 0) {
    warnings.push({ path: "actions.commitReport.owners", message: "No repositories are mapped to owners", code: "COMMIT_REPORT_NO_OWNERS", remediation: "Add repository to owner entries so reports can be requested." });
  }
  return { errors, warnings };
};

export const hardwareRule: ValidationRule = ({ hardware }) => {
  const errors: ValidationError[] = []; const warnings: ValidationWarning[] = [];
  if (hardware.enabled && !hardware.lightSensorPath && !hardware.humidityPath && !hardware.temperaturePath && !hardware.pressurePath) {
    warnings.push({ path: "hardware", message: "Hardware is enabled but no sensor paths are configured", code: "HARDWARE_NO_SENSORS" });
  }
  return { errors, warnings };
};

export const allRules: ValidationRule[] = [
  endpointRule,
  deadlineRule,
  audioFormatRule,
  retryRule,
  actionsRule,
  hardwareRule,
];
