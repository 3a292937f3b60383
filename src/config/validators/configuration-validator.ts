import { errorMessage } from "../../core/errors";
import type { Logger } from "../../core/logger";
import { validateAgainstSchema } from "../../core/schema-registry";
import type { ConfigurationAccessors, ValidationError, ValidationResult, ValidationWarning } from "../../types/configuration";
import type { ConfigurationLayer } from "../configuration-source";
import { allRules, type RuleContext } from "./validation-rules";

export class ConfigurationValidator {
  constructor(private readonly logger: Logger, private readonly access: ConfigurationAccessors) {}

  /**
   * Structural check of the merged layers before any section is read.
   */
  validateRaw(merged: ConfigurationLayer): ValidationResult {
    const result = validateAgainstSchema("client-configuration", merged);
    const errors: ValidationError[] = result.errors.map((message) => ({
      path: message.split(" ")[0].replace(/^\//, "").replace(/\//g, ".") || "*",
      message,
      code: "SCHEMA_VIOLATION",
      severity: "error",
      remediation: "Fix the value in the config file, environment or command line.",
    }));
    return { isValid: errors.length === 0, errors, warnings: [] };
  }

  async validateAll(): Promise<ValidationResult> {
    const ctx: RuleContext = {
      assistant: this.access.getAssistant(),
      device: this.access.getDevice(),
      audio: this.access.getAudio(),
      retry: this.access.getRetry(),
      actions: this.access.getActions(),
      hardware: this.access.getHardware(),
    };
    const errors: ValidationError[] = []; const warnings: ValidationWarning[] = [];
    for (const rule of allRules) {
      try {
        const res = await rule(ctx);
        errors.push(...res.errors);
        warnings.push(...res.warnings);
      } catch (error: unknown) {
        this.logger.error("Validation rule failed", { rule: rule.name, error: errorMessage(error) });
        errors.push({ path: "*", message: "Internal validation error", code: "INTERNAL_VALIDATION_ERROR", severity: "error" });
      }
    }
    return { isValid: errors.length === 0, errors, warnings };
  }
}
