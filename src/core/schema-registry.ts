import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import assistResponseFrameSchema from "../../resources/schemas/assist-response-frame.schema.json";
import clientConfigurationSchema from "../../resources/schemas/client-configuration.schema.json";
import deviceExecutionSchema from "../../resources/schemas/device-execution.schema.json";
import deviceRequestSchema from "../../resources/schemas/device-request.schema.json";

export type SchemaName =
  | "assist-response-frame"
  | "client-configuration"
  | "device-execution"
  | "device-request";

const SCHEMAS: Record<SchemaName, object> = {
  "assist-response-frame": assistResponseFrameSchema,
  "client-configuration": clientConfigurationSchema,
  "device-execution": deviceExecutionSchema,
  "device-request": deviceRequestSchema,
};

export interface SchemaValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Compiles the bundled JSON schemas once and validates values against them.
 */
class SchemaRegistry {
  private readonly ajv: Ajv;
  private readonly validators = new Map<SchemaName, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      strict: false,
    });
    addFormats(this.ajv);
  }

  validate(name: SchemaName, value: unknown): SchemaValidationResult {
    const validator = this.getValidator(name);
    if (validator(value)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: formatErrors(validator.errors) };
  }

  private getValidator(name: SchemaName): ValidateFunction {
    let validator = this.validators.get(name);
    if (!validator) {
      validator = this.ajv.compile(SCHEMAS[name]);
      this.validators.set(name, validator);
    }
    return validator;
  }
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return [];
  }
  return errors.map((error) => {
    const path = error.instancePath || "/";
    return `${path} ${error.message ?? "is invalid"}`.trim();
  });
}

const registry = new SchemaRegistry();

export function validateAgainstSchema(name: SchemaName, value: unknown): SchemaValidationResult {
  return registry.validate(name, value);
}
