import type { IPriorityQueueConfig } from "@app/interfaces/IPriorityQueueOptions";
import { InvalidArgumentError } from "@domain/errors/PriorityQueueErrors";
import type { JSONSchemaType, Options as AjvOptions, ValidateFunction } from "ajv";
import Ajv from "ajv";

const configSchema: JSONSchemaType<IPriorityQueueConfig> = {
  type: "object",
  properties: {
    initialCapacity: { type: "integer", minimum: 0, nullable: true },
    growthFactor: { type: "number", exclusiveMinimum: 1, nullable: true },
    allocator: {
      type: "string",
      enum: ["dynamic", "fixed"],
      nullable: true,
    },
    safetyChecks: { type: "boolean", nullable: true },
  },
  additionalProperties: false,
};

export class ConfigValidator {
  private ajv: Ajv;
  private validator: ValidateFunction<IPriorityQueueConfig>;

  constructor(options?: AjvOptions) {
    this.ajv = new Ajv({
      allErrors: true,
      coerceTypes: false,
      ...options,
    });
    this.validator = this.ajv.compile(configSchema);
  }

  validate(config: unknown): IPriorityQueueConfig {
    if (!this.validator(config)) {
      throw new InvalidArgumentError(
        `Invalid queue options: ${this.ajv.errorsText(this.validator.errors)}`
      );
    }

    if (config.allocator === "fixed" && config.growthFactor != null) {
      throw new InvalidArgumentError(
        "Invalid queue options: growthFactor only applies to the dynamic allocator"
      );
    }

    return config;
  }
}
