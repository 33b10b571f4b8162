import type { JSONSchemaType, Options as AjvOptions, ValidateFunction } from "ajv";
import Ajv from "ajv";
import type { IQueueStorageConfig } from "@domain/interfaces/IQueueStorageConfig";

const queueStorageConfigSchema: JSONSchemaType<IQueueStorageConfig> = {
  type: "object",
  properties: {
    maxDepth: { type: "integer", minimum: 1, nullable: true },
    evictEmptyQueues: { type: "boolean", nullable: true },
    idStrategy: {
      type: "string",
      enum: ["sequence", "uuid"],
      nullable: true,
    },
    idPrefix: { type: "string", nullable: true },
    logBufferSize: { type: "integer", minimum: 1, nullable: true },
  },
  required: [],
  additionalProperties: false,
};

export class QueueStorageConfigValidator {
  private validator: ValidateFunction<IQueueStorageConfig>;

  constructor(options?: AjvOptions) {
    const ajv = new Ajv({
      allErrors: true,
      coerceTypes: false,
      ...options,
    });
    this.validator = ajv.compile(queueStorageConfigSchema);
  }

  validate(config: unknown): IQueueStorageConfig {
    if (this.validator(config)) return config;

    const details = (this.validator.errors ?? [])
      .map(({ instancePath, message }) => `${instancePath || "config"} ${message}`)
      .join("; ");
    throw new Error(`Invalid queue storage config: ${details}`);
  }
}
