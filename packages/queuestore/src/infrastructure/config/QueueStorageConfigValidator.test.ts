import { describe, expect, it } from "vitest";
import { QueueStorageConfigValidator } from "./QueueStorageConfigValidator";

describe("QueueStorageConfigValidator", () => {
  const validator = new QueueStorageConfigValidator();

  it("accepts an empty and a complete config", () => {
    const config = {
      maxDepth: 100,
      evictEmptyQueues: false,
      idStrategy: "uuid",
      idPrefix: "n1-",
      logBufferSize: 10,
    };

    expect(validator.validate({})).toEqual({});
    expect(validator.validate(config)).toEqual(config);
  });

  it("rejects a non-positive depth", () => {
    expect(() => validator.validate({ maxDepth: 0 })).toThrow(
      "Invalid queue storage config: /maxDepth must be >= 1"
    );
  });

  it("rejects a fractional depth", () => {
    expect(() => validator.validate({ maxDepth: 1.5 })).toThrow(
      "Invalid queue storage config: /maxDepth must be integer"
    );
  });

  it("rejects an unknown id strategy", () => {
    expect(() => validator.validate({ idStrategy: "random" })).toThrow(
      "Invalid queue storage config: /idStrategy must be equal to one of the allowed values"
    );
  });

  it("rejects unknown keys", () => {
    expect(() => validator.validate({ capacity: 5 })).toThrow(
      "Invalid queue storage config: config must NOT have additional properties"
    );
  });
});
