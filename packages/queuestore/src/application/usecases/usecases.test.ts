import { describe, expect, it, vi } from "vitest";
import { Frame } from "@domain/entities/Frame";
import type { ILogger } from "@domain/interfaces/ILogger";
import type { IFrameStore } from "@domain/ports/IFrameStore";
import { SequentialMessageIdGenerator } from "@infra/id/SequentialMessageIdGenerator";
import { MessageIdAssigner } from "../services/MessageIdAssigner";
import { DequeueFrame } from "./DequeueFrame";
import { EnqueueFrame } from "./EnqueueFrame";
import { StartStorage } from "./StartStorage";
import { StopStorage } from "./StopStorage";

const fakeStore = (overrides: Partial<IFrameStore> = {}): IFrameStore => ({
  isOpen: true,
  open: vi.fn(async () => {}),
  close: vi.fn(async () => {}),
  append: vi.fn(async () => 1),
  prepend: vi.fn(async () => 1),
  take: vi.fn(async () => undefined),
  depth: vi.fn(() => 0),
  stats: vi.fn(() => ({ destinations: 0, frames: 0 })),
  ...overrides,
});

const fakeLogger = () => {
  const log = vi.fn();
  const flush = vi.fn();
  const destroy = vi.fn();
  const logger: ILogger = { log, flush, destroy };
  return { log, flush, destroy, logger };
};

describe("StartStorage", () => {
  it("fails when the store cannot open", async () => {
    const cause = new Error("disk unavailable");
    const store = fakeStore({
      open: async () => {
        throw cause;
      },
    });

    const error = await new StartStorage(store).execute().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ message: "Failed to start queue storage", cause });
  });
});

describe("StopStorage", () => {
  it("logs a failing close instead of throwing", async () => {
    const { log, flush, destroy, logger } = fakeLogger();
    const store = fakeStore({
      close: async () => {
        throw new Error("disk gone");
      },
    });

    await expect(new StopStorage(store, logger).execute()).resolves.toBeUndefined();
    expect(log).toHaveBeenCalledWith(
      "Failed to stop queue storage",
      { error: expect.any(Error) },
      "error"
    );
    expect(flush).toHaveBeenCalledOnce();
    expect(destroy).toHaveBeenCalledOnce();
    expect(flush.mock.invocationCallOrder[0]).toBeLessThan(
      destroy.mock.invocationCallOrder[0]
    );
  });
});

describe("EnqueueFrame", () => {
  it("wraps unexpected store errors as STORAGE_FAILURE", async () => {
    const cause = new Error("write failed");
    const store = fakeStore({
      append: async () => {
        throw cause;
      },
    });
    const enqueue = new EnqueueFrame(
      store,
      new MessageIdAssigner(new SequentialMessageIdGenerator())
    );

    await expect(enqueue.execute("orders", new Frame())).rejects.toMatchObject({
      code: "STORAGE_FAILURE",
      destination: "orders",
      cause,
    });
  });
});

describe("DequeueFrame", () => {
  it("wraps unexpected store errors as STORAGE_FAILURE", async () => {
    const store = fakeStore({
      take: async () => {
        throw new Error("corrupt record");
      },
    });

    await expect(new DequeueFrame(store).execute("orders")).rejects.toMatchObject({
      code: "STORAGE_FAILURE",
    });
  });

  it("returns the frame the store hands back", async () => {
    const frame = new Frame();
    const store = fakeStore({ take: async () => frame });

    expect(await new DequeueFrame(store).execute("orders")).toEqual({
      status: "dequeued",
      frame,
    });
  });
});
