import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import { createShutdownManager } from "./shutdown.js";

describe("shutdown", () => {
  // Store original methods using bind to avoid unbound-method issues
  const originalProcessOn = process.on.bind(process);
  const originalProcessExit = process.exit.bind(process);

  let registeredHandlers: Map<string, () => void>;
  let mockProcessOn: ReturnType<typeof vi.fn>;
  let mockProcessExit: ReturnType<typeof vi.fn>;

  const trigger = async (signal = "SIGINT") => {
    const handler = registeredHandlers.get(signal);
    expect(handler).toBeDefined();
    handler!();
    // Give the async handler time to run
    await new Promise((resolve) => setTimeout(resolve, 10));
  };

  beforeEach(() => {
    registeredHandlers = new Map();

    mockProcessOn = vi.fn((event: string, handler: () => void) => {
      registeredHandlers.set(event, handler);
      return process;
    });
    mockProcessExit = vi.fn();

    process.on = mockProcessOn as unknown as typeof process.on;
    process.exit = mockProcessExit as unknown as typeof process.exit;
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.on = originalProcessOn;
    process.exit = originalProcessExit;
    vi.restoreAllMocks();
  });

  describe("setup", () => {
    it("registers SIGINT and SIGTERM handlers", () => {
      const manager = createShutdownManager();
      manager.setup();

      expect(mockProcessOn).toHaveBeenCalledWith("SIGINT", expect.any(Function));
      expect(mockProcessOn).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
    });
  });

  describe("shouldContinue", () => {
    it("returns true initially", () => {
      const manager = createShutdownManager();
      expect(manager.shouldContinue()).toBe(true);
    });

    it("returns false after the first signal without exiting", async () => {
      const manager = createShutdownManager();
      manager.setup();

      await trigger("SIGTERM");

      expect(manager.shouldContinue()).toBe(false);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });
  });

  describe("second signal", () => {
    it("forces exit with code 1", async () => {
      const manager = createShutdownManager();
      manager.setup();

      await trigger();
      await trigger();

      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });

  describe("registerCleanup", () => {
    it("chains cleanup functions in registration order", async () => {
      const manager = createShutdownManager();
      manager.setup();

      const order: string[] = [];
      manager.registerCleanup(() => {
        order.push("first");
      });
      manager.registerCleanup(async () => {
        await Promise.resolve();
        order.push("second");
      });

      await trigger();

      expect(order).toEqual(["first", "second"]);
    });

    it("reports cleanup errors instead of throwing", async () => {
      const manager = createShutdownManager();
      manager.setup();

      const failingCleanup = vi.fn().mockRejectedValue(new Error("Cleanup failed"));
      manager.registerCleanup(failingCleanup);

      await trigger();

      expect(failingCleanup).toHaveBeenCalled();
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Cleanup failed"));
      expect(manager.shouldContinue()).toBe(false);
    });
  });

  describe("multiple managers", () => {
    it("creates independent instances", () => {
      const manager1 = createShutdownManager();
      const manager2 = createShutdownManager();

      expect(manager1).not.toBe(manager2);
      expect(manager1.shouldContinue()).toBe(true);
      expect(manager2.shouldContinue()).toBe(true);
    });
  });
});
