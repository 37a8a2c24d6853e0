/**
 * Unit tests for per-command timing lines
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { emitMetric, withTiming } from "../src/lib/telemetry.js";

function spyOnStderr() {
  return vi.spyOn(process.stderr, "write").mockImplementation(() => true);
}

describe("telemetry", () => {
  let originalDebug: string | undefined;
  let errSpy: ReturnType<typeof spyOnStderr>;

  function written(): string[] {
    return errSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(() => {
    originalDebug = process.env.PATCHDB_CLI_DEBUG;
    process.env.PATCHDB_CLI_DEBUG = "1";
    errSpy = spyOnStderr();
  });

  afterEach(() => {
    errSpy.mockRestore();
    if (originalDebug !== undefined) {
      process.env.PATCHDB_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.PATCHDB_CLI_DEBUG;
    }
  });

  it("should report the collection, duration and success of a command", async () => {
    const id = await withTiming("cli.insert", { collection: "users" }, async () => "ann");

    expect(id).toBe("ann");
    const [line] = written();
    expect(line).toMatch(/^metric cli\.insert collection=users duration_ms=\d+ success=true\n$/);
  });

  it("should report a failed command and rethrow", async () => {
    await expect(
      withTiming("cli.drop", { collection: "ghost" }, async () => {
        throw new Error("Collection not found: ghost");
      })
    ).rejects.toThrow("Collection not found: ghost");

    const [line] = written();
    expect(line).toMatch(/^metric cli\.drop collection=ghost duration_ms=\d+ success=false\n$/);
  });

  it("should omit undefined fields and keep each value one token", () => {
    emitMetric("cli.find", { collection: "users", root: "/tmp/my data\nx", query: undefined });
    expect(written()).toEqual(["metric cli.find collection=users root=/tmp/my_data_x\n"]);
  });

  it("should stay silent unless PATCHDB_CLI_DEBUG=1", async () => {
    process.env.PATCHDB_CLI_DEBUG = "0";
    await withTiming("cli.collections", {}, async () => []);
    expect(written()).toEqual([]);
  });
});
