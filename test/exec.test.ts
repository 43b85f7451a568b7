import { describe, expect, it } from "vitest";
import { exec } from "../src/utils/exec.js";

describe("exec", () => {
  it("captures output of successful commands", async () => {
    const result = await exec([process.execPath, "-e", "process.stdout.write('ok')"]);
    expect(result).toEqual({ success: true, stdout: "ok", stderr: "", code: 0, timedOut: false });
  });

  it("reports non-zero exits in the result", async () => {
    const result = await exec([process.execPath, "-e", "process.stderr.write('bad'); process.exit(3)"]);
    expect(result).toEqual({ success: false, stdout: "", stderr: "bad", code: 3, timedOut: false });
  });

  it("flags commands killed by the timeout", async () => {
    const result = await exec([process.execPath, "-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 200 });
    expect(result.timedOut).toBe(true);
    expect(result.success).toBe(false);
  });

  it("does not mistake an output overflow for a timeout", async () => {
    const result = await exec([process.execPath, "-e", "process.stdout.write('x'.repeat(4096))"], {
      timeoutMs: 10_000,
      maxBuffer: 100,
    });
    expect(result.timedOut).toBe(false);
    expect(result.success).toBe(false);
    expect(result.code).toBe(-1);
  });

  it("rejects when the command cannot be spawned", async () => {
    await expect(exec(["/nonexistent/quadlet-test-binary"])).rejects.toThrow(
      "Failed to execute /nonexistent/quadlet-test-binary",
    );
  });
});
