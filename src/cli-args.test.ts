import { describe, expect, it } from "vitest";

import { parseCliArgs } from "./cli-args.js";

const captureError = (action: () => unknown): unknown => {
  try {
    action();
  } catch (error: unknown) {
    return error;
  }

  throw new Error("Expected the call to throw.");
};

describe("parseCliArgs", () => {
  it("defaults to help", () => {
    expect(parseCliArgs([])).toEqual({ command: { kind: "help" } });
    expect(parseCliArgs(["--help"])).toEqual({ command: { kind: "help" } });
  });

  it("reads the config directory anywhere on the line", () => {
    expect(parseCliArgs(["status", "--config-dir", "/srv/salvo"])).toEqual({
      command: { kind: "status" },
      configDir: "/srv/salvo"
    });
    expect(parseCliArgs(["--config-dir=conf", "stop"])).toEqual({ command: { kind: "stop" }, configDir: "conf" });
  });

  it("parses stage options", () => {
    expect(parseCliArgs(["stage"])).toEqual({ command: { kind: "stage" } });
    expect(parseCliArgs(["stage", "--count", "6", "--wipe"])).toEqual({
      command: { kind: "stage", count: 6, wipe: true }
    });
    expect(parseCliArgs(["stage", "--count=2"])).toEqual({ command: { kind: "stage", count: 2 } });
  });

  it("parses semi and auto fire", () => {
    expect(parseCliArgs(["fire"])).toEqual({ command: { kind: "fire", mode: "semi" } });
    expect(parseCliArgs(["fire", "--auto"])).toEqual({ command: { kind: "fire", mode: "auto" } });
    expect(parseCliArgs(["fire", "--auto", "5", "--burst", "2", "--prompt", "next step"])).toEqual({
      command: { kind: "fire", mode: "auto", rounds: 5, burstCount: 2, prompt: "next step" }
    });
    expect(parseCliArgs(["fire", "--auto=0"])).toEqual({ command: { kind: "fire", mode: "auto", rounds: 0 } });
  });

  it("joins the prompt text", () => {
    expect(parseCliArgs(["prompt", "summarize", "the", "thread"])).toEqual({
      command: { kind: "prompt", text: "summarize the thread" }
    });
  });

  it("rejects bad input with INVALID_INPUT", () => {
    expect(captureError(() => parseCliArgs(["launch"]))).toMatchObject({ code: "INVALID_INPUT" });
    expect(captureError(() => parseCliArgs(["stage", "--count", "0"]))).toMatchObject({ code: "INVALID_INPUT" });
    expect(captureError(() => parseCliArgs(["fire", "--burst"]))).toMatchObject({ code: "INVALID_INPUT" });
    expect(captureError(() => parseCliArgs(["status", "--verbose"]))).toMatchObject({ code: "INVALID_INPUT" });
    expect(captureError(() => parseCliArgs(["prompt"]))).toMatchObject({ code: "INVALID_INPUT" });
    expect(captureError(() => parseCliArgs(["--config-dir"]))).toMatchObject({ code: "INVALID_INPUT" });
  });
});
