import { describe, it, expect } from "vitest";

import { GalaxyError } from "#errors";

import { Result, Severity } from "./result.js";

const warning = new GalaxyError("shadowed", "W1", undefined, Severity.Warning);
const error = new GalaxyError("broken", "E1");

describe("Result", () => {
  it("wraps a value without messages", () => {
    const result = Result.ok<number, GalaxyError>(3);

    expect(result).toEqual({ success: true, value: 3, messages: {} });
    expect(Result.countErrors(result)).toBe(0);
  });

  it("keeps warnings on a successful result", () => {
    const result = Result.okWith(3, [warning]);

    expect(result.success).toBe(true);
    expect(result.messages[Severity.Warning]).toEqual([warning]);
    expect(result.messages[Severity.Error]).toBeUndefined();
  });

  it("groups failures by severity", () => {
    const result = Result.err<number, GalaxyError>([error, warning, error]);

    expect(result.success).toBe(false);
    expect(Result.countErrors(result)).toBe(2);
    expect(Result.firstError(result)).toBe(error);
    expect(result.messages[Severity.Warning]).toEqual([warning]);
  });

  it("accepts a single error", () => {
    const result = Result.err<number, GalaxyError>(error);

    expect(Result.firstError(result)).toBe(error);
  });

  it("maps only successful values", () => {
    const doubled = Result.map(Result.okWith(3, [warning]), (n) => n * 2);
    expect(doubled.success && doubled.value).toBe(6);
    expect(doubled.messages[Severity.Warning]).toEqual([warning]);

    const failed = Result.err<number, GalaxyError>(error);
    expect(Result.map(failed, (n) => n * 2)).toBe(failed);
  });
});
