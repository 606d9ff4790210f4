import { describe, expect, it } from "vitest";
import { AppError, errorMessage, isAppErrorCode, presentError, toError } from "../errors.ts";

describe("AppError", () => {
  it("describes itself as [code] message", () => {
    expect(new AppError("pyExec", "NameError: df").describe()).toBe("[pyExec] NameError: df");
  });

  it("keeps its name and suggestion", () => {
    const err = new AppError("pathDenied", "no", "Pick a file inside the workspace");
    expect(err.name).toBe("AppError");
    expect(err.suggestion).toBe("Pick a file inside the workspace");
    expect(err).toBeInstanceOf(Error);
  });
});

describe("presentError", () => {
  it("uses the canned text for known codes", () => {
    expect(presentError(new AppError("crewBudget", "Budget exhausted"))).toBe(
      "Crew stopped at budget limit.",
    );
  });

  it("falls back to the error's own message", () => {
    expect(presentError(new AppError("autoflow", "Crew run r1 failed"))).toBe("Crew run r1 failed");
  });
});

describe("isAppErrorCode", () => {
  it("accepts only known codes", () => {
    expect(isAppErrorCode("autoflowTimeout")).toBe(true);
    expect(isAppErrorCode("kaboom")).toBe(false);
  });
});

describe("unknown-error helpers", () => {
  it("reads a message from anything thrown", () => {
    expect(errorMessage(new Error("bad"))).toBe("bad");
    expect(errorMessage("plain")).toBe("plain");
  });

  it("keeps only real errors", () => {
    const err = new Error("bad");
    expect(toError(err)).toBe(err);
    expect(toError(42)).toBeUndefined();
  });
});
