import { describe, it, expect } from "vitest";
import {
  PubkitError,
  ConfigurationError,
  DiscoveryError,
  ValidationError,
  PluginError,
  PipelineAbortedError,
  toError,
  errorMessage,
} from "./errors.js";

describe("error taxonomy", () => {
  it("tags each error kind with a code and name", () => {
    const cases: Array<[PubkitError, string, string]> = [
      [new ConfigurationError("bad path"), "CONFIGURATION", "ConfigurationError"],
      [new DiscoveryError("/plugins/a.js", "bad definition"), "DISCOVERY", "DiscoveryError"],
      [new ValidationError("misnamed node"), "VALIDATION", "ValidationError"],
      [new PluginError("crashed"), "PLUGIN", "PluginError"],
    ];
    for (const [err, code, name] of cases) {
      expect(err).toBeInstanceOf(PubkitError);
      expect(err).toBeInstanceOf(Error);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
    }
  });

  it("keeps the defining file on DiscoveryError", () => {
    const err = new DiscoveryError("/plugins/a.js", "bad definition");
    expect(err.file).toBe("/plugins/a.js");
    expect(err.message).toBe("bad definition");
  });

  it("carries the escalated error as cause", () => {
    const original = new ValidationError("misnamed node");
    const aborted = new PipelineAbortedError("Publish aborted", original);
    expect(aborted.code).toBe("ABORTED");
    expect(aborted.cause).toBe(original);
  });
});

describe("toError", () => {
  it("returns Error values unchanged", () => {
    const err = new Error("boom");
    expect(toError(err)).toBe(err);
  });

  it("wraps thrown non-error values in PluginError", () => {
    const err = toError("boom");
    expect(err).toBeInstanceOf(PluginError);
    expect(err.message).toBe("Non-error value thrown: boom");
    expect(err.cause).toBe("boom");
  });
});

describe("errorMessage", () => {
  it("reads the message of errors and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
