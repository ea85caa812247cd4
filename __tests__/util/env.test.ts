import { afterEach, describe, expect, it, vi } from "vitest";
import { expandEnvList, expandEnvRecord, expandEnvVars } from "../../src/util/env.js";
import * as logger from "../../src/util/logger.js";

describe("expandEnvVars", () => {
  const testEnv: Record<string, string> = {
    HOME: "/home/user",
    TOKEN: "test-secret",
    EMPTY: "",
  };

  it("expands a single variable", () => {
    expect(expandEnvVars("${HOME}/config", testEnv)).toBe("/home/user/config");
  });

  it("expands multiple variables", () => {
    expect(expandEnvVars("${HOME}/${TOKEN}", testEnv)).toBe(
      "/home/user/test-secret",
    );
  });

  it("returns empty string for undefined variables", () => {
    expect(expandEnvVars("${UNDEFINED_VAR}", testEnv)).toBe("");
  });

  it("returns empty string for defined but empty variables", () => {
    expect(expandEnvVars("prefix${EMPTY}suffix", testEnv)).toBe("prefixsuffix");
  });

  it("returns string unchanged if no variables present", () => {
    expect(expandEnvVars("no variables here", testEnv)).toBe(
      "no variables here",
    );
  });

  it("handles adjacent variables", () => {
    expect(expandEnvVars("${HOME}${TOKEN}", testEnv)).toBe(
      "/home/usertest-secret",
    );
  });
});

describe("default values", () => {
  const testEnv: Record<string, string> = { SET: "value", EMPTY: "" };

  it("uses the fallback when the variable is unset", () => {
    expect(expandEnvVars("${PORT:-8080}", testEnv)).toBe("8080");
  });

  it("uses the fallback when the variable is empty", () => {
    expect(expandEnvVars("${EMPTY:-fallback}", testEnv)).toBe("fallback");
  });

  it("prefers the variable when it is set", () => {
    expect(expandEnvVars("${SET:-fallback}", testEnv)).toBe("value");
  });

  it("allows an empty fallback", () => {
    expect(expandEnvVars("a${NOPE:-}b", testEnv)).toBe("ab");
  });

  it("leaves malformed references alone", () => {
    expect(expandEnvVars("$HOME ${1BAD} ${", testEnv)).toBe("$HOME ${1BAD} ${");
  });
});

describe("expandEnvList", () => {
  it("expands every entry", () => {
    expect(expandEnvList(["--root", "${ROOT}/data", "${MODE:-fast}"], { ROOT: "/srv" })).toEqual([
      "--root",
      "/srv/data",
      "fast",
    ]);
  });
});

describe("expandEnvRecord", () => {
  it("expands all values in a record", () => {
    const env = { API_KEY: "abc" };
    const record = {
      AUTH: "Bearer ${API_KEY}",
      PLAIN: "no-vars",
    };
    expect(expandEnvRecord(record, env)).toEqual({
      AUTH: "Bearer abc",
      PLAIN: "no-vars",
    });
  });

  it("handles empty record", () => {
    expect(expandEnvRecord({}, {})).toEqual({});
  });
});

describe("expandEnvVars warnings", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("warns when env variable is missing", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => {});
    expandEnvVars("${MISSING_VAR}", {});
    expect(warnSpy).toHaveBeenCalledOnce();
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining("MISSING_VAR"),
    );
  });

  it("names the variable in the warning", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => {});
    expandEnvVars("${MISSING_VAR}", {});
    expect(warnSpy).toHaveBeenCalledWith(
      "Environment variable 'MISSING_VAR' is not set, substituting an empty string",
    );
  });

  it("does not warn when a fallback is given", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => {});
    expandEnvVars("${MISSING_VAR:-x}", {});
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("does not warn when env variable is set", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => {});
    expandEnvVars("${MY_VAR}", { MY_VAR: "value" });
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("does not warn when env variable is empty string but present", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => {});
    expandEnvVars("${MY_VAR}", { MY_VAR: "" });
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("expandEnvRecord warns for each missing var", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => {});
    const record = {
      A: "${MISSING_A}",
      B: "${MISSING_B}",
    };
    expandEnvRecord(record, {});
    expect(warnSpy).toHaveBeenCalledTimes(2);
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining("MISSING_A"),
    );
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining("MISSING_B"),
    );
  });
});
