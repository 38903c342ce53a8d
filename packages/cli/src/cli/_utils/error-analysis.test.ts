// pattern: Functional Core

import { describe, expect, it } from "vitest";

import {
  ConfigurationError,
  DaemonError,
  ScenarioLoadError,
  ValidationError,
} from "../../utils/errors.js";

import { analyzeError } from "./error-analysis.js";

describe("analyzeError", () => {
  describe("harness errors", () => {
    it("points at the offending config file", () => {
      const result = analyzeError(
        new ConfigurationError("Configuration validation failed: root: bad", "/etc/appctl.yaml")
      );

      expect(result.category).toBe("configuration");
      expect(result.userMessage).toBe(
        "Configuration error: Configuration validation failed: root: bad"
      );
      expect(result.suggestions[0]).toBe("Review /etc/appctl.yaml");
    });

    it("includes every validation message in the technical detail", () => {
      const result = analyzeError(new ValidationError("Request validation failed", ["/id: a", "/method: b"]));

      expect(result.category).toBe("validation");
      expect(result.technicalMessage).toBe("Request validation failed\n/id: a\n/method: b");
    });

    it("distinguishes unreadable and invalid scenarios", () => {
      expect(analyzeError(new ScenarioLoadError("io", "gone")).suggestions).toEqual([
        "Verify the scenario file path exists and is readable",
      ]);
      expect(analyzeError(new ScenarioLoadError("invalid", "bad")).category).toBe("scenario");
    });

    it("mentions a running daemon when the socket is taken", () => {
      const result = analyzeError(
        new DaemonError("cannot bind socket /tmp/a.sock: listen EADDRINUSE", "/tmp/a.sock")
      );

      expect(result.category).toBe("daemon");
      expect(result.suggestions).toContain("Another daemon may already be listening on this socket");
    });
  });

  describe("plain errors", () => {
    it("categorizes EACCES errors", () => {
      const result = analyzeError(new Error("EACCES: permission denied, open '/etc/test'"));

      expect(result.category).toBe("filesystem");
      expect(result.userMessage).toBe("Permission denied accessing files or directories");
    });

    it("categorizes ENOENT errors", () => {
      expect(analyzeError(new Error("ENOENT: no such file or directory")).userMessage).toBe(
        "Required file or directory not found"
      );
    });

    it("categorizes connection and DNS errors", () => {
      expect(analyzeError(new Error("connect ECONNREFUSED /tmp/a.sock")).category).toBe("network");
      expect(analyzeError(new Error("getaddrinfo ENOTFOUND nowhere.test")).userMessage).toBe(
        "Unable to reach the specified host"
      );
    });

    it("falls back to the raw message", () => {
      const result = analyzeError("something odd");

      expect(result.category).toBe("unknown");
      expect(result.userMessage).toBe("something odd");
    });
  });
});
