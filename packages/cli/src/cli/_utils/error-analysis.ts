// pattern: Functional Core

import {
  ConfigurationError,
  DaemonError,
  HarnessError,
  ScenarioLoadError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category:
    | "configuration"
    | "validation"
    | "scenario"
    | "daemon"
    | "filesystem"
    | "network"
    | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

function analyzeHarnessError(error: HarnessError): AnalyzedError {
  const errorMessage = error.message;

  if (error instanceof ConfigurationError) {
    const suggestions = [
      "Check the configuration file against the documented fields",
      "Unset APPCTL_* environment variables to rule out overrides",
    ];
    if (error.configPath) {
      suggestions.unshift(`Review ${error.configPath}`);
    }
    return {
      category: "configuration",
      userMessage: `Configuration error: ${errorMessage}`,
      technicalMessage: errorMessage,
      suggestions,
    };
  }

  if (error instanceof ValidationError) {
    return {
      category: "validation",
      userMessage: errorMessage,
      technicalMessage: [errorMessage, ...(error.validationErrors ?? [])].join("\n"),
      suggestions: ["Check the input against the expected format"],
    };
  }

  if (error instanceof ScenarioLoadError) {
    return {
      category: "scenario",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions:
        error.reason === "io"
          ? ["Verify the scenario file path exists and is readable"]
          : ["Each step needs exactly one of 'call' or 'probe'"],
    };
  }

  if (error instanceof DaemonError) {
    const suggestions = ["Check that the socket directory exists and is writable"];
    if (errorMessage.toLowerCase().includes("eaddrinuse")) {
      suggestions.push("Another daemon may already be listening on this socket");
    }
    return {
      category: "daemon",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions,
    };
  }

  return {
    category: "unknown",
    userMessage: errorMessage,
    technicalMessage: errorMessage,
    suggestions: [
      "Check the error message for details",
      "Run with --log-level debug for more information",
    ],
  };
}

/**
 * Categorise an error and attach suggestions for the user
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof HarnessError) {
    return analyzeHarnessError(error);
  }

  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (errorString.includes("eacces") || errorString.includes("permission denied")) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you have write permissions to the target directories",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: ["Verify the file or directory path exists"],
    };
  }

  if (errorString.includes("econnrefused")) {
    return {
      category: "network",
      userMessage: "Connection refused",
      technicalMessage: errorMessage,
      suggestions: ["Verify the daemon or server is running and accessible"],
    };
  }

  if (errorString.includes("getaddrinfo") || errorString.includes("ehostunreach")) {
    return {
      category: "network",
      userMessage: "Unable to reach the specified host",
      technicalMessage: errorMessage,
      suggestions: ["Check the URL or hostname is correct", "Verify your DNS settings"],
    };
  }

  return {
    category: "unknown",
    userMessage: errorMessage || "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: ["Run with --log-level debug for more information"],
  };
}
