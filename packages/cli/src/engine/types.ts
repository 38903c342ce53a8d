// pattern: Functional Core
// The stable output contract shared by commands, probes, scenarios and the daemon.
// Property names are the wire format and are kept snake_case.

export enum Status {
  Pass = "pass",
  Fail = "fail",
  Skip = "skip",
  Error = "error",
}

export enum ErrorCode {
  InvalidInput = "INVALID_INPUT",
  Unsupported = "UNSUPPORTED",
  Unimplemented = "UNIMPLEMENTED",
  DependencyMissing = "DEPENDENCY_MISSING",
  PermissionDenied = "PERMISSION_DENIED",
  NetworkError = "NETWORK_ERROR",
  IoError = "IO_ERROR",
  Timeout = "TIMEOUT",
  /** A probe's own read-back did not match what it wrote */
  ExternalInterference = "EXTERNAL_INTERFERENCE",
  InternalError = "INTERNAL_ERROR",
}

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

export interface TimingInfo {
  total_ms: number;
  /** Sub-phase durations keyed by step name */
  steps: Record<string, number>;
}

export interface EnvSummary {
  os: string;
  arch: string;
  headless: boolean;
}

export interface ExecutionResult {
  run_id: string;
  command: string;
  target: string;
  status: Status;
  error?: ErrorInfo;
  timing: TimingInfo;
  artifacts: string[];
  env_summary: EnvSummary;
  data?: unknown;
}

export interface ScenarioResult {
  name?: string;
  overall_status: Status.Pass | Status.Fail;
  step_results: ExecutionResult[];
}

export interface DoctorReport {
  os_name: string;
  os_version: string;
  kernel: string;
  arch: string;
  user_id: number | null;
  effective_user_id: number | null;
  is_admin: boolean;
  headless: boolean;
  session_type: string | null;
  display_server: string | null;
  proxy_env: Record<string, string>;
}
