/** Error categories reported to the operator. */
export type ErrorCategory =
  | "privilege"
  | "not_found"
  | "network"
  | "resource"
  | "timeout"
  | "validation"
  | "state";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error" | "confirmation_required";
  tool: string;
  target_host: string;
  /** null when nothing ran, e.g. while waiting for confirmation. */
  duration_ms: number | null;
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  // List-returning tools
  total?: number;
  returned?: number;
  truncated?: boolean;
  // Transitions that leave a reboot pending
  restart_required?: boolean;
  warnings?: string[];
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  transient: boolean;
  remediation: string[];
  /** Structured context, e.g. the failing command or the cleanup report. */
  details?: Record<string, unknown>;
}

export interface ConfirmationResponse extends ResponseBase {
  status: "confirmation_required";
  risk_level: string;
  preview: {
    description: string;
    warnings: string[];
    escalation_reason?: string;
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | ConfirmationResponse;
