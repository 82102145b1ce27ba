/** Base fields present in every tool response. */
export interface ResponseBase {
  status: "success" | "error";
  tool: string;
  duration_ms: number;
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  // Set by run tools so callers can alert without inspecting the report.
  exit_code?: number;
}

/** Error response. `error_code` is an UpdaterErrorCode, INVALID_INPUT or INTERNAL_ERROR. */
export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  message: string;
  context?: Record<string, unknown>;
}

export type ToolResponse = SuccessResponse | ErrorResponse;
