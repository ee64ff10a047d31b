export type ToolErrorCode =
  | 'invalid_state'
  | 'invalid_payload'
  | 'no_change'
  | 'io_error'
  | 'unknown';

export interface ToolError {
  code: ToolErrorCode;
  message: string;
  fix?: string;
  details?: Record<string, unknown>;
}
