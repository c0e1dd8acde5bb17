/**
 * Body returned for every failed request.
 */
export interface ErrorResponse {
  statusCode: number;
  code: string;
  message: string;
  /** Request description, `uri=<path>` */
  details: string;
  timestamp: string;
  context?: Record<string, unknown>;
}
