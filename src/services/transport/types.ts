/**
 * HTTP transport seam
 *
 * The pool hands out TransportSessions; the orchestrator sends through them and
 * classifies the raw result. Transport-level failures surface as TransportError.
 */

import type { HttpMethod } from "../../types/api.js";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL */
  url: string;
  headers?: Record<string, string>;
  /** Serialized as JSON when present */
  body?: unknown;
  params?: QueryParams;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  /** Raw body text; parsing happens in the classifier */
  body: string;
}

export interface TransportSession {
  readonly id: number;
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface HttpTransport {
  openSession(defaultHeaders: Record<string, string>): TransportSession;
}
