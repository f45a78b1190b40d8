/**
 * axios-backed HTTP transport
 *
 * Each session is an axios instance with its own keep-alive agents, so a pooled
 * session reuses its TCP connections the way a browser tab would. Every HTTP
 * status resolves; only transport failures reject.
 */

import http from "node:http";
import https from "node:https";
import axios, { type AxiosInstance } from "axios";
import { TransportError, type TransportFailureReason } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type {
  HttpTransport,
  TransportRequest,
  TransportResponse,
  TransportSession,
} from "./types.js";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"]);

const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "ERR_NETWORK",
]);

export interface AxiosTransportOptions {
  maxSocketsPerSession?: number;
  keepAliveMs?: number;
}

class AxiosSession implements TransportSession {
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(
    public readonly id: number,
    defaultHeaders: Record<string, string>,
    options: Required<AxiosTransportOptions>
  ) {
    const agentOptions = {
      keepAlive: true,
      keepAliveMsecs: options.keepAliveMs,
      maxSockets: options.maxSocketsPerSession,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    this.client = axios.create({
      headers: { ...defaultHeaders },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      // Status handling belongs to the classifier
      validateStatus: () => true,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      maxRedirects: 0,
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        params: request.params,
        data: request.body === undefined ? undefined : JSON.stringify(request.body),
        timeout: request.timeoutMs,
      });

      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: bodyToText(response.data),
      };
    } catch (error) {
      throw toTransportError(error, request);
    }
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

export class AxiosTransport implements HttpTransport {
  private nextSessionId = 1;
  private readonly options: Required<AxiosTransportOptions>;

  constructor(options: AxiosTransportOptions = {}) {
    this.options = {
      maxSocketsPerSession: options.maxSocketsPerSession ?? 4,
      keepAliveMs: options.keepAliveMs ?? 30_000,
    };
  }

  openSession(defaultHeaders: Record<string, string>): TransportSession {
    const session = new AxiosSession(this.nextSessionId++, defaultHeaders, this.options);
    logger.debug("Opened HTTP session", { sessionId: session.id });
    return session;
  }
}

function normalizeHeaders(raw: object): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      headers[name.toLowerCase()] = value;
    } else if (typeof value === "number") {
      headers[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      headers[name.toLowerCase()] = value.map(String).join(", ");
    }
  }
  return headers;
}

function bodyToText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  return JSON.stringify(data);
}

export function classifyTransportFailure(code: string | undefined): TransportFailureReason {
  if (code === undefined) return "unknown";
  if (TIMEOUT_CODES.has(code)) return "timeout";
  if (NETWORK_CODES.has(code)) return "network";
  return "unknown";
}

function toTransportError(error: unknown, request: TransportRequest): TransportError {
  const cause = error instanceof Error ? error : new Error(String(error));
  const code = axios.isAxiosError(error) ? error.code : undefined;
  const reason = classifyTransportFailure(code);

  const message =
    reason === "timeout"
      ? `Request timed out after ${request.timeoutMs}ms`
      : `${request.method} ${request.url} failed: ${cause.message}`;

  return new TransportError(message, reason, code, cause);
}
