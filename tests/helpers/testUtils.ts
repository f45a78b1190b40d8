/**
 * Test Utility Functions
 *
 * Common helpers for all test files: a hand-driven clock, a scripted HTTP
 * transport and a sleep that moves the clock instead of waiting.
 */

import type { Clock, Sleep } from "../../src/types/common.js";
import { TransportError } from "../../src/utils/errors.js";
import type {
  HttpTransport,
  TransportRequest,
  TransportResponse,
  TransportSession,
} from "../../src/services/transport/types.js";

// ============================================================================
// Time
// ============================================================================

export class ManualClock implements Clock {
  constructor(private current: number = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

/**
 * Sleep that advances the clock and records each requested delay
 */
export function clockSleep(clock: ManualClock): Sleep & { delays: number[] } {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
    clock.advance(ms);
  };
  return Object.assign(sleep, { delays });
}

// ============================================================================
// HTTP
// ============================================================================

export type Responder = (request: TransportRequest) => TransportResponse | Promise<TransportResponse>;

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): TransportResponse {
  return {
    status,
    headers: { "content-type": "application/json", ...headers },
    body: body === undefined ? "" : JSON.stringify(body),
  };
}

export function textResponse(
  status: number,
  body: string,
  headers: Record<string, string> = {}
): TransportResponse {
  return { status, headers, body };
}

export interface SentRequest extends TransportRequest {
  sessionId: number;
  defaultHeaders: Record<string, string>;
}

/**
 * Scripted transport. Queued responders are used first (one per request);
 * afterwards the fallback responder answers.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: SentRequest[] = [];
  readonly openedSessions: number[] = [];
  readonly closedSessions: number[] = [];
  private readonly queue: Responder[] = [];
  private nextId = 1;

  constructor(private fallback: Responder = () => jsonResponse(200, { ok: true })) {}

  enqueue(...responders: Responder[]): this {
    this.queue.push(...responders);
    return this;
  }

  respondWith(responder: Responder): this {
    this.fallback = responder;
    return this;
  }

  openSession(defaultHeaders: Record<string, string>): TransportSession {
    const id = this.nextId++;
    this.openedSessions.push(id);

    return {
      id,
      send: async (request) => {
        this.requests.push({ ...request, sessionId: id, defaultHeaders });
        const responder = this.queue.shift() ?? this.fallback;
        return responder(request);
      },
      close: async () => {
        this.closedSessions.push(id);
      },
    };
  }
}

export function failWith(
  reason: "timeout" | "network" | "unknown",
  code?: string
): Responder {
  return () => {
    throw new TransportError(`simulated ${reason} failure`, reason, code);
  };
}

/**
 * Resolve pending microtasks (promise callbacks queued by the code under test)
 */
export async function flushPromises(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
}
