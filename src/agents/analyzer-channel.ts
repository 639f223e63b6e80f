/**
 * Analyzer Channel
 *
 * Async request/response transport between the coordinator and one
 * analyzer. A channel wraps a transport function; it rejects as soon as the
 * caller's signal aborts and rejects any response whose request id does not
 * match the request. The in-process transport runs a handler in the same
 * process and stamps the response with the analyzer's identity and timing.
 */

import type {
  AnalyzerChannel,
  AnalyzerName,
  AnalyzerRequestMessage,
  AnalyzerResponseMessage,
} from "./base-analyzer.ts";
import { AnalyzerFailureError } from "../lib/errors.ts";

export type AnalyzerTransport<T> = (
  message: AnalyzerRequestMessage,
  signal: AbortSignal,
) => Promise<AnalyzerResponseMessage<T>>;

export type AnalyzerHandler<T> = (
  message: AnalyzerRequestMessage,
  signal: AbortSignal,
) => Promise<T>;

/**
 * Settle with `work`, or reject with the abort reason once `signal` fires.
 */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

export function createChannel<T>(
  analyzer: AnalyzerName,
  transport: AnalyzerTransport<T>,
): AnalyzerChannel<T> {
  return {
    analyzer,
    async request(message, signal) {
      const response = await untilAborted(transport(message, signal), signal);
      if (response.requestId !== message.requestId) {
        throw new AnalyzerFailureError(
          `${analyzer} answered request ${response.requestId} while ${message.requestId} was pending`,
        );
      }
      return response;
    },
  };
}

export function inProcessTransport<T>(
  analyzerId: string,
  handler: AnalyzerHandler<T>,
): AnalyzerTransport<T> {
  return async (message, signal) => {
    const startMs = Date.now();
    const payload = await handler(message, signal);
    return {
      requestId: message.requestId,
      analyzerId,
      payload,
      processingTimeMs: Date.now() - startMs,
    };
  };
}

export function createInProcessChannel<T>(
  analyzer: AnalyzerName,
  analyzerId: string,
  handler: AnalyzerHandler<T>,
): AnalyzerChannel<T> {
  return createChannel(analyzer, inProcessTransport(analyzerId, handler));
}
