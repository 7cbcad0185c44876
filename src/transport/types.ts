import type { ParsedRecord, TrackingToken } from '../core/types.js';

export interface IngestionBatch {
  /** Routes the batch to the target parser. */
  sourcetype: string;
  payloads: string[];
}

export interface IngestionResponse {
  ok: boolean;
  status: number;
  body: string;
}

/**
 * Write side of the pipeline. Resolves with the boundary's answer, whatever the
 * status; rejects with a SubmissionError only when no answer arrived.
 */
export interface IngestionTransport {
  send(batch: IngestionBatch, signal?: AbortSignal): Promise<IngestionResponse>;
}

export interface QueryRequest {
  token: TrackingToken;
  startTime: number; // epoch ms
  endTime: number; // epoch ms
}

/**
 * Read side of the pipeline. Resolves with zero or more parsed records;
 * rejects with a RetrievalTransportError.
 */
export interface QueryTransport {
  search(req: QueryRequest, signal?: AbortSignal): Promise<ParsedRecord[]>;
}

// Links an optional caller signal with a per-request timeout
export function requestSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): { signal: AbortSignal; dispose: () => void } {
  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(new Error(`request timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = () => ctrl.abort(parent?.reason);
  if (parent?.aborted) ctrl.abort(parent.reason);
  else parent?.addEventListener('abort', onAbort, { once: true });
  return {
    signal: ctrl.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}
