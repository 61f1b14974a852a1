import { isMainThread, parentPort, workerData } from "node:worker_threads";
import { buildFamilyGraph } from "../lib/familyGraph";
import { accumulatePartition } from "../lib/heredityInference";
import { workerRequestSchema, type WorkerResponse } from "../types/workerMessages";

export const INFERENCE_WORKER_ROLE = "heredity-inference";

function readRequestId(data: unknown): string {
  if (
    typeof data === "object" &&
    data !== null &&
    "requestId" in data &&
    typeof data.requestId === "string"
  ) {
    return data.requestId;
  }
  return "unknown";
}

/** Scores one partition of the enumeration and returns its raw totals. */
export function handleWorkerRequest(data: unknown): WorkerResponse {
  try {
    const message = workerRequestSchema.parse(data);
    const graph = buildFamilyGraph(message.records);
    const totals = accumulatePartition(graph, message.tables, message.partition);

    return {
      type: "PARTIAL_RESULT",
      requestId: message.requestId,
      totals: Array.from(totals.entries()),
    };
  } catch (error) {
    return {
      type: "ERROR",
      requestId: readRequestId(data),
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

function isInferenceWorker(): boolean {
  return (
    !isMainThread &&
    typeof workerData === "object" &&
    workerData !== null &&
    "role" in workerData &&
    workerData.role === INFERENCE_WORKER_ROLE
  );
}

const port = parentPort;
if (port && isInferenceWorker()) {
  port.on("message", (data: unknown) => {
    port.postMessage(handleWorkerRequest(data));
  });
  port.postMessage({ type: "WORKER_READY" } satisfies WorkerResponse);
}
