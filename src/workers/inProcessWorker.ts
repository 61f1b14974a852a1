import { EventEmitter } from "node:events";
import { handleWorkerRequest } from "./inference.worker";
import type { InferenceWorkerHandle } from "./inferencePool";

/**
 * Worker stand-in that answers on the main thread. Messages are delivered on
 * later turns of the event loop, the same as a real worker's.
 */
export function spawnInProcessWorker(): InferenceWorkerHandle {
  const events = new EventEmitter();
  let terminated = false;

  const deliver = (message: unknown): void => {
    setImmediate(() => {
      if (!terminated) events.emit("message", message);
    });
  };

  deliver({ type: "WORKER_READY" });

  return {
    postMessage: (message) => deliver(handleWorkerRequest(message)),
    onMessage: (listener) => {
      events.on("message", listener);
    },
    onError: (listener) => {
      events.on("error", listener);
    },
    onExit: (listener) => {
      events.on("exit", listener);
    },
    terminate: async () => {
      terminated = true;
      events.removeAllListeners();
      return 0;
    },
  };
}
