import { randomUUID } from "node:crypto";
import { availableParallelism } from "node:os";
import { Worker } from "node:worker_threads";
import { familyRecords, type FamilyGraph } from "../lib/familyGraph";
import {
  countAssignments,
  mergeAccumulators,
  normalizeAccumulator,
} from "../lib/heredityInference";
import { computeProbabilisticFingerprint } from "../lib/probabilisticFingerprint";
import { DEFAULT_PROBABILITY_TABLES } from "../lib/probabilityTables";
import type {
  Accumulator,
  PersonDistribution,
  ProbabilityTables,
} from "../types/familyRecords";
import {
  workerResponseSchema,
  type ComputePartialRequest,
} from "../types/workerMessages";
import { INFERENCE_WORKER_ROLE } from "./inference.worker";

export interface InferenceWorkerHandle {
  postMessage(message: ComputePartialRequest): void;
  onMessage(listener: (data: unknown) => void): void;
  onError(listener: (error: Error) => void): void;
  onExit(listener: (code: number) => void): void;
  terminate(): Promise<unknown>;
}

export type SpawnWorker = () => InferenceWorkerHandle;

export interface InferInWorkersOptions {
  workers?: number;
  spawn?: SpawnWorker;
}

const MAX_CACHE_SIZE = 100;

class LRUCache<K, V> {
  private cache = new Map<K, V>();
  private maxSize: number;

  constructor(maxSize: number) {
    this.maxSize = maxSize;
  }

  get(key: K): V | undefined {
    const value = this.cache.get(key);
    if (value !== undefined) {
      this.cache.delete(key);
      this.cache.set(key, value);
    }
    return value;
  }

  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(key, value);
  }

  clear(): void {
    this.cache.clear();
  }
}

const marginalsCache = new LRUCache<string, Map<string, PersonDistribution>>(
  MAX_CACHE_SIZE,
);

export function clearInferenceCache(): void {
  marginalsCache.clear();
}

// Callers own what they get back; the cache keeps its own copy.
function copyDistributions(
  distributions: ReadonlyMap<string, PersonDistribution>,
): Map<string, PersonDistribution> {
  const copy = new Map<string, PersonDistribution>();
  for (const [name, distribution] of distributions) {
    copy.set(name, {
      gene: { ...distribution.gene },
      trait: { ...distribution.trait },
    });
  }
  return copy;
}

// Registers the tsx loader inside the thread before loading the worker source.
const WORKER_URL = new URL("./inference.worker.bootstrap.mjs", import.meta.url);

export const spawnThreadWorker: SpawnWorker = () => {
  const worker = new Worker(WORKER_URL, {
    workerData: { role: INFERENCE_WORKER_ROLE },
  });
  return {
    postMessage: (message) => worker.postMessage(message),
    onMessage: (listener) => {
      worker.on("message", listener);
    },
    onError: (listener) => {
      worker.on("error", listener);
    },
    onExit: (listener) => {
      worker.on("exit", listener);
    },
    terminate: () => worker.terminate(),
  };
};

function runPartition(
  handle: InferenceWorkerHandle,
  request: ComputePartialRequest,
): Promise<Accumulator> {
  return new Promise((resolve, reject) => {
    handle.onMessage((data) => {
      const parsed = workerResponseSchema.safeParse(data);
      if (!parsed.success) {
        console.error("Failed to parse worker message:", parsed.error);
        reject(new Error(`Invalid message from worker: ${parsed.error.message}`));
        return;
      }

      const message = parsed.data;
      if (message.type === "WORKER_READY") {
        handle.postMessage(request);
        return;
      }
      if (message.requestId !== request.requestId) return;

      if (message.type === "ERROR") {
        reject(new Error(message.error));
      } else {
        resolve(new Map(message.totals));
      }
    });
    handle.onError(reject);
    // No-op once settled; catches a worker that dies without a word.
    handle.onExit((code) => {
      reject(new Error(`Worker exited with code ${code} before replying`));
    });
  });
}

/**
 * Same result as `infer`, with the enumeration split into one partition per
 * worker. Partial totals are merged before normalizing; results are cached
 * by fingerprint of the records and tables.
 */
export async function inferInWorkers(
  graph: FamilyGraph,
  tables: ProbabilityTables = DEFAULT_PROBABILITY_TABLES,
  options: InferInWorkersOptions = {},
): Promise<Map<string, PersonDistribution>> {
  const records = familyRecords(graph);
  const cacheKey = computeProbabilisticFingerprint(records, tables);
  const cached = marginalsCache.get(cacheKey);
  if (cached) {
    return copyDistributions(cached);
  }

  const requested = options.workers ?? availableParallelism();
  const count = Math.max(1, Math.min(Math.floor(requested), countAssignments(graph)));
  const spawn = options.spawn ?? spawnThreadWorker;

  const handles: InferenceWorkerHandle[] = [];
  try {
    const partials = await Promise.all(
      Array.from({ length: count }, (_, index) => {
        const handle = spawn();
        handles.push(handle);
        return runPartition(handle, {
          type: "COMPUTE_PARTIAL",
          requestId: randomUUID(),
          records,
          tables,
          partition: { index, count },
        });
      }),
    );

    const totals = partials.reduce<Accumulator>(
      (merged, partial) => mergeAccumulators(merged, partial),
      new Map(),
    );
    const distributions = normalizeAccumulator(totals);
    marginalsCache.set(cacheKey, copyDistributions(distributions));
    return distributions;
  } finally {
    await Promise.all(handles.map((handle) => handle.terminate()));
  }
}
