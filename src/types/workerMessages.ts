import { z } from "zod";
import {
  familyRecordSchema,
  personTallySchema,
  probabilityTablesSchema,
} from "./familyRecords";

export const computePartialRequestSchema = z.object({
  type: z.literal("COMPUTE_PARTIAL"),
  requestId: z.string(),
  records: z.array(familyRecordSchema),
  tables: probabilityTablesSchema,
  partition: z.object({
    index: z.number().int().nonnegative(),
    count: z.number().int().positive(),
  }),
});

export const partialResultSchema = z.object({
  type: z.literal("PARTIAL_RESULT"),
  requestId: z.string(),
  totals: z.array(z.tuple([z.string(), personTallySchema])),
});

export const workerReadySchema = z.object({
  type: z.literal("WORKER_READY"),
});

export const errorMessageSchema = z.object({
  type: z.literal("ERROR"),
  requestId: z.string(),
  error: z.string(),
});

export const workerRequestSchema = z.discriminatedUnion("type", [
  computePartialRequestSchema,
]);

export const workerResponseSchema = z.discriminatedUnion("type", [
  partialResultSchema,
  workerReadySchema,
  errorMessageSchema,
]);

export type WorkerRequest = z.infer<typeof workerRequestSchema>;
export type WorkerResponse = z.infer<typeof workerResponseSchema>;
export type ComputePartialRequest = z.infer<typeof computePartialRequestSchema>;
export type PartialResult = z.infer<typeof partialResultSchema>;
export type ErrorMessage = z.infer<typeof errorMessageSchema>;
