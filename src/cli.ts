import { resolveConfig, USAGE, UsageError } from "@/config";
import { HeredityError } from "@/lib/errors";
import { buildFamilyGraph } from "@/lib/familyGraph";
import { distributionsToJson, formatDistributions } from "@/lib/formatDistributions";
import { infer } from "@/lib/heredityInference";
import { loadFamilyRecords } from "@/lib/loadFamilyCsv";
import {
  DEFAULT_PROBABILITY_TABLES,
  loadProbabilityTables,
} from "@/lib/probabilityTables";
import { inferInWorkers, type SpawnWorker } from "@/workers/inferencePool";

export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
  spawn?: SpawnWorker;
}

const consoleIO: CliIO = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

/** Runs the command line and returns the process exit code. */
export async function run(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env,
  io: CliIO = consoleIO,
): Promise<number> {
  try {
    const config = resolveConfig(argv, env);
    const tables = config.tablesPath
      ? loadProbabilityTables(config.tablesPath)
      : DEFAULT_PROBABILITY_TABLES;
    const graph = buildFamilyGraph(loadFamilyRecords(config.dataPath));

    const distributions =
      config.workers > 1
        ? await inferInWorkers(graph, tables, { workers: config.workers, spawn: io.spawn })
        : infer(graph, tables);

    io.log(
      config.json
        ? JSON.stringify(distributionsToJson(distributions), null, 2)
        : formatDistributions(distributions, { percent: config.percent }),
    );
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      io.error(error.message === USAGE ? USAGE : `${error.message}\n${USAGE}`);
      return 1;
    }
    if (error instanceof HeredityError) {
      io.error(`Error: ${error.message}`);
      return 1;
    }
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      io.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
