import { z } from "zod";

export const USAGE =
  "Usage: heredity data.csv [--tables tables.json] [--workers n] [--percent] [--json]";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface HeredityConfig {
  dataPath: string;
  tablesPath: string | null;
  /** 1 runs inference in-process; more splits the enumeration across worker threads. */
  workers: number;
  percent: boolean;
  json: boolean;
}

const workersSchema = z.coerce.number().int().positive();

const envSchema = z.object({
  HEREDITY_TABLES: z.string().min(1).optional(),
  HEREDITY_WORKERS: z.string().min(1).optional(),
});

function parseWorkers(raw: string, source: string): number {
  const parsed = workersSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Invalid ${source} value: ${raw}. Must be a positive integer.`);
  }
  return parsed.data;
}

/**
 * Resolves settings from command-line arguments (without the node/script
 * prefix) and environment variables. Flags take precedence over env.
 */
export function resolveConfig(
  argv: readonly string[],
  env: Record<string, string | undefined>,
): HeredityConfig {
  const fromEnv = envSchema.parse({
    HEREDITY_TABLES: env.HEREDITY_TABLES || undefined,
    HEREDITY_WORKERS: env.HEREDITY_WORKERS || undefined,
  });

  const positional: string[] = [];
  let tablesPath: string | null = fromEnv.HEREDITY_TABLES ?? null;
  let workers = fromEnv.HEREDITY_WORKERS
    ? parseWorkers(fromEnv.HEREDITY_WORKERS, "HEREDITY_WORKERS")
    : 1;
  let percent = false;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = (): string => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      i++;
      return value;
    };

    switch (arg) {
      case "--tables":
        tablesPath = next();
        break;
      case "--workers":
        workers = parseWorkers(next(), "--workers");
        break;
      case "--percent":
        percent = true;
        break;
      case "--json":
        json = true;
        break;
      default:
        if (arg.startsWith("--")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError(USAGE);
  }

  return { dataPath: positional[0], tablesPath, workers, percent, json };
}
