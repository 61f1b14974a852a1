import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { run, type CliIO } from "./cli";
import { USAGE } from "./config";
import { clearInferenceCache } from "./workers/inferencePool";
import { spawnInProcessWorker } from "./workers/inProcessWorker";

const TRIO_CSV = fileURLToPath(new URL("../data/trio.csv", import.meta.url));
const THREE_GENERATIONS_CSV = fileURLToPath(
  new URL("../data/three-generations.csv", import.meta.url),
);

const TRIO_REPORT = [
  "Ada:",
  "  Gene:",
  "    2: 0.0092",
  "    1: 0.4557",
  "    0: 0.5351",
  "  Trait:",
  "    True: 0.2665",
  "    False: 0.7335",
  "Tomas:",
  "  Gene:",
  "    2: 0.1976",
  "    1: 0.5106",
  "    0: 0.2918",
  "  Trait:",
  "    True: 1.0000",
  "    False: 0.0000",
  "Mara:",
  "  Gene:",
  "    2: 0.0036",
  "    1: 0.0136",
  "    0: 0.9827",
  "  Trait:",
  "    True: 0.0000",
  "    False: 1.0000",
];

const THREE_GENERATIONS_REPORT = [
  "Oskar:",
  "  Gene:",
  "    2: 0.0461",
  "    1: 0.0929",
  "    0: 0.8610",
  "  Trait:",
  "    True: 0.0000",
  "    False: 1.0000",
  "Vera:",
  "  Gene:",
  "    2: 0.1279",
  "    1: 0.2023",
  "    0: 0.6698",
  "  Trait:",
  "    True: 0.2031",
  "    False: 0.7969",
  "Ines:",
  "  Gene:",
  "    2: 0.0066",
  "    1: 0.6925",
  "    0: 0.3009",
  "  Trait:",
  "    True: 1.0000",
  "    False: 0.0000",
  "Paulo:",
  "  Gene:",
  "    2: 0.0054",
  "    1: 0.0232",
  "    0: 0.9714",
  "  Trait:",
  "    True: 0.0262",
  "    False: 0.9738",
  "Rui:",
  "  Gene:",
  "    2: 0.0097",
  "    1: 0.3631",
  "    0: 0.6272",
  "  Trait:",
  "    True: 0.2159",
  "    False: 0.7841",
  "Lea:",
  "  Gene:",
  "    2: 0.0062",
  "    1: 0.2287",
  "    0: 0.7651",
  "  Trait:",
  "    True: 0.0000",
  "    False: 1.0000",
];

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    log: (message) => out.push(message),
    error: (message) => err.push(message),
    spawn: spawnInProcessWorker,
  };
}

describe("heredity CLI", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "heredity-cli-"));
    clearInferenceCache();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints every person's distributions", async () => {
    const io = captureIO();

    expect(await run([TRIO_CSV], {}, io)).toBe(0);
    expect(io.out.join("\n").split("\n")).toEqual(TRIO_REPORT);
    expect(io.err).toEqual([]);
  });

  it("prints the same report when split across workers", async () => {
    const io = captureIO();

    expect(await run([TRIO_CSV, "--workers", "3"], {}, io)).toBe(0);
    expect(io.out.join("\n").split("\n")).toEqual(TRIO_REPORT);
  });

  it("prints a three-generation family", async () => {
    const io = captureIO();

    expect(await run([THREE_GENERATIONS_CSV], {}, io)).toBe(0);
    expect(io.out.join("\n").split("\n")).toEqual(THREE_GENERATIONS_REPORT);
  });

  it("prints the same three-generation report across workers", async () => {
    const io = captureIO();

    expect(await run([THREE_GENERATIONS_CSV, "--workers", "4"], {}, io)).toBe(0);
    expect(io.out.join("\n").split("\n")).toEqual(THREE_GENERATIONS_REPORT);
  });

  it("prints JSON on request", async () => {
    const io = captureIO();

    expect(await run([TRIO_CSV, "--json"], {}, io)).toBe(0);
    const parsed: unknown = JSON.parse(io.out.join("\n"));
    expect(Object.keys(parsed ?? {})).toEqual(["Ada", "Tomas", "Mara"]);
    expect(parsed).toMatchObject({ Tomas: { trait: { true: 1, false: 0 } } });
  });

  it("uses tables from the environment", async () => {
    const tables = join(dir, "tables.json");
    writeFileSync(
      tables,
      JSON.stringify({
        gene: { 0: 0.5, 1: 0.25, 2: 0.25 },
        trait: {
          0: { true: 0.5, false: 0.5 },
          1: { true: 0.5, false: 0.5 },
          2: { true: 0.5, false: 0.5 },
        },
        mutation: 0,
      }),
    );
    const family = join(dir, "solo.csv");
    writeFileSync(family, "name,mother,father,trait\nSolo,,,1\n");
    const io = captureIO();

    expect(await run([family], { HEREDITY_TABLES: tables }, io)).toBe(0);
    expect(io.out.join("\n").split("\n")).toEqual([
      "Solo:",
      "  Gene:",
      "    2: 0.2500",
      "    1: 0.2500",
      "    0: 0.5000",
      "  Trait:",
      "    True: 1.0000",
      "    False: 0.0000",
    ]);
  });

  it("prints usage without a data file", async () => {
    const io = captureIO();

    expect(await run([], {}, io)).toBe(1);
    expect(io.err).toEqual([USAGE]);
  });

  it("reports malformed evidence", async () => {
    const family = join(dir, "broken.csv");
    writeFileSync(family, "name,mother,father,trait\nKid,Mum,Dad,\nMum,,,\n");
    const io = captureIO();

    expect(await run([family], {}, io)).toBe(1);
    expect(io.err).toEqual(["Error: Kid references unknown parent Dad"]);
  });

  it("reports a missing data file", async () => {
    const io = captureIO();

    expect(await run([join(dir, "absent.csv")], {}, io)).toBe(1);
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toMatch(/^Error: ENOENT/);
  });
});
