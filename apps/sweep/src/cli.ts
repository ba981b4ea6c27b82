import fs from "node:fs";
import path from "node:path";
import yargs from "yargs";
import { ZodError } from "zod";
import { CrrPricingError } from "@crr-pricer/crr-core";
import { loadConfig, DEFAULT_CONFIG_PATH } from "./config/configManager";
import { defaultsFromConfig, priceInstrument, runSweep, type PricingPoint } from "./sweep/runSweep";
import { formatTable, toCsv } from "./sweep/output";

export function buildCli(args: string[]) {
  return yargs(args)
    .scriptName("crr-sweep")
    .option("config", { type: "string", default: DEFAULT_CONFIG_PATH, desc: "sweep config (YAML)" })
    .command(
      "list",
      "list configured sweeps",
      (y) => y,
      (argv) => {
        const cfg = loadConfig(argv.config);
        for (const s of cfg.sweeps) {
          console.log(`${s.name.padEnd(24)} ${s.instrument.padEnd(12)} ${s.parameter.padEnd(10)} ${s.series.length} series`);
        }
      }
    )
    .command(
      "run [names..]",
      "run sweeps and write one CSV per sweep",
      (y) =>
        y
          .positional("names", { type: "string", array: true, desc: "sweep names (default: all)" })
          .option("out", { type: "string", default: "out", desc: "output directory for CSV files" })
          .option("format", { choices: ["csv", "table"] as const, default: "csv" as const }),
      (argv) => {
        const cfg = loadConfig(argv.config);
        const wanted = argv.names ?? [];
        const unknown = wanted.filter((n) => !cfg.sweeps.some((s) => s.name === n));
        if (unknown.length > 0) {
          throw new Error(`Unknown sweep(s): ${unknown.join(", ")}`);
        }
        const selected = wanted.length > 0 ? cfg.sweeps.filter((s) => wanted.includes(s.name)) : cfg.sweeps;
        const defaults = defaultsFromConfig(cfg);

        if (argv.format === "csv") fs.mkdirSync(argv.out, { recursive: true });
        for (const def of selected) {
          const result = runSweep(def, defaults);
          if (result.skipped > 0) {
            console.warn(`[sweep] ${def.name}: ${result.skipped} point(s) skipped, barrier not on the lattice`);
          }
          if (argv.format === "table") {
            console.log(formatTable(result));
            continue;
          }
          const file = path.join(argv.out, `${def.name}.csv`);
          fs.writeFileSync(file, toCsv(result));
          console.log(`[sweep] ${def.name}: ${result.xs.length} points x ${result.series.length} series -> ${file}`);
        }
      }
    )
    .command(
      "price",
      "price a single contract, defaults taken from the config",
      (y) =>
        y
          .option("instrument", { choices: ["call", "put", "upAndInCall"] as const, default: "call" as const })
          .option("rate", { type: "number" })
          .option("up", { type: "number" })
          .option("down", { type: "number" })
          .option("maturity", { type: "number" })
          .option("startPrice", { type: "number" })
          .option("strike", { type: "number" })
          .option("barrier", { type: "number" })
          .option("bound", { choices: ["exclusive", "inclusive"] as const })
          .option("validate", { type: "boolean" }),
      (argv) => {
        const cfg = loadConfig(argv.config);
        const defaults = defaultsFromConfig(cfg);
        const point: PricingPoint = {
          rate: argv.rate ?? defaults.market.rate,
          up: argv.up ?? defaults.market.up,
          down: argv.down ?? defaults.market.down,
          maturity: argv.maturity ?? defaults.contract.maturity,
          startPrice: argv.startPrice ?? defaults.contract.startPrice,
          strike: argv.strike ?? defaults.contract.strike,
          barrier: argv.barrier ?? defaults.contract.barrier,
        };
        const value = priceInstrument(argv.instrument, point, {
          bound: argv.bound ?? defaults.options.bound,
          validate: argv.validate ?? defaults.options.validate,
        });
        console.log(`${argv.instrument} ${value}`);
      }
    )
    .demandCommand(1)
    .strict()
    .fail(false)
    .help();
}

/** Runs the CLI and reports failures on stderr. Returns the process exit code. */
export function runCli(args: string[]): number {
  try {
    buildCli(args).parseSync();
    return 0;
  } catch (err) {
    if (err instanceof ZodError) {
      console.error("[config] Invalid sweep config:");
      for (const issue of err.issues) console.error(`  ${issue.path.join(".")}: ${issue.message}`);
    } else if (err instanceof CrrPricingError) {
      console.error(`[sweep] ${err.name}: ${err.message}`);
    } else {
      console.error("[sweep] FAILED:", err);
    }
    return 1;
  }
}
