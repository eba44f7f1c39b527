#!/usr/bin/env node
import { parseArgs } from "util";
import { isBucketing } from "./bucket.js";
import { Config, loadConfig } from "./config.js";
import { PlotError, UsageError } from "./errors.js";
import { extractFromFile } from "./log_extract.js";
import { renderChart } from "./render_ascii.js";
import { Mode, errorMessage, parseInteger, isMainModule } from "./util.js";
import { resolveWindow } from "./view_window.js";

export const USAGE =
  "Usage: vplot FILE [-y <height>] [-w <width>] [-b <begin>] [-e <end>] [-F] [-m <sample|mean>] [-c <config.yaml>]";

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  columns?: number;
  env?: NodeJS.ProcessEnv;
};

export type PlotArgs = {
  file: string;
  mode: Mode;
  height?: number;
  width?: number;
  start: number;
  end: number;
  bucketing?: string;
  config?: string;
};

function intFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = parseInteger(raw);
  if (n === undefined) throw new UsageError(`Option -${name} expects an integer, got '${raw}'\n${USAGE}`);
  return n;
}

function readFlags(args: string[]) {
  try {
    return parseArgs({
      args,
      strict: true,
      allowPositionals: false,
      options: {
        height: { type: "string", short: "y" },
        width: { type: "string", short: "w" },
        begin: { type: "string", short: "b" },
        end: { type: "string", short: "e" },
        force: { type: "boolean", short: "F" },
        bucketing: { type: "string", short: "m" },
        config: { type: "string", short: "c" },
      },
    }).values;
  } catch (e) {
    throw new UsageError(`${errorMessage(e)}\n${USAGE}`);
  }
}

export function parsePlotArgs(argv: string[]): PlotArgs {
  const [file, ...rest] = argv;
  if (!file) throw new UsageError(USAGE);
  if (file.startsWith("-")) {
    if (/^-+h/.test(file)) throw new UsageError(USAGE);
    throw new UsageError("Must lead with FILE", "stdout");
  }
  const values = readFlags(rest);
  if (values.bucketing !== undefined && !isBucketing(values.bucketing)) {
    throw new UsageError(`Unknown bucketing '${values.bucketing}'\n${USAGE}`);
  }
  return {
    file,
    mode: values.force ? "force" : "energy",
    height: intFlag("y", values.height),
    width: intFlag("w", values.width),
    start: intFlag("b", values.begin) ?? 1,
    end: intFlag("e", values.end) ?? 0,
    bucketing: values.bucketing,
    config: values.config,
  };
}

function terminalWidth(io: CliIo): number {
  if (io.columns && io.columns > 0) return io.columns;
  return parseInteger(io.env?.COLUMNS ?? "") ?? 80;
}

export async function runPlot(argv: string[], io: CliIo): Promise<number> {
  try {
    const args = parsePlotArgs(argv);
    const cfg: Config = loadConfig(args.config, io.env ?? process.env);
    const extraction = await extractFromFile(args.file, args.mode);
    const window = resolveWindow({ start: args.start, end: args.end }, extraction.total);
    const lines = renderChart(extraction.series, args.mode, window, {
      viewportWidth: args.width ?? cfg.plot.width ?? terminalWidth(io),
      viewportHeight: args.height ?? cfg.plot.height,
      marker: cfg.plot.marker,
      tolerance: cfg.plot.tolerance,
      bucketing: isBucketing(args.bucketing) ? args.bucketing : cfg.plot.bucketing,
    });
    for (const line of lines) io.stdout(line);
    return 0;
  } catch (e) {
    if (e instanceof PlotError) {
      (e.stream === "stderr" ? io.stderr : io.stdout)(e.message);
      return e.exitCode;
    }
    throw e;
  }
}

async function main() {
  const code = await runPlot(process.argv.slice(2), {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    columns: process.stdout.columns,
    env: process.env,
  });
  process.exitCode = code;
}

const isMain = isMainModule(import.meta.url);
if (isMain) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
