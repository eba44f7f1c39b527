#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { parseArgs } from "util";
import { Config, loadConfig } from "./config.js";
import { PlotError, UsageError } from "./errors.js";
import { modifyJobScript } from "./job_script.js";
import { Metadata, newMetadata, readMetadata, writeMetadata } from "./metadata.js";
import { SpawnFn, packageJob } from "./package_job.js";
import { errorMessage, readText, writeText, isMainModule } from "./util.js";

export const JOBMAN_USAGE = [
  "Usage: jobman -[option(s)]",
  "  Option",
  "    n        name <name>",
  "    i        initialize",
  "    p        package",
  "    m        modify",
  "    c        config <file>",
].join("\n");

export type JobmanArgs = {
  name?: string;
  initialize: boolean;
  package: boolean;
  modify: boolean;
  config?: string;
};

export type JobmanContext = {
  cwd: string;
  log: (line: string) => void;
  error: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFn;
  now?: Date;
};

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        name: { type: "string", short: "n" },
        initialize: { type: "boolean", short: "i" },
        package: { type: "boolean", short: "p" },
        modify: { type: "boolean", short: "m" },
        config: { type: "string", short: "c" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (e) {
    throw new UsageError(`${errorMessage(e)}\n${JOBMAN_USAGE}`);
  }
}

export function parseJobmanArgs(argv: string[]): JobmanArgs {
  const values = readFlags(argv);
  const args: JobmanArgs = {
    name: values.name,
    initialize: values.initialize ?? false,
    package: values.package ?? false,
    modify: values.modify ?? false,
    config: values.config,
  };
  if (values.help || !(args.initialize || args.package || args.modify)) throw new UsageError(JOBMAN_USAGE);
  return args;
}

function identity(cfg: Config, args: JobmanArgs, ctx: JobmanContext): Metadata {
  const existing = readMetadata(path.join(ctx.cwd, cfg.job.metadata_file));
  const base = existing ?? newMetadata("", ctx.now);
  return args.name !== undefined ? { ...base, human_name: args.name } : base;
}

export function runJobman(argv: string[], ctx: JobmanContext): number {
  try {
    const args = parseJobmanArgs(argv);
    const cfg = loadConfig(args.config, ctx.env ?? process.env, ctx.cwd);
    const meta = identity(cfg, args, ctx);
    const archiveName = `${cfg.job.prefix}${meta.id}`;
    if (args.name !== undefined) ctx.log(`Naming calculation: ${args.name}`);

    if (args.modify) {
      const script = path.join(ctx.cwd, cfg.job.job_script);
      ctx.log(`Modifying ${cfg.job.job_script}`);
      const original = readText(script);
      const modified = modifyJobScript(original, { metadataFile: cfg.job.metadata_file, archiveName });
      fs.copyFileSync(script, `${script}.tmp`);
      writeText(script, modified);
    }
    if (args.initialize) {
      ctx.log(`Writing ${cfg.job.metadata_file}...`);
      writeMetadata(path.join(ctx.cwd, cfg.job.metadata_file), { ...meta, status: "initialized" });
    }
    if (args.package) {
      ctx.log(`Packing ${archiveName}`);
      const out = packageJob({ cwd: ctx.cwd, config: cfg.job, spawn: ctx.spawn });
      ctx.log(`Wrote ${path.basename(out)}`);
    }
    return 0;
  } catch (e) {
    if (e instanceof PlotError) {
      ctx.error(e.message);
      return e.exitCode;
    }
    throw e;
  }
}

const isMain = isMainModule(import.meta.url);
if (isMain) {
  try {
    process.exitCode = runJobman(process.argv.slice(2), {
      cwd: process.cwd(),
      log: (line) => console.log(line),
      error: (line) => console.error(line),
    });
  } catch (e) {
    console.error(e);
    process.exit(1);
  }
}
