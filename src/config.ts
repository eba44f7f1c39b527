import fs from "fs";
import os from "os";
import path from "path";
import yaml from "js-yaml";
import { Bucketing, isBucketing } from "./bucket.js";
import { FormatError } from "./errors.js";
import { DEFAULT_TOLERANCE } from "./render_ascii.js";
import { asNum, errorMessage, readText } from "./util.js";

export const DEFAULT_CONFIG_FILE = "vapack.yaml";

export type PlotConfig = {
  height: number;
  width?: number;
  marker: string;
  bucketing: Bucketing;
  tolerance: number;
};

export type JobConfig = {
  submitter: string;
  site: string;
  prefix: string;
  suffix: string;
  job_script: string;
  metadata_file: string;
  inputs: string[];
};

export type Config = {
  plot: PlotConfig;
  job: JobConfig;
};

type RawConfig = {
  plot?: Record<string, unknown>;
  job?: Record<string, unknown>;
};

export function defaultConfig(): Config {
  return {
    plot: { height: 20, marker: ".", bucketing: "sample", tolerance: DEFAULT_TOLERANCE },
    job: {
      submitter: os.userInfo().username,
      site: os.hostname(),
      prefix: "C-",
      suffix: ".shar",
      job_script: "vasp.slurm",
      metadata_file: "metadata.yml",
      inputs: ["INCAR", "POSCAR", "POTCAR", "KPOINTS"],
    },
  };
}

function asStr(v: unknown): string | undefined {
  if (typeof v === "string" && v.length > 0) return v;
  if (typeof v === "number") return String(v);
  return undefined;
}

function asInt(v: unknown): number | undefined {
  const n = asNum(v);
  return n !== undefined && Number.isInteger(n) ? n : undefined;
}

function asPositive(v: unknown): number | undefined {
  const n = asNum(v);
  return n !== undefined && n > 0 ? n : undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(raw: Record<string, unknown>, key: keyof RawConfig): Record<string, unknown> {
  const v = raw[key];
  return isRecord(v) ? v : {};
}

export function mergeConfig(raw: unknown, base: Config = defaultConfig()): Config {
  const root = isRecord(raw) ? raw : {};
  const plot = section(root, "plot");
  const job = section(root, "job");
  const marker = asStr(plot.marker);
  return {
    plot: {
      height: asInt(plot.height) ?? base.plot.height,
      width: asInt(plot.width) ?? base.plot.width,
      marker: marker ? marker.slice(0, 1) : base.plot.marker,
      bucketing: isBucketing(plot.bucketing) ? plot.bucketing : base.plot.bucketing,
      tolerance: asPositive(plot.tolerance) ?? base.plot.tolerance,
    },
    job: {
      submitter: asStr(job.submitter) ?? base.job.submitter,
      site: asStr(job.site) ?? base.job.site,
      prefix: asStr(job.prefix) ?? base.job.prefix,
      suffix: asStr(job.suffix) ?? base.job.suffix,
      job_script: asStr(job.job_script) ?? base.job.job_script,
      metadata_file: asStr(job.metadata_file) ?? base.job.metadata_file,
      inputs: Array.isArray(job.inputs)
        ? job.inputs.filter((x): x is string => typeof x === "string")
        : base.job.inputs,
    },
  };
}

export function parseConfig(text: string, source = "config"): Config {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new FormatError(`Invalid YAML in ${source}: ${errorMessage(e)}`);
  }
  return mergeConfig(raw);
}

export function loadConfig(explicit?: string, env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Config {
  const file = explicit ?? env.VAPACK_CONFIG;
  if (file) return parseConfig(readText(file), file);
  const local = path.join(cwd, DEFAULT_CONFIG_FILE);
  if (fs.existsSync(local)) return parseConfig(readText(local), local);
  return defaultConfig();
}
