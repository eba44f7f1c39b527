import fs from "fs";
import path from "path";
import { spawnSync, SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns } from "child_process";
import { JobConfig } from "./config.js";
import { JobError } from "./errors.js";
import { splitLines } from "./job_script.js";
import { readMetadata, setStatus } from "./metadata.js";
import { writeText } from "./util.js";

export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnSyncOptionsWithStringEncoding,
) => SpawnSyncReturns<string>;

export type ArchiveOptions = {
  id: string;
  prefix: string;
  jobScript: string;
};

function hasCode(e: unknown): e is { code: unknown } {
  return typeof e === "object" && e !== null && "code" in e;
}

function defaultSharBin(): string {
  const v = process.env.SHAR_BIN?.trim();
  return v ? v : "shar";
}

export function sharArgs(files: string[], id: string, cfg: JobConfig): string[] {
  return ["-T", "-n", `${cfg.prefix}${id}`, "-s", `${cfg.submitter}@${cfg.site}`, ...files];
}

export function runShar(
  files: string[],
  id: string,
  cfg: JobConfig,
  cwd: string,
  sharBin: string = defaultSharBin(),
  spawn: SpawnFn = spawnSync,
): string {
  const res = spawn(sharBin, sharArgs(files, id, cfg), { cwd, encoding: "utf8" });
  if (res.error) {
    if (hasCode(res.error) && res.error.code === "ENOENT") {
      throw new JobError(`shar not found ('${sharBin}'). Install GNU sharutils or set SHAR_BIN to the executable path.`);
    }
    throw new JobError(`Failed to launch shar ('${sharBin}'): ${res.error.message}`);
  }
  if (res.status !== 0) {
    const detail = res.stderr.trim();
    throw new JobError(`shar failed with exit code ${res.status}${detail ? `: ${detail}` : ""}`);
  }
  return res.stdout;
}

export function preUnshar(opts: ArchiveOptions): string[] {
  const dir = `${opts.prefix}${opts.id}`;
  return [
    "# Pre unshar instructions",
    `if [ ! -d "${dir}" ]; then`,
    `  mkdir "${dir}"`,
    "fi",
    `cd "${dir}"`,
  ];
}

export function postUnshar(opts: ArchiveOptions): string[] {
  return [
    "# Post unshar instructions",
    "",
    `if [ "$1" != "--unpack-only" ]; then`,
    `    sbatch ${opts.jobScript} || echo "Failed to queue"`,
    "fi",
  ];
}

/**
 * Rewrites raw shar output into a self-extracting job package: the archive
 * unpacks into its own directory and submits the job unless `--unpack-only`.
 * The shar shebang and its trailing `exit 0` are replaced.
 */
export function buildArchive(sharOutput: string, opts: ArchiveOptions): string {
  const lines = splitLines(sharOutput).map((l) => (/# Source directory was/.test(l) ? "#" : l));
  const body = lines.slice(1, -1);
  return ["#!/bin/sh", ...preUnshar(opts), ...body, ...postUnshar(opts), "exit 0"].join("\n") + "\n";
}

export type PackageOptions = {
  cwd: string;
  config: JobConfig;
  sharBin?: string;
  spawn?: SpawnFn;
};

export function packageJob(opts: PackageOptions): string {
  const cfg = opts.config;
  const metaPath = path.join(opts.cwd, cfg.metadata_file);
  const meta = readMetadata(metaPath);
  if (!meta) throw new JobError(`${cfg.metadata_file} not found; run with -i first`);

  const files = [...cfg.inputs, cfg.job_script, cfg.metadata_file];
  const missing = files.filter((f) => !fs.existsSync(path.join(opts.cwd, f)));
  if (missing.length > 0) throw new JobError(`Missing input files: ${missing.join(", ")}`);

  setStatus(metaPath, "packaged");
  const raw = runShar(files, meta.id, cfg, opts.cwd, opts.sharBin, opts.spawn);
  const archive = buildArchive(raw, { id: meta.id, prefix: cfg.prefix, jobScript: cfg.job_script });
  const out = path.join(opts.cwd, `${cfg.prefix}${meta.id}${cfg.suffix}`);
  writeText(out, archive);

  const backup = path.join(opts.cwd, `${cfg.job_script}.tmp`);
  if (fs.existsSync(backup)) fs.renameSync(backup, path.join(opts.cwd, cfg.job_script));
  return out;
}
