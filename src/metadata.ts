import crypto from "crypto";
import fs from "fs";
import yaml from "js-yaml";
import { FormatError } from "./errors.js";
import { errorMessage, readText, writeText } from "./util.js";

export type JobStatus = "initialized" | "packaged" | "queued" | "complete";

const STATUSES: readonly JobStatus[] = ["initialized", "packaged", "queued", "complete"];

export type Metadata = {
  human_name: string;
  id: string;
  created: string;
  status: JobStatus;
};

function isStatus(v: unknown): v is JobStatus {
  return typeof v === "string" && (STATUSES as readonly string[]).includes(v);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function newCalcId(nowNs: bigint = BigInt(Date.now()) * 1_000_000n + (process.hrtime.bigint() % 1_000_000n)): string {
  return crypto.createHash("sha256").update(`${nowNs}\n`).digest("hex").slice(0, 12);
}

export function timestamp(d: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function newMetadata(humanName = "", now: Date = new Date(), id: string = newCalcId()): Metadata {
  return { human_name: humanName, id, created: timestamp(now), status: "initialized" };
}

export function parseMetadata(text: string, source = "metadata"): Metadata {
  let raw: unknown;
  try {
    raw = yaml.load(text, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (e) {
    throw new FormatError(`Invalid YAML in ${source}: ${errorMessage(e)}`);
  }
  if (!isRecord(raw)) throw new FormatError(`${source}: expected a mapping`);
  const id = raw.id;
  if (typeof id !== "string" || id.length === 0) throw new FormatError(`${source}: missing id`);
  return {
    human_name: typeof raw.human_name === "string" ? raw.human_name : "",
    id,
    created: typeof raw.created === "string" ? raw.created : "",
    status: isStatus(raw.status) ? raw.status : "initialized",
  };
}

export function formatMetadata(meta: Metadata): string {
  return `---\n${yaml.dump(meta, { schema: yaml.FAILSAFE_SCHEMA, quotingType: '"' })}`;
}

export function readMetadata(path: string): Metadata | undefined {
  if (!fs.existsSync(path)) return undefined;
  return parseMetadata(readText(path), path);
}

export function writeMetadata(path: string, meta: Metadata): void {
  writeText(path, formatMetadata(meta));
}

export function setStatus(path: string, status: JobStatus): Metadata {
  const meta = readMetadata(path);
  if (!meta) throw new FormatError(`${path} does not exist; initialize the calculation first`);
  const next = { ...meta, status };
  writeMetadata(path, next);
  return next;
}
