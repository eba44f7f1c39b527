import fs from "fs";
import { pathToFileURL } from "url";
import { IoError } from "./errors.js";

export type Mode = "energy" | "force";

export type Point = {
  step: number;
  value: number;
};

export type Series = Point[];

export function readText(path: string): string {
  try {
    return fs.readFileSync(path, "utf8");
  } catch (e) {
    throw new IoError(`Cannot read ${path}: ${errorMessage(e)}`);
  }
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function isMainModule(metaUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return metaUrl === pathToFileURL(fs.realpathSync(entry)).href;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function fields(line: string): string[] {
  const t = line.trim();
  return t.length === 0 ? [] : t.split(/\s+/);
}

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(s: string): number | undefined {
  if (!NUMERIC.test(s)) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

export function parseInteger(s: string): number | undefined {
  if (!/^[+-]?\d+$/.test(s)) return undefined;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string") return parseNumber(v.trim());
  return undefined;
}

function trimZeros(digits: string): string {
  if (!digits.includes(".")) return digits;
  return digits.replace(/0+$/, "").replace(/\.$/, "");
}

// toFixed and toExponential round an exact tie away from zero; printf rounds it to even.
function tieToEven(abs: number, halfUp: string, longer: string): string {
  const [digits, exp] = longer.split("e");
  if (Number(longer) !== abs || !digits.endsWith("5")) return halfUp;
  const cut = digits.slice(0, -1).replace(/\.$/, "");
  if (Number(cut.charAt(cut.length - 1)) % 2 !== 0) return halfUp;
  return exp === undefined ? cut : `${cut}e${exp}`;
}

export function formatG(value: number, precision = 6): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value < 0 ? "-inf" : "inf";
  if (value === 0) return Object.is(value, -0) ? "-0" : "0";
  const p = Math.max(1, precision);
  const sign = value < 0 ? "-" : "";
  const abs = Math.abs(value);
  const exp = Number(abs.toExponential(p - 1).split("e")[1]);
  if (exp < -4 || exp >= p) {
    const [mantissa, expPart] = tieToEven(abs, abs.toExponential(p - 1), abs.toExponential(p)).split("e");
    const e = Number(expPart);
    const digits = String(Math.abs(e)).padStart(2, "0");
    return `${sign}${trimZeros(mantissa)}e${e < 0 ? "-" : "+"}${digits}`;
  }
  return sign + trimZeros(tieToEven(abs, abs.toFixed(p - 1 - exp), abs.toFixed(p - exp)));
}
