import fs from "fs";
import readline from "readline";
import { FormatError, InsufficientDataError, IoError, PlotError } from "./errors.js";
import { Mode, Series, errorMessage, fields, parseInteger, parseNumber, isMainModule } from "./util.js";

export type LogFormat = "oszicar" | "outcar";

export type Extraction = {
  mode: Mode;
  series: Series;
  total: number;
};

const OSZICAR_HEADER = /N\s*E\s*dE\s*d eps\s*ncg\s*rms\s*rms\(c\)/;
const OUTCAR_HEADER = /vasp\.[56].*/;

const ENERGY_LINE = /^\s*[0-9]+ F=/;
const STEP_HEADER = /-+ Ionic step\s*([0-9]+)\s*-+/;
const FORCE_HEADER = /^\s*POSITION\s+TOTAL-FORCE/;
const FOOTER = /^ -+$/;

export function sniffFormat(firstLine: string): LogFormat | undefined {
  if (OSZICAR_HEADER.test(firstLine)) return "oszicar";
  if (OUTCAR_HEADER.test(firstLine)) return "outcar";
  return undefined;
}

export function formatForMode(mode: Mode): LogFormat {
  return mode === "energy" ? "oszicar" : "outcar";
}

export function checkSignature(firstLine: string, mode: Mode): void {
  const want = formatForMode(mode);
  if (sniffFormat(firstLine) !== want) {
    throw new FormatError(`Are you sure this is an ${want.toUpperCase()} file?`);
  }
}

export interface LineScanner {
  push(line: string, lineNo: number): void;
  finish(): Extraction;
}

class EnergyScanner implements LineScanner {
  private readonly series: Series = [];
  private total = 0;

  push(line: string, lineNo: number): void {
    if (!ENERGY_LINE.test(line)) return;
    this.total += 1;
    const f = fields(line);
    const step = parseInteger(f[0] ?? "");
    const value = parseNumber(f[2] ?? "");
    if (step === undefined || value === undefined) {
      throw new FormatError(`Malformed energy record on line ${lineNo}: ${line.trim()}`);
    }
    const last = this.series[this.series.length - 1];
    if (last && step <= last.step) return;
    this.series.push({ step, value });
  }

  finish(): Extraction {
    return { mode: "energy", series: this.series, total: this.total };
  }
}

export enum ForceState {
  AwaitStepHeader = "AwaitStepHeader",
  AwaitTableHeader = "AwaitTableHeader",
  AccumulatingRows = "AccumulatingRows",
  AwaitFooter = "AwaitFooter",
}

function forceRow(line: string): [number, number, number] | undefined {
  const f = fields(line);
  if (f.length !== 6) return undefined;
  const nums: number[] = [];
  for (const s of f) {
    const n = parseNumber(s);
    if (n === undefined) return undefined;
    nums.push(n);
  }
  return [nums[3], nums[4], nums[5]];
}

/**
 * Per ionic step: header, TOTAL-FORCE table header, rows, dashed footer.
 * Only a block that reaches its footer produces a value.
 */
export class ForceScanner implements LineScanner {
  state: ForceState = ForceState.AwaitStepHeader;
  private readonly series: Series = [];
  private total = 0;
  private step = 0;
  private rows = 0;
  private maxNorm2 = 0;

  push(line: string): void {
    const header = STEP_HEADER.exec(line);
    if (header) {
      this.total += 1;
      // An unfinished block is abandoned here.
      this.step = Number(header[1]);
      this.state = ForceState.AwaitTableHeader;
      return;
    }
    switch (this.state) {
      case ForceState.AwaitStepHeader:
        return;
      case ForceState.AwaitTableHeader:
        if (FORCE_HEADER.test(line)) {
          this.rows = 0;
          this.maxNorm2 = 0;
          this.state = ForceState.AccumulatingRows;
        }
        return;
      case ForceState.AccumulatingRows: {
        const row = forceRow(line);
        if (row) {
          const [fx, fy, fz] = row;
          this.maxNorm2 = Math.max(this.maxNorm2, fx * fx + fy * fy + fz * fz);
          this.rows += 1;
          return;
        }
        if (this.rows === 0) return;
        this.state = ForceState.AwaitFooter;
        if (FOOTER.test(line)) this.close();
        return;
      }
      case ForceState.AwaitFooter:
        if (FOOTER.test(line)) this.close();
        return;
    }
  }

  private close(): void {
    const last = this.series[this.series.length - 1];
    if (!last || this.step > last.step) {
      this.series.push({ step: this.step, value: Math.sqrt(this.maxNorm2) });
    }
    this.state = ForceState.AwaitStepHeader;
  }

  finish(): Extraction {
    return { mode: "force", series: this.series, total: this.total };
  }
}

export function createScanner(mode: Mode): LineScanner {
  return mode === "energy" ? new EnergyScanner() : new ForceScanner();
}

function requireData(x: Extraction): Extraction {
  if (x.series.length === 0) {
    throw new InsufficientDataError(`Insufficient data: no ${x.mode} steps found`);
  }
  return x;
}

export function extractFromLines(lines: Iterable<string>, mode: Mode): Extraction {
  const scanner = createScanner(mode);
  let lineNo = 0;
  for (const line of lines) {
    lineNo += 1;
    if (lineNo === 1) checkSignature(line, mode);
    scanner.push(line, lineNo);
  }
  if (lineNo === 0) checkSignature("", mode);
  return requireData(scanner.finish());
}

export function extractFromText(text: string, mode: Mode): Extraction {
  return extractFromLines(text.split(/\r?\n/), mode);
}

function readFailure(path: string, e: unknown): PlotError {
  return e instanceof PlotError ? e : new IoError(`Cannot read ${path}: ${errorMessage(e)}`);
}

export async function extractFromFile(path: string, mode: Mode): Promise<Extraction> {
  const input = fs.createReadStream(path, { encoding: "utf8" });
  const opened = new Promise<void>((resolve, reject) => {
    input.once("ready", () => resolve());
    input.once("error", (e) => reject(readFailure(path, e)));
  });
  await opened;
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const scanner = createScanner(mode);
  let lineNo = 0;
  try {
    for await (const line of rl) {
      lineNo += 1;
      if (lineNo === 1) checkSignature(line, mode);
      scanner.push(line, lineNo);
    }
  } catch (e) {
    throw readFailure(path, e);
  } finally {
    rl.close();
    input.destroy();
  }
  if (lineNo === 0) checkSignature("", mode);
  return requireData(scanner.finish());
}

const isMain = isMainModule(import.meta.url);
if (isMain && process.argv.length >= 3) {
  const file = process.argv[2];
  const mode: Mode = process.argv[3] === "force" ? "force" : "energy";
  extractFromFile(file, mode).then((x) => {
    process.stdout.write(JSON.stringify(x, null, 2));
  }).catch((e) => {
    console.error(errorMessage(e));
    process.exit(1);
  });
}
