import { Bucket, Bucketing, buildBuckets, valueRange } from "./bucket.js";
import { DegenerateDataError, InsufficientDataError, ViewportError } from "./errors.js";
import { Mode, Series, formatG } from "./util.js";
import { ViewWindow } from "./view_window.js";

export const GUTTER_COLUMNS = 14;
export const AXIS_ROWS = 2;
export const MIN_WIDTH = 10;
export const MIN_HEIGHT = 3;
const X_LABEL_BUDGET = 20;
export const DEFAULT_TOLERANCE = 1e-6;

export type RenderOptions = {
  viewportWidth: number;
  viewportHeight: number;
  marker?: string;
  tolerance?: number;
  bucketing?: Bucketing;
};

export type Canvas = {
  width: number;
  height: number;
  viewportWidth: number;
};

type Labels = {
  title: string;
  ylabel: string;
  unit: string;
};

const LABELS: Record<Mode, Labels> = {
  energy: { title: "Energy plot from OSZICAR", ylabel: "Energy", unit: " eV " },
  force: { title: "Maximum Force Norm plot from OUTCAR", ylabel: "Force ", unit: "eV/Å" },
};

function spaces(n: number): string {
  return " ".repeat(Math.max(0, n));
}

/**
 * Width shrinks to the number of steps in view, but not below MIN_WIDTH: a short
 * run is stretched over the minimum canvas.
 */
export function canvasSize(window: ViewWindow, viewportWidth: number, viewportHeight: number): Canvas {
  let width = viewportWidth - GUTTER_COLUMNS;
  let vwidth = viewportWidth;
  const cap = Math.max(window.end - window.start, MIN_WIDTH);
  if (width > cap) {
    width = cap;
    vwidth = width + GUTTER_COLUMNS;
  }
  const height = viewportHeight - AXIS_ROWS;
  if (width < MIN_WIDTH || height < MIN_HEIGHT) throw new ViewportError();
  return { width, height, viewportWidth: vwidth };
}

export function rasterize(buckets: Bucket[], height: number, min: number, max: number): boolean[][] {
  const band = (max - min) / height;
  const rows: boolean[][] = [];
  for (let j = 1; j <= height; j += 1) {
    const rowMax = max - (j - 1) * band;
    const rowMin = j === height ? min : max - j * band;
    rows.push(buckets.map((b) => b.value !== undefined && b.value <= rowMax && b.value >= rowMin));
  }
  return rows;
}

function gutter(j: number, height: number, max: number, min: number, labels: Labels): string {
  const mid = Math.floor(height / 2);
  if (j === 1) return `   ${formatG(max).padStart(8)} |`;
  if (j === mid) return `   ${labels.ylabel}   |`;
  if (j === mid + 1) return `    ${labels.unit}    |`;
  if (j === height) return `   ${formatG(min).padStart(8)} |`;
  return `${spaces(11)} |`;
}

export function renderChart(series: Series, mode: Mode, window: ViewWindow, opts: RenderOptions): string[] {
  const canvas = canvasSize(window, opts.viewportWidth, opts.viewportHeight);
  const buckets = buildBuckets(series, canvas.width, window, opts.bucketing ?? "sample");
  const range = valueRange(buckets);
  if (!range) throw new InsufficientDataError("Insufficient data: no steps inside the selected window");
  const { min, max } = range;
  const tolerance = opts.tolerance !== undefined && opts.tolerance > 0 ? opts.tolerance : DEFAULT_TOLERANCE;
  if (Math.abs(max - min) < tolerance) throw new DegenerateDataError();

  const marker = opts.marker ?? ".";
  const labels = LABELS[mode];
  const vwidth = canvas.viewportWidth;
  const out: string[] = [];

  const pad = Math.floor((vwidth - labels.title.length) / 2);
  out.push(`${spaces(pad)}${labels.title}${spaces(pad)}`);

  const grid = rasterize(buckets, canvas.height, min, max);
  grid.forEach((row, idx) => {
    const cells = row.map((on) => (on ? marker : " ")).join("");
    out.push(`${gutter(idx + 1, canvas.height, max, min, labels)}${cells}`);
  });

  out.push(`${spaces(12)}|${"_".repeat(buckets.length)}`);

  const s = String(window.start);
  const n = String(window.end);
  const xpad = Math.ceil((vwidth - X_LABEL_BUDGET - s.length - n.length) / 2);
  out.push(`${spaces(13)}${s}${spaces(xpad)}Step${spaces(xpad)}${n}`);
  return out;
}
