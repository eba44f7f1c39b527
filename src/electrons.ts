#!/usr/bin/env node
import { FormatError } from "./errors.js";
import { errorMessage, fields, parseInteger, parseNumber, readText, isMainModule } from "./util.js";

export type Potential = {
  label: string;
  element: string;
  zval: number;
};

export type Composition = Map<string, number>;

const ZVAL_WINDOW = 10;

export function parsePotcar(text: string): Potential[] {
  const lines = text.split(/\r?\n/);
  const out: Potential[] = [];
  lines.forEach((line, idx) => {
    if (!/TITEL/.test(line)) return;
    const label = fields(line)[3];
    if (!label) throw new FormatError(`POTCAR line ${idx + 1}: TITEL without an element`);
    let zval: number | undefined;
    for (const next of lines.slice(idx + 1, idx + 1 + ZVAL_WINDOW)) {
      const f = fields(next);
      const at = f.indexOf("ZVAL");
      if (at < 0) continue;
      zval = parseNumber((f[at + 2] ?? "").replace(/;$/, ""));
      break;
    }
    if (zval === undefined) throw new FormatError(`POTCAR: no ZVAL found for ${label}`);
    out.push({ label, element: label.split("_")[0], zval });
  });
  if (out.length === 0) throw new FormatError("POTCAR: no TITEL entries found");
  return out;
}

export function parsePoscar(text: string): Composition {
  const lines = text.split(/\r?\n/);
  const symbols = fields(lines[5] ?? "");
  const counts = fields(lines[6] ?? "").map((s) => parseInteger(s));
  if (symbols.length === 0 || symbols.some((s) => !/^[A-Z][a-z]?$/.test(s))) {
    throw new FormatError("POSCAR: line 6 must list element symbols");
  }
  if (counts.length < symbols.length) {
    throw new FormatError("POSCAR: line 7 must give a count for every element");
  }
  const out: Composition = new Map();
  symbols.forEach((sym, i) => {
    const n = counts[i];
    if (n === undefined || n < 0) throw new FormatError(`POSCAR: bad count for ${sym}`);
    out.set(sym, (out.get(sym) ?? 0) + n);
  });
  return out;
}

export function countElectrons(poscar: string, potcar: string): number {
  const composition = parsePoscar(poscar);
  let total = 0;
  for (const pot of parsePotcar(potcar)) {
    const count = composition.get(pot.element);
    if (count === undefined) throw new FormatError(`POSCAR has no ${pot.element} listed for POTCAR entry ${pot.label}`);
    total += count * pot.zval;
  }
  return total;
}

const isMain = isMainModule(import.meta.url);
if (isMain) {
  const poscarPath = process.argv[2] ?? "POSCAR";
  const potcarPath = process.argv[3] ?? "POTCAR";
  try {
    console.log(String(countElectrons(readText(poscarPath), readText(potcarPath))));
  } catch (e) {
    console.error(errorMessage(e));
    process.exit(1);
  }
}
