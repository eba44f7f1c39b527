import fs from "fs";
import os from "os";
import path from "path";

export const OSZICAR_HEADER =
  "       N       E                     dE             d eps       ncg     rms          rms(c)";
export const OUTCAR_HEADER = " vasp.6.3.0 18Jan22 (build Feb 12 2022 10:13:39) complex";
const DASHES = ` ${"-".repeat(83)}`;

/** One `N F= value` line per entry, preceded by an electronic-step line. */
export function oszicar(values: Array<number | string>): string {
  const lines = [OSZICAR_HEADER];
  values.forEach((v, i) => {
    lines.push(`DAV:   1    -0.100000000000E+03   -0.10000E+03   -0.20000E+04  1000   0.500E+02`);
    lines.push(`   ${i + 1} F= ${v} E0= ${v}  d E =-.100000E+03`);
  });
  return lines.join("\n") + "\n";
}

export function ionicHeader(step: number): string {
  return `--------------------------------------- Ionic step        ${step}  -------------------------------------------`;
}

export function forceRow(fx: number, fy: number, fz: number): string {
  return `      0.00000      0.00000      0.00000         ${fx.toFixed(6)}      ${fy.toFixed(6)}      ${fz.toFixed(6)}`;
}

/** A complete per-step force block, footer included. */
export function forceBlock(step: number, rows: Array<[number, number, number]>): string[] {
  return [
    ionicHeader(step),
    "  FREE ENERGIE OF THE ION-ELECTRON SYSTEM (eV)",
    " POSITION                                       TOTAL-FORCE (eV/Angst)",
    DASHES,
    ...rows.map(([x, y, z]) => forceRow(x, y, z)),
    DASHES,
    "    total drift:                                0.000000      0.000000      0.000000",
  ];
}

export const FOOTER = DASHES;

export function outcar(blocks: string[][]): string {
  return [OUTCAR_HEADER, ...blocks.flat()].join("\n") + "\n";
}

export function makeTmpDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `vapack-${label}-`));
}

export function cleanDir(p: string): void {
  fs.rmSync(p, { recursive: true, force: true });
}
