import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { UsageError } from "../errors.js";
import { CliIo, USAGE, parsePlotArgs, runPlot } from "../main.js";
import { cleanDir, forceBlock, makeTmpDir, oszicar, outcar } from "./helpers/fixtures.js";

type Captured = CliIo & { out: string[]; err: string[] };

function capture(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, stdout: (l) => out.push(l), stderr: (l) => err.push(l), columns: 100, env: {} };
}

describe("parsePlotArgs", () => {
  it("applies the defaults", () => {
    expect(parsePlotArgs(["OSZICAR"])).toEqual({ file: "OSZICAR", mode: "energy", start: 1, end: 0 });
  });

  it("reads every flag", () => {
    expect(parsePlotArgs(["OUTCAR", "-F", "-y", "15", "-w", "90", "-b", "2", "-e", "4", "-m", "mean"])).toEqual({
      file: "OUTCAR",
      mode: "force",
      height: 15,
      width: 90,
      start: 2,
      end: 4,
      bucketing: "mean",
    });
  });

  it("prints usage for a leading help token", () => {
    expect(() => parsePlotArgs(["-h"])).toThrow(USAGE);
    expect(() => parsePlotArgs(["--help"])).toThrow(USAGE);
  });

  it("insists on FILE first", () => {
    expect(() => parsePlotArgs(["-y", "10", "OSZICAR"])).toThrow("Must lead with FILE");
  });

  it("rejects unknown flags and non-integer values", () => {
    expect(() => parsePlotArgs(["OSZICAR", "-q"])).toThrow(UsageError);
    expect(() => parsePlotArgs(["OSZICAR", "-y", "ten"])).toThrow(UsageError);
    expect(() => parsePlotArgs(["OSZICAR", "-m", "median"])).toThrow(UsageError);
    expect(() => parsePlotArgs([])).toThrow(UsageError);
  });
});

describe("runPlot", () => {
  let dir: string;
  beforeEach(() => {
    dir = makeTmpDir("plot");
  });
  afterEach(() => cleanDir(dir));

  function write(name: string, text: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, text, "utf8");
    return file;
  }

  it("plots five energy steps end to end", async () => {
    const file = write("OSZICAR", oszicar([5, 4, 3, 2, 1]));
    const io = capture();
    const code = await runPlot([file, "-w", "40", "-y", "10"], io);
    expect(code).toBe(0);
    expect(io.err).toEqual([]);
    expect(io.out).toHaveLength(11);
    expect(io.out[0]).toBe("Energy plot from OSZICAR");
    expect(io.out[9]).toBe(" ".repeat(12) + "|" + "_".repeat(11));
    expect(io.out[10]).toBe(" ".repeat(13) + "1 Step 5");
  });

  it("plots force norms from an OUTCAR", async () => {
    const blocks = Array.from({ length: 12 }, (_, i) => forceBlock(i + 1, [[0, 0, 1 / (i + 1)]]));
    const file = write("OUTCAR", outcar(blocks));
    const io = capture();
    const code = await runPlot([file, "-F", "-w", "40", "-y", "8"], io);
    expect(code).toBe(0);
    expect(io.out[0]).toBe("Maximum Force Norm plot from OUTCAR");
    expect(io.out[1].slice(0, 13)).toBe("          1 |");
    expect(io.out[8]).toBe(" ".repeat(13) + "1 Step 12");
  });

  it("averages each column with -m mean", async () => {
    const file = write("OSZICAR", oszicar(Array.from({ length: 20 }, (_, i) => ((i + 1) % 2 === 0 ? 10 : 0))));
    const sampled = capture();
    expect(await runPlot([file, "-w", "24", "-y", "6"], sampled)).toBe(0);
    expect(sampled.out[1]).toBe("         10 | " + ".".repeat(10));

    const averaged = capture();
    expect(await runPlot([file, "-w", "24", "-y", "6", "-m", "mean"], averaged)).toBe(0);
    expect(averaged.out.slice(1, 5)).toEqual([
      "         10 |" + " ".repeat(10) + ".",
      "   Energy   | " + ".".repeat(9) + " ",
      "     eV     | " + ".".repeat(9) + " ",
      "          0 |." + " ".repeat(10),
    ]);
  });

  it("takes the viewport width from the terminal", async () => {
    const values = Array.from({ length: 200 }, (_, i) => -i);
    const file = write("OSZICAR", oszicar(values));
    const io = { ...capture(), columns: 50 };
    expect(await runPlot([file], io)).toBe(0);
    expect(io.out[io.out.length - 2]).toBe(" ".repeat(12) + "|" + "_".repeat(37));
  });

  it("fails on the wrong file type without drawing", async () => {
    const file = write("OUTCAR", outcar([forceBlock(1, [[1, 0, 0]])]));
    const io = capture();
    expect(await runPlot([file], io)).toBe(1);
    expect(io.out).toEqual(["Are you sure this is an OSZICAR file?"]);
  });

  it("fails on a viewport that is too small", async () => {
    const file = write("OSZICAR", oszicar([5, 4, 3, 2, 1]));
    const io = capture();
    expect(await runPlot([file, "-w", "23"], io)).toBe(1);
    expect(io.out).toEqual(["Viewport is too small!!!"]);
  });

  it("fails on an end beyond the data", async () => {
    const file = write("OSZICAR", oszicar([5, 4, 3, 2, 1]));
    const io = capture();
    expect(await runPlot([file, "-e", "9"], io)).toBe(1);
    expect(io.out).toEqual(["End value cannot exceed final step value"]);
  });

  it("fails on a flat series", async () => {
    const file = write("OSZICAR", oszicar(Array.from({ length: 12 }, () => -3)));
    const io = capture();
    expect(await runPlot([file, "-w", "40"], io)).toBe(1);
    expect(io.out).toEqual(["Quantity differences too fine to depict with this utility."]);
  });

  it("sends usage to stderr", async () => {
    const io = capture();
    expect(await runPlot(["-h"], io)).toBe(1);
    expect(io.err).toEqual([USAGE]);
    expect(io.out).toEqual([]);
  });

  it("reads defaults from a config file", async () => {
    const file = write("OSZICAR", oszicar([5, 4, 3, 2, 1]));
    const cfg = write("plot.yaml", "plot:\n  height: 10\n  width: 40\n  marker: '#'\n");
    const io = capture();
    expect(await runPlot([file, "-c", cfg], io)).toBe(0);
    expect(io.out).toHaveLength(11);
    expect(io.out[1]).toBe("          5 |###" + " ".repeat(8));
  });
});
