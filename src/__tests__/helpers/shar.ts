import { SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns } from "child_process";
import { vi } from "vitest";

export const SHAR_OUTPUT = [
  "#!/bin/sh",
  "# This is a shell archive (produced by GNU sharutils 4.15.2).",
  "# Source directory was '/home/someone/calc'.",
  "echo x - INCAR",
  "exit 0",
  "",
].join("\n");

export function sharResult(stdout: string, status: number | null = 0, stderr = "", error?: Error): SpawnSyncReturns<string> {
  return { pid: 1, output: [null, stdout, stderr], stdout, stderr, status, signal: null, error };
}

export function fakeShar(result: SpawnSyncReturns<string>) {
  return vi.fn((_cmd: string, _args: string[], _opts: SpawnSyncOptionsWithStringEncoding) => result);
}
