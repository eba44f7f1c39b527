import { StepRangeError } from "./errors.js";

export type ViewWindow = {
  start: number;
  end: number;
};

export function resolveWindow(requested: ViewWindow, total: number): ViewWindow {
  const end = requested.end === 0 ? total : requested.end;
  if (end > total) throw new StepRangeError("End value cannot exceed final step value");
  if (requested.start < 1) throw new StepRangeError("Starting index cannot be lower than 1");
  if (end < requested.start) throw new StepRangeError("Starting index cannot preceed ending");
  return { start: requested.start, end };
}
