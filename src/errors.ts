export enum ErrorCategory {
  Usage = "USAGE",
  Format = "FORMAT",
  Range = "RANGE",
  Degenerate = "DEGENERATE",
  Viewport = "VIEWPORT",
  Insufficient = "INSUFFICIENT",
  Io = "IO",
  Job = "JOB",
}

export type MessageStream = "stdout" | "stderr";

export class PlotError extends Error {
  readonly exitCode = 1;

  constructor(
    public readonly category: ErrorCategory,
    message: string,
    public readonly stream: MessageStream = "stdout",
  ) {
    super(message);
    this.name = `PlotError/${category}`;
  }
}

export class UsageError extends PlotError {
  constructor(message: string, stream: MessageStream = "stderr") {
    super(ErrorCategory.Usage, message, stream);
  }
}

export class FormatError extends PlotError {
  constructor(message: string) {
    super(ErrorCategory.Format, message);
  }
}

export class StepRangeError extends PlotError {
  constructor(message: string) {
    super(ErrorCategory.Range, message);
  }
}

export class DegenerateDataError extends PlotError {
  constructor(message = "Quantity differences too fine to depict with this utility.") {
    super(ErrorCategory.Degenerate, message);
  }
}

export class ViewportError extends PlotError {
  constructor(message = "Viewport is too small!!!") {
    super(ErrorCategory.Viewport, message);
  }
}

export class InsufficientDataError extends PlotError {
  constructor(message = "Insufficient data: no steps found to plot") {
    super(ErrorCategory.Insufficient, message);
  }
}

export class IoError extends PlotError {
  constructor(message: string) {
    super(ErrorCategory.Io, message, "stderr");
  }
}

export class JobError extends PlotError {
  constructor(message: string) {
    super(ErrorCategory.Job, message, "stderr");
  }
}
