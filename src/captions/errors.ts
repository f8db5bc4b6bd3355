import { QcReport, VerbatimResult } from "../types/models";

export class CaptionEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Segment or word timestamps that are negative, inverted, non-finite or out of order. */
export class MalformedTimingError extends CaptionEngineError {
  constructor(
    message: string,
    readonly segmentIndex?: number,
  ) {
    super(message);
  }
}

export class InvalidCaptionInputError extends CaptionEngineError {}

export class VerbatimMismatchError extends CaptionEngineError {
  constructor(
    readonly result: VerbatimResult,
    readonly report: QcReport,
  ) {
    const index = result.firstMismatchIndex ?? 0;
    const expected = result.sample?.expected ?? "<end>";
    const actual = result.sample?.actual ?? "<end>";
    super(`Caption text diverges from script at token ${index}: expected "${expected}", got "${actual}"`);
  }
}

export class LayoutExceedsSafeAreaError extends CaptionEngineError {
  constructor(readonly report: QcReport) {
    const { bbox, safeRect } = report.safeArea;
    super(
      `Caption block ${bbox.width}x${bbox.height} exceeds safe area ${Math.round(safeRect.width)}x${Math.round(safeRect.height)}`,
    );
  }
}
