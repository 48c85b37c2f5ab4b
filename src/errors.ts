// Donation Sorter - Error taxonomy
// Only StartupFailure is fatal. Everything else is caught at the flow boundary
// that produced it, logged, and surfaced in the pipeline snapshot.

export type PipelineErrorKind =
  | "startup"
  | "capture_miss"
  | "stream_ended"
  | "encode"
  | "classification"
  | "ambiguous"
  | "actuation";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly recoverable: boolean;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.kind = kind;
    this.recoverable = kind !== "startup" && kind !== "stream_ended";
  }
}

/** Camera, arm or credentials unavailable at boot. The process exits. */
export class StartupFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("startup", message, options);
    this.name = "StartupFailure";
  }
}

/** A single bad frame read. The tick is skipped. */
export class CaptureMiss extends PipelineError {
  constructor(message: string) {
    super("capture_miss", message);
    this.name = "CaptureMiss";
  }
}

/** The camera stream is gone and could not be restarted. Capture stops for good. */
export class StreamEnded extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("stream_ended", message, options);
    this.name = "StreamEnded";
  }
}

export class EncodeFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("encode", message, options);
    this.name = "EncodeFailure";
  }
}

/** Transport or response error from the classifier. No record is written. */
export class ClassificationFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("classification", message, options);
    this.name = "ClassificationFailure";
  }
}

/** Classifier text outside the known category set. Resolved by the fallback policy. */
export class AmbiguousClassification extends PipelineError {
  readonly response: string;

  constructor(response: string) {
    super("ambiguous", `Unrecognized category response: "${response}"`);
    this.name = "AmbiguousClassification";
    this.response = response;
  }
}

/** Arm error mid-sort. The donation record already written stands. */
export class ActuationFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("actuation", message, options);
    this.name = "ActuationFailure";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
