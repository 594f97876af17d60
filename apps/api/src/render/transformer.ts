import type { JobV1 } from "@rendercache/shared";

export interface TransformRequest {
  job: JobV1;
  input_path: string;
  output_path: string;
}

/**
 * Turns a job's input into its output file. The worker never calls
 * `transform` concurrently with itself; implementations may rely on that.
 * A resolved promise means `output_path` has been fully written.
 */
export interface Transformer {
  readonly name: string;
  transform(req: TransformRequest): Promise<void>;
}

export class TransformError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransformError";
  }
}
