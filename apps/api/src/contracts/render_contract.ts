export const REASON_CODE_TO_HTTP = {
  invalid_input: 400,
  invalid_content_type: 415,
  payload_too_large: 413,
  input_unwritable: 500,
  unknown_job: 404,
  invalid_job_id: 400,
  invalid_output_name: 400,
  output_not_found: 404,
  internal_error: 500,
} as const;

export type ContractReasonCode = keyof typeof REASON_CODE_TO_HTTP;

export type ContractErrorPayload = {
  error: true;
  reason_code: ContractReasonCode;
  reason: string;
  details: Record<string, unknown>;
};

export class ContractViolationError extends Error {
  reason_code: ContractReasonCode;
  details: Record<string, unknown>;

  constructor(reason_code: ContractReasonCode, reason?: string, details?: Record<string, unknown>) {
    super(reason ?? reason_code);
    this.name = "ContractViolationError";
    this.reason_code = reason_code;
    this.details = details ?? {};
  }
}

export function httpStatusForReasonCode(reason_code: ContractReasonCode): number {
  return REASON_CODE_TO_HTTP[reason_code];
}

export function buildContractError(
  reason_code: ContractReasonCode,
  details?: Record<string, unknown>,
  reason?: string,
): ContractErrorPayload {
  return {
    error: true,
    reason_code,
    reason: reason ?? reason_code,
    details: details ?? {},
  };
}

export function errorPayloadFromUnknown(
  err: unknown,
  fallbackCode: ContractReasonCode,
): ContractErrorPayload {
  if (err instanceof ContractViolationError) {
    return buildContractError(err.reason_code, err.details, err.message);
  }
  const reason = err instanceof Error ? err.message : String(err);
  return buildContractError(fallbackCode, {}, reason);
}

const OUTPUT_NAME_RE = /^output-[0-9a-f]{64}\.png$/;

export function assertOutputName(value: unknown): asserts value is string {
  if (typeof value !== "string" || !OUTPUT_NAME_RE.test(value)) {
    throw new ContractViolationError("invalid_output_name", "output name is malformed", {
      field: "name",
    });
  }
}

export function assertUploadBody(body: unknown): asserts body is Buffer {
  if (body === undefined || body === null) {
    throw new ContractViolationError("invalid_input", "uploaded content is empty");
  }
  if (!Buffer.isBuffer(body)) {
    throw new ContractViolationError("invalid_content_type", "body must be sent as application/octet-stream");
  }
  if (body.length === 0) {
    throw new ContractViolationError("invalid_input", "uploaded content is empty");
  }
}
