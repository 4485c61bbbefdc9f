import { z } from "zod";
import { ProtocolError } from "./errors.js";
import type { RequestEnvelope, ResponseEnvelope } from "./protocol.js";

const ActionRequestSchema = z.object({
  id: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
});

const RequestEnvelopeSchema = z.object({
  action: z.string({
    required_error: "action is required",
    invalid_type_error: "action must be a string",
  }),
  config: z.record(z.unknown()).optional(),
  action_request: ActionRequestSchema.optional(),
});

const ErrorInfoSchema = z.object({
  kind: z.enum([
    "ProtocolError",
    "ValidationError",
    "CapabilityMissing",
    "UnsupportedAction",
    "InvalidState",
    "TimeoutError",
    "ProcessExitedError",
    "InternalError",
  ]),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});

const ResponseEnvelopeSchema = z
  .object({
    success: z.boolean(),
    data: z.unknown().optional(),
    error: ErrorInfoSchema.nullable().optional(),
  })
  .refine((env) => env.success || env.error != null, {
    message: "a failed response must carry an error",
  });

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ProtocolError(`Invalid JSON: ${msg}`, { line: line.slice(0, 100) });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// --- Plugin side ---

export function decodeRequest(line: string): RequestEnvelope {
  const raw = parseLine(line);
  const parsed = RequestEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError(`Malformed request: ${describeIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

/**
 * Serialize a response as a single line. Values JSON cannot carry (cycles,
 * BigInt) turn the whole line into an InternalError response.
 */
export function encodeResponse(response: ResponseEnvelope): string {
  const envelope = {
    success: response.success,
    data: response.data ?? null,
    error: response.error ?? null,
  };
  try {
    return JSON.stringify(envelope);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return JSON.stringify({
      success: false,
      data: null,
      error: { kind: "InternalError", message: `Response could not be encoded: ${msg}` },
    });
  }
}

// --- Host side ---

export function encodeRequest(request: RequestEnvelope): string {
  return JSON.stringify(request);
}

export function decodeResponse(line: string): ResponseEnvelope {
  const raw = parseLine(line);
  const parsed = ResponseEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError(`Malformed response: ${describeIssues(parsed.error)}`);
  }
  return {
    success: parsed.data.success,
    data: parsed.data.data ?? null,
    error: parsed.data.error ?? null,
  };
}
