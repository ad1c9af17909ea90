import type { Response } from "undici";
import { z } from "zod";

import type { ScopedLogger } from "./logger.js";

export type BintrayErrorKind =
  | "api"
  | "call-get-first"
  | "content-not-available"
  | "content-checksum-not-returned"
  | "content-checksum-required"
  | "only-for-indexed-packages"
  | "rpm-repo-checksum-unsupported"
  | "invalid-response";

export interface BintrayErrorOptions {
  status?: number;
  cause?: unknown;
}

export class BintrayError extends Error {
  readonly kind: BintrayErrorKind;
  readonly status?: number;

  constructor(kind: BintrayErrorKind, message: string, options: BintrayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BintrayError";
    this.kind = kind;
    this.status = options.status;
  }
}

export function isBintrayError(error: unknown, kind?: BintrayErrorKind): error is BintrayError {
  return error instanceof BintrayError && (kind === undefined || error.kind === kind);
}

const errorBodySchema = z.object({ message: z.string() });
const warningBodySchema = z.object({ warn: z.string().min(1) });

export function defaultStatusMessage(status: number): string {
  switch (status) {
    case 401:
      return "Missing or refused authentication";
    case 403:
      return "Requires admin privileges";
    case 404:
      return "Not found";
    default:
      return "Unrecognized error";
  }
}

export function prettifyJson(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}

function extractMessage(text: string): string | undefined {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.message : undefined;
  } catch {
    return undefined;
  }
}

export interface ReadApiErrorOptions {
  log: ScopedLogger;
  /** Statuses the caller tolerates; they are logged at `info` instead of `error`. */
  expected?: number[];
}

/**
 * Turns a failed response into a `BintrayError` of kind `api`, using
 * Bintray's `message` field when the body carries one.
 */
export async function readApiError(
  response: Response,
  operation: string,
  target: string,
  options: ReadApiErrorOptions
): Promise<BintrayError> {
  const body = await response.text();
  const message = extractMessage(body) ?? defaultStatusMessage(response.status);
  const statusLine = `${response.status} ${response.statusText}`.trim();
  const summary = `${operation}(${target}): ${message} (${statusLine})`;

  const detail = body ? `${summary}\n${prettifyJson(body)}` : summary;
  if (options.expected?.includes(response.status)) {
    options.log.info(detail);
  } else {
    options.log.error(detail);
  }
  return new BintrayError("api", summary, { status: response.status });
}

export function unexpectedStatus(status: number): BintrayError {
  return new BintrayError("api", `Unexpected status from Bintray: ${status}`, { status });
}

/** Returns Bintray's `warn` field from a success payload, logging it. */
export function reportWarning(payload: unknown, context: string, log: ScopedLogger): string | undefined {
  const parsed = warningBodySchema.safeParse(payload);
  if (!parsed.success) return undefined;
  log.warn(`${context}: ${parsed.data.warn}`);
  return parsed.data.warn;
}

/** Reads a JSON body and validates it against `schema`. */
export async function parseBody<T extends z.ZodTypeAny>(
  response: Response,
  schema: T,
  context: string,
  log: ScopedLogger
): Promise<z.output<T>> {
  const text = await response.text();
  let payload: unknown = null;
  if (text) {
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new BintrayError("invalid-response", `${context}: response is not JSON`, {
        status: response.status,
        cause: error,
      });
    }
  }
  log.trace(`${context}: ${text}`);

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue: z.ZodIssue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new BintrayError("invalid-response", `${context}: unexpected response (${issues})`, {
      status: response.status,
    });
  }
  reportWarning(payload, context, log);
  return parsed.data;
}
