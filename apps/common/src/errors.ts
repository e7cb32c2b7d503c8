export type AppErrorCode =
  | "config"
  | "unknown-site"
  | "queue-unavailable"
  | "busy"
  | "validation";

export class AppError extends Error {
  readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super("config", message);
  }
}

export class UnknownSiteError extends AppError {
  readonly siteId: string;

  constructor(siteId: string) {
    super("unknown-site", `unknown site: ${siteId}`);
    this.siteId = siteId;
  }
}

export class QueueUnavailableError extends AppError {
  readonly filePath: string;
  readonly missing: boolean;

  constructor(filePath: string, missing: boolean, cause?: unknown) {
    super("queue-unavailable", `topic queue unavailable: ${filePath}`, { cause });
    this.filePath = filePath;
    this.missing = missing;
  }
}

export class BusyError extends AppError {
  constructor() {
    super("busy", "a generation run is already in progress");
  }
}

export class ValidationFailure extends AppError {
  constructor(message: string) {
    super("validation", message);
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

const SOCKET_FIELDS = ["code", "syscall", "address", "port"] as const;

function socketDetails(value: Record<string, unknown>): string {
  return SOCKET_FIELDS.flatMap((field) => {
    const item = value[field];
    return typeof item === "string" || typeof item === "number" ? [`${field}=${item}`] : [];
  }).join(", ");
}

function stringify(value: object): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function normalizeError(error: unknown): string {
  if (error === undefined || error === null) {
    return "unknown error";
  }
  if (typeof error === "string") {
    return error;
  }
  if (error instanceof AggregateError && error.errors.length > 0) {
    return error.errors.map((item) => normalizeError(item)).join("; ");
  }
  if (error instanceof Error) {
    const message = error.message.trim() || error.name;
    const details = isObject(error) ? socketDetails(error) : "";
    const text = details ? `${message} (${details})` : message;
    return error.cause === undefined || error.cause === null
      ? text
      : `${text}: ${normalizeError(error.cause)}`;
  }
  if (isObject(error)) {
    return stringify(error);
  }
  return String(error);
}

const CERTIFICATE_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_UNTRUSTED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
]);

export function isCertificateError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && isObject(current); depth += 1) {
    const code = current.code;
    if (typeof code === "string" && CERTIFICATE_ERROR_CODES.has(code)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}
