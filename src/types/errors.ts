export const SALVO_ERROR_CODES = [
  "INVALID_INPUT",
  "CONFIG_INVALID",
  "NO_WINDOWS",
  "NO_STAGED_WINDOWS",
  "LOCK_HELD",
  "BACKEND_FAILED",
  "INTERNAL_ERROR"
] as const;

export type SalvoErrorCode = (typeof SALVO_ERROR_CODES)[number];

export interface SalvoError {
  code: SalvoErrorCode;
  message: string;
  retriable: boolean;
  details?: Record<string, unknown>;
}

const ERROR_CODE_SET: ReadonlySet<string> = new Set(SALVO_ERROR_CODES);

export const createSalvoError = (
  code: SalvoErrorCode,
  message: string,
  retriable: boolean = false,
  details?: Record<string, unknown>
): SalvoError => {
  return {
    code,
    message,
    retriable,
    ...(details === undefined ? {} : { details })
  };
};

export const isSalvoErrorCode = (value: unknown): value is SalvoErrorCode => {
  return typeof value === "string" && ERROR_CODE_SET.has(value);
};

export const isSalvoError = (value: unknown): value is SalvoError => {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  const candidate = value as { code?: unknown; message?: unknown; retriable?: unknown };
  return isSalvoErrorCode(candidate.code) && typeof candidate.message === "string" && typeof candidate.retriable === "boolean";
};
