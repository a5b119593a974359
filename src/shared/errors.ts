export enum PamErrorCode {
  VALIDATION_FAILED = "VALIDATION_FAILED",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  SERVICE_NOT_FOUND = "SERVICE_NOT_FOUND",
  DIRECTORY_NOT_FOUND = "DIRECTORY_NOT_FOUND",
  SNAPSHOT_NOT_FOUND = "SNAPSHOT_NOT_FOUND",
  NO_MATCH = "NO_MATCH",
  BACKUP_FAILED = "BACKUP_FAILED",
  WRITE_FAILED = "WRITE_FAILED",
}

export class PamError extends Error {
  readonly code: PamErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: PamErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "PamError";
    this.code = code;
    this.context = context;
  }
}

/** Process exit status per error code. Anything not listed exits 1. */
export const EXIT_CODES: Record<PamErrorCode, number> = {
  [PamErrorCode.VALIDATION_FAILED]: 2,
  [PamErrorCode.SERVICE_NOT_FOUND]: 3,
  [PamErrorCode.DIRECTORY_NOT_FOUND]: 3,
  [PamErrorCode.SNAPSHOT_NOT_FOUND]: 3,
  [PamErrorCode.PERMISSION_DENIED]: 4,
  [PamErrorCode.NO_MATCH]: 5,
  [PamErrorCode.BACKUP_FAILED]: 1,
  [PamErrorCode.WRITE_FAILED]: 1,
};

export function exitCodeFor(err: unknown): number {
  return err instanceof PamError ? EXIT_CODES[err.code] : 1;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
