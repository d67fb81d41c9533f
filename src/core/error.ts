/**
 * TallyscriptErrorCode defines an exported type contract.
 */
export type TallyscriptErrorCode = "INPUT_INVALID_UTF8" | "OPTIONS_INVALID_SHARDS";

/**
 * TallyscriptError provides an exported class contract.
 */
export class TallyscriptError extends Error {
  readonly code: TallyscriptErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: TallyscriptErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "TallyscriptError";
    this.code = code;
    if (details) this.details = details;
  }
}
