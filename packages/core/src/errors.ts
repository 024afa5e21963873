/**
 * packages/core/src/errors.ts — Error codes, UiError and layout results.
 *
 * Validation helpers return `LayoutResult<T>` so callers can report a
 * structured fatal; public entry points convert a fatal into a thrown
 * `UiError` carrying the same code.
 */

/**
 * Deterministic error codes for runtime violations.
 *
 *   - UI_INVALID_PROPS: widget configuration rejected at construction time
 *   - UI_INVALID_STATE: render tree or scroll object used out of order
 *   - UI_INVALID_CONSTRAINTS: malformed box constraints handed to layout
 */
export type UiErrorCode = "UI_INVALID_PROPS" | "UI_INVALID_STATE" | "UI_INVALID_CONSTRAINTS";

export class UiError extends Error {
  override readonly name = "UiError";
  readonly code: UiErrorCode;

  constructor(code: UiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UiError);
    }
  }
}

export type UiFatal = Readonly<{ code: UiErrorCode; detail: string }>;

export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: UiFatal }>;

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function fail(code: UiErrorCode, detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code, detail } };
}

/** Return the value of a successful result or throw the fatal as a UiError. */
export function unwrapResult<T>(res: LayoutResult<T>): T {
  if (res.ok) return res.value;
  throw new UiError(res.fatal.code, res.fatal.detail);
}
