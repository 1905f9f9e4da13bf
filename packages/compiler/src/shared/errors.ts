/* =============================================================================
 * CONTRACT ERRORS
 * =============================================================================
 * Thrown for programmer errors at API boundaries (bad identities, use after
 * dispose, invalid options). Everything recoverable is a diagnostic instead.
 */

/** Error codes */
export const ContractErrorCode = {
  INVALID_IDENTITY: "STRATA_INVALID_IDENTITY",
  UNNORMALIZED_IDENTITY: "STRATA_UNNORMALIZED_IDENTITY",
  OUTSIDE_ROOT: "STRATA_OUTSIDE_ROOT",
  DISPOSED: "STRATA_DISPOSED",
  INVALID_OPTIONS: "STRATA_INVALID_OPTIONS",
} as const;

export type ContractErrorCodeType = (typeof ContractErrorCode)[keyof typeof ContractErrorCode];

/**
 * Error raised when a caller breaks an API contract.
 */
export class ContractError extends Error {
  constructor(
    message: string,
    public readonly code: ContractErrorCodeType,
    public readonly identity?: string,
  ) {
    super(message);
    this.name = "ContractError";
  }
}

export function isContractError(error: unknown, code?: ContractErrorCodeType): error is ContractError {
  return error instanceof ContractError && (code === undefined || error.code === code);
}
