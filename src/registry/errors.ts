// src/registry/errors.ts — Registry failure taxonomy
//
// Every rejected call surfaces one named condition. The category and HTTP
// status are derived from the code so callers never have to keep them in sync.

// ---------------------------------------------------------------------------
// Codes
// ---------------------------------------------------------------------------

export type RegistryErrorCode =
  // access control
  | "NotController"
  | "CallerNotOwnerNorApproved"
  // admission control
  | "SupplyCapExceeded"
  | "PaymentTooLow"
  | "CooldownActive"
  // input validation
  | "MintToZero"
  | "TransferToZero"
  | "ApproveToCaller"
  | "InvalidToken"
  | "LayerIndexOutOfRange"
  | "RoyaltyBpsTooHigh"
  | "ZeroAddress"
  | "TransferToNonReceiver"
  // ownership consistency
  | "TransferFromWrongOwner"
  // concurrency
  | "Reentrancy"

export type RegistryErrorCategory =
  | "access_control"
  | "admission_control"
  | "input_validation"
  | "ownership_consistency"
  | "concurrency"

const CATEGORY: Record<RegistryErrorCode, RegistryErrorCategory> = {
  NotController: "access_control",
  CallerNotOwnerNorApproved: "access_control",
  SupplyCapExceeded: "admission_control",
  PaymentTooLow: "admission_control",
  CooldownActive: "admission_control",
  MintToZero: "input_validation",
  TransferToZero: "input_validation",
  ApproveToCaller: "input_validation",
  InvalidToken: "input_validation",
  LayerIndexOutOfRange: "input_validation",
  RoyaltyBpsTooHigh: "input_validation",
  ZeroAddress: "input_validation",
  TransferToNonReceiver: "input_validation",
  TransferFromWrongOwner: "ownership_consistency",
  Reentrancy: "concurrency",
}

export type RegistryHttpStatus = 400 | 402 | 403 | 404 | 409 | 429

const HTTP_STATUS: Partial<Record<RegistryErrorCode, RegistryHttpStatus>> = {
  NotController: 403,
  CallerNotOwnerNorApproved: 403,
  InvalidToken: 404,
  PaymentTooLow: 402,
  CooldownActive: 429,
  SupplyCapExceeded: 409,
  TransferFromWrongOwner: 409,
  Reentrancy: 409,
}

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class RegistryError extends Error {
  public readonly category: RegistryErrorCategory
  public readonly httpStatus: RegistryHttpStatus

  constructor(
    public readonly code: RegistryErrorCode,
    message: string = code,
  ) {
    super(message)
    this.name = "RegistryError"
    this.category = CATEGORY[code]
    this.httpStatus = HTTP_STATUS[code] ?? 400
  }
}

export function isRegistryError(e: unknown, code?: RegistryErrorCode): e is RegistryError {
  return e instanceof RegistryError && (code === undefined || e.code === code)
}
