/* ── error taxonomy ──────────────────────────────────────── */

export type ValidationCode =
  | "AlreadyRegistered"
  | "Unregistered"
  | "UnregisteredSender"
  | "UnregisteredRecipient"
  | "AlreadyQueued"
  | "NotInQueue"
  | "InvalidWeight"
  | "QueueEmpty"
  | "InvalidCommand"
  | "InvalidAmount";
export type BalanceCode = "InsufficientBalance";
export type AuthorizationCode = "NotAuthorized" | "NotOwner" | "NotStakeOwner";
export type ArithmeticCode = "Overflow" | "Underflow" | "DivisionByZero";

export type RegistryErrorCode =
  | ValidationCode
  | BalanceCode
  | AuthorizationCode
  | ArithmeticCode;

export type ErrorCategory =
  | "validation"
  | "balance"
  | "authorization"
  | "arithmetic";

export abstract class RegistryError<
  C extends RegistryErrorCode = RegistryErrorCode,
> extends Error {
  abstract readonly category: ErrorCategory;

  constructor(
    readonly code: C,
    message: string,
    readonly details: Readonly<Record<string, string>> = {},
  ) {
    super(message);
  }

  toJSON() {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ValidationError extends RegistryError<ValidationCode> {
  readonly category = "validation";
  override name = "ValidationError";
}

export class BalanceError extends RegistryError<BalanceCode> {
  readonly category = "balance";
  override name = "BalanceError";
}

export class AuthorizationError extends RegistryError<AuthorizationCode> {
  readonly category = "authorization";
  override name = "AuthorizationError";
}

export class ArithmeticError extends RegistryError<ArithmeticCode> {
  readonly category = "arithmetic";
  override name = "ArithmeticError";
}

/* ── factories ───────────────────────────────────────────── */

export const alreadyRegistered = (account: string) =>
  new ValidationError("AlreadyRegistered", `account ${account} is already registered`, { account });

export const unregistered = (account: string) =>
  new ValidationError("Unregistered", `account ${account} is not registered`, { account });

export const unregisteredSender = (account: string) =>
  new ValidationError("UnregisteredSender", `sender ${account} is not registered`, { account });

export const unregisteredRecipient = (account: string) =>
  new ValidationError("UnregisteredRecipient", `recipient ${account} is not registered`, { account });

export const alreadyQueued = (externalId: string) =>
  new ValidationError("AlreadyQueued", `stake ${externalId} is already queued`, { externalId });

export const notInQueue = (externalId: string) =>
  new ValidationError("NotInQueue", `stake ${externalId} is not in the queue`, { externalId });

export const invalidWeight = (weight: bigint) =>
  new ValidationError("InvalidWeight", `weight ${weight} is outside the pricing domain (must be > 1)`, {
    weight: weight.toString(),
  });

export const queueEmpty = () =>
  new ValidationError("QueueEmpty", "queue is empty");

export const invalidCommand = (reason: string) =>
  new ValidationError("InvalidCommand", `invalid command: ${reason}`, { reason });

export const invalidAmount = (field: string, value: bigint) =>
  new ValidationError("InvalidAmount", `${field} ${value} is outside [0, 2^256 - 1]`, {
    field,
    value: value.toString(),
  });

export const insufficientBalance = (
  account: string,
  required: bigint,
  available: bigint,
) =>
  new BalanceError(
    "InsufficientBalance",
    `account ${account} needs ${required} but holds ${available}`,
    { account, required: required.toString(), available: available.toString() },
  );

export const notAuthorized = (caller: string) =>
  new AuthorizationError("NotAuthorized", `${caller} is not the controller`, { caller });

export const notOwner = (caller: string) =>
  new AuthorizationError("NotOwner", `${caller} is not the registry owner`, { caller });

export const notStakeOwner = (caller: string, externalId: string) =>
  new AuthorizationError("NotStakeOwner", `${caller} does not own stake ${externalId}`, {
    caller,
    externalId,
  });

export const overflow = (op: string) =>
  new ArithmeticError("Overflow", `${op} overflows uint256`, { op });

export const underflow = (op: string, a: bigint, b: bigint) =>
  new ArithmeticError("Underflow", `${op} underflows: ${a} - ${b}`, {
    op,
    a: a.toString(),
    b: b.toString(),
  });

export const divisionByZero = (op: string) =>
  new ArithmeticError("DivisionByZero", `${op} divides by zero`, { op });
