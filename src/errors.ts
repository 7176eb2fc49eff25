/**
 * Ledger error codes
 *
 * Every failed operation aborts with a LedgerError. The surrounding
 * transaction is rolled back, so no partial write survives a throw.
 */

export type ErrorCategory =
  | 'InvalidInput'
  | 'Conflict'
  | 'Unauthorized'
  | 'NotFound'
  | 'InsufficientFunds';

const CATEGORY_BY_CODE = {
  InvalidUsername: 'InvalidInput',
  EmptyContent: 'InvalidInput',
  ContentTooLong: 'InvalidInput',
  EmptyComment: 'InvalidInput',
  EmptyMessage: 'InvalidInput',
  BelowMinimumTip: 'InvalidInput',
  InvalidAmount: 'InvalidInput',
  InvalidAddress: 'InvalidInput',
  ArithmeticOverflow: 'InvalidInput',

  UsernameTaken: 'Conflict',
  ProfileExists: 'Conflict',
  AlreadyLiked: 'Conflict',
  AlreadyRetweeted: 'Conflict',
  AlreadyRead: 'Conflict',

  NotOwner: 'Unauthorized',
  NotParticipant: 'Unauthorized',
  CannotActOnOwnPost: 'Unauthorized',
  SelfTip: 'Unauthorized',
  SelfChat: 'Unauthorized',
  MismatchedPost: 'Unauthorized',
  BalanceOwnerMismatch: 'Unauthorized',

  NotFound: 'NotFound',
  IndexOutOfRange: 'NotFound',

  ZeroBalance: 'InsufficientFunds',
  InsufficientBalance: 'InsufficientFunds',
  InsufficientFunds: 'InsufficientFunds'
} as const satisfies Record<string, ErrorCategory>;

export type LedgerErrorCode = keyof typeof CATEGORY_BY_CODE;

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly category: ErrorCategory;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

/**
 * HTTP status for each error category
 */
export function statusForCategory(category: ErrorCategory): number {
  switch (category) {
    case 'InvalidInput':
      return 400;
    case 'InsufficientFunds':
      return 402;
    case 'Unauthorized':
      return 403;
    case 'NotFound':
      return 404;
    case 'Conflict':
      return 409;
  }
}
