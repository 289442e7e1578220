/**
 * Application error codes for the AutoFill extension and the database picker.
 *
 * When displayed to users, show: "Error occurred (Code: E-XXX)".
 * The code lets users report the failure while the message stays translatable.
 *
 * Code ranges:
 * - E-0xx: Generic errors
 * - E-1xx: Keychain and passcode errors
 * - E-2xx: Database file errors
 * - E-3xx: AutoFill flow errors
 */
export enum AppErrorCode {
  // Generic errors (E-0xx)
  UNKNOWN_ERROR = 'E-001',

  // Keychain and passcode errors (E-1xx)
  KEYCHAIN_READ_FAILED = 'E-101',
  KEYCHAIN_WRITE_FAILED = 'E-102',
  PASSCODE_NOT_SET = 'E-103',
  PASSCODE_INVALID = 'E-104',
  BIOMETRIC_AUTH_FAILED = 'E-105',

  // Database file errors (E-2xx)
  FILE_NOT_FOUND = 'E-201',
  FILE_INFO_UNAVAILABLE = 'E-202',
  ROW_OUT_OF_RANGE = 'E-203',

  // AutoFill flow errors (E-3xx)
  APP_LOCK_NOT_SHOWN = 'E-301',
  INVALID_PICKER_MODE = 'E-302',
  CREDENTIAL_REQUEST_FAILED = 'E-303',
}

/**
 * All valid error code values for quick lookup
 */
const ERROR_CODE_VALUES = new Set<string>(Object.values(AppErrorCode));

/**
 * Check if a string is a valid error code (E-XXX format)
 */
export function isErrorCode(code: string): code is AppErrorCode {
  return ERROR_CODE_VALUES.has(code);
}

/**
 * Extract error code from a string (e.g., "Error occurred (Code: E-101)" -> "E-101")
 */
export function extractErrorCode(message: string): AppErrorCode | null {
  const match = message.match(/E-\d{3}/);
  if (match && isErrorCode(match[0])) {
    return match[0];
  }
  return null;
}

/**
 * Format an error message with an error code for user display.
 *
 * @param message - The user-friendly error message (translated)
 * @param code - The error code for debugging
 * @returns Formatted message like "Error occurred (Code: E-101)"
 */
export function formatErrorWithCode(message: string, code: AppErrorCode): string {
  return `${message} (Code: ${code})`;
}

/**
 * Map error codes to translation keys for localized error messages.
 */
export function getErrorTranslationKey(code: AppErrorCode): string {
  switch (code) {
    case AppErrorCode.KEYCHAIN_READ_FAILED:
    case AppErrorCode.KEYCHAIN_WRITE_FAILED:
      return 'errors.keychainUnavailable';
    case AppErrorCode.PASSCODE_NOT_SET:
      return 'errors.passcodeNotSet';
    case AppErrorCode.PASSCODE_INVALID:
      return 'errors.passcodeInvalid';
    case AppErrorCode.FILE_NOT_FOUND:
      return 'errors.fileNotFound';
    default:
      return 'errors.unknownErrorTryAgain';
  }
}

/**
 * Get the error code embedded in an error, if any.
 *
 * @param err - The error (can be Error, string, or unknown)
 */
export function getErrorCode(err: unknown): AppErrorCode | null {
  if (err instanceof Error) {
    if ('code' in err && typeof err.code === 'string' && isErrorCode(err.code)) {
      return err.code;
    }
    return extractErrorCode(err.message);
  }
  if (typeof err === 'string') {
    return extractErrorCode(err);
  }
  return null;
}

/**
 * Get the error message from an error, falling back when the error carries none.
 *
 * @param err - The error (can be Error, string, or unknown)
 * @param fallback - Fallback message if error has no message
 */
export function getErrorMessage(err: unknown, fallback: string): string {
  if (err instanceof Error && err.message) {
    return err.message;
  }
  if (typeof err === 'string' && err) {
    return err;
  }
  return fallback;
}
