import { AppErrorCode } from './AppErrorCodes';

/**
 * Error raised by the keychain when a passcode or biometric key cannot be read or written.
 */
export class KeychainError extends Error {
  public readonly code: AppErrorCode;

  /**
   * Creates a new instance of the KeychainError class.
   * @param message - The error message.
   * @param code - The error code reported to the user.
   */
  public constructor(message: string, code: AppErrorCode = AppErrorCode.KEYCHAIN_READ_FAILED) {
    super(message);
    this.name = 'KeychainError';
    this.code = code;
    Object.setPrototypeOf(this, KeychainError.prototype);
  }
}
