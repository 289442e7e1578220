import { AppErrorCode } from './AppErrorCodes';

/**
 * Error stored on a file reference when its file cannot be resolved or inspected.
 */
export class FileAccessError extends Error {
  public readonly code: AppErrorCode;

  /**
   * Creates a new instance of the FileAccessError class.
   * @param message - The error message.
   * @param code - The error code reported to the user.
   */
  public constructor(message: string, code: AppErrorCode = AppErrorCode.FILE_NOT_FOUND) {
    super(message);
    this.name = 'FileAccessError';
    this.code = code;
    Object.setPrototypeOf(this, FileAccessError.prototype);
  }
}
