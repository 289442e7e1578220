import type { FileInfo, FileReference, FileType } from '@/models/FileReference';

/**
 * Registry of the files known to the app.
 */
export interface FileKeeper {
  /**
   * Whether this process can read the main app's sandbox.
   * The AutoFill extension cannot, so it depends on references shared with it.
   */
  readonly canAccessAppSandbox: boolean;

  /**
   * All known references of the given type, in registration order.
   */
  getAllReferences(fileType: FileType, includeBackup: boolean): FileReference[];
}

/**
 * Resolves a reference and reads the current attributes of its file.
 */
export interface FileInfoProvider {
  refreshInfo(ref: FileReference): Promise<FileInfo>;
}
