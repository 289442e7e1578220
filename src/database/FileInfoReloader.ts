import type { FileInfoProvider } from '@/database/FileKeeper';
import type { FileReference } from '@/models/FileReference';
import { AppErrorCode } from '@/utils/types/errors/AppErrorCodes';
import { FileAccessError } from '@/utils/types/errors/FileAccessError';

/**
 * Refreshes the cached file info of many references in parallel.
 */
export class FileInfoReloader {
  /**
   * Creates a new instance of FileInfoReloader.
   * @param provider - Reads the current attributes of a file.
   */
  public constructor(private readonly provider: FileInfoProvider) {}

  /**
   * Reload the info of every reference.
   *
   * `update` is called once per reference, as soon as that reference is refreshed.
   * A failed refresh is stored on the reference as its error, and `update` is still called.
   * The returned promise resolves once all references are done.
   */
  public async getInfo(refs: readonly FileReference[], update: (ref: FileReference) => void): Promise<void> {
    await Promise.all(refs.map(ref => this.refresh(ref, update)));
  }

  /**
   * Refresh a single reference.
   */
  private async refresh(ref: FileReference, update: (ref: FileReference) => void): Promise<void> {
    ref.isRefreshingInfo = true;
    try {
      ref.info = await this.provider.refreshInfo(ref);
      ref.error = undefined;
    } catch (error) {
      ref.error = error instanceof Error
        ? error
        : new FileAccessError(String(error), AppErrorCode.FILE_INFO_UNAVAILABLE);
    } finally {
      ref.isRefreshingInfo = false;
    }
    update(ref);
  }
}
