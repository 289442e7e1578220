/**
 * Kind of file a reference points to.
 */
export type FileType = 'database' | 'keyFile';

/**
 * Where a referenced file lives.
 * - internalDocuments: the app's own documents folder
 * - internalBackup: automatic backup copies kept by the app
 * - internalInbox: files received from other apps, not yet moved
 * - external: a file in another app's storage or a file provider
 * - remote: a file on a network share or cloud service
 */
export type FileLocation =
  | 'internalDocuments'
  | 'internalBackup'
  | 'internalInbox'
  | 'external'
  | 'remote';

/**
 * Cached attributes of a referenced file.
 */
export interface FileInfo {
  fileName: string;
  fileSize?: number;
  creationDate?: Date;
  modificationDate?: Date;
}

/**
 * Options for creating a file reference.
 */
export interface FileReferenceOptions {
  url: string;
  location: FileLocation;
  visibleFileName?: string;
  info?: FileInfo;
  error?: Error;
}

/**
 * A persistent reference to a database or key file.
 * The file itself is not opened here; only its identity and cached info are kept.
 */
export class FileReference {
  public readonly url: string;
  public readonly location: FileLocation;
  public readonly visibleFileName: string;
  public info?: FileInfo;
  public error?: Error;
  public isRefreshingInfo = false;

  /**
   * Creates a new file reference.
   */
  public constructor(options: FileReferenceOptions) {
    this.url = options.url;
    this.location = options.location;
    this.visibleFileName = options.visibleFileName ?? getFileNameFromUrl(options.url);
    this.info = options.info;
    this.error = options.error;
  }

  public get id(): string {
    return this.url;
  }

  public get hasError(): boolean {
    return this.error !== undefined;
  }

  public get isBackup(): boolean {
    return this.location === 'internalBackup';
  }
}

/**
 * Extract the last path component of a URL, decoded.
 */
export function getFileNameFromUrl(url: string): string {
  const path = url.split(/[?#]/)[0];
  const lastSlash = path.lastIndexOf('/');
  const name = lastSlash >= 0 ? path.slice(lastSlash + 1) : path;
  try {
    return decodeURIComponent(name);
  } catch {
    return name;
  }
}

/**
 * Find the instance of `ref` in `refs`.
 *
 * References are matched by URL. When `fallbackToNamesake` is set and no URL matches,
 * a reference with the same visible file name is returned instead.
 */
export function findReference(
  ref: FileReference,
  refs: readonly FileReference[],
  fallbackToNamesake: boolean,
): FileReference | undefined {
  const exactMatch = refs.find(candidate => candidate.url === ref.url);
  if (exactMatch || !fallbackToNamesake) {
    return exactMatch;
  }
  return refs.find(candidate => candidate.visibleFileName === ref.visibleFileName);
}
