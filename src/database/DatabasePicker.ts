import { SettingsNotifications, type SettingsObserver } from '@/events/SettingsEventEmitter';
import { t } from '@/i18n';
import { findReference, type FileReference } from '@/models/FileReference';
import type { FileInfoReloader } from '@/database/FileInfoReloader';
import type { FileKeeper } from '@/database/FileKeeper';
import type {
  ContextualAction,
  DatabasePickerDelegate,
  DatabasePickerEvent,
  DatabasePickerListener,
  DatabasePickerMode,
  DatabasePickerRow,
  DatabasePickerRowKind,
  ListSettingsMenu,
  PopoverAnchor,
  SheetAction,
} from '@/database/types';
import { getDestructiveFileAction } from '@/utils/DestructiveFileAction';
import { FILES_SORT_ORDERS, getFilesSortOrderTitle, sortFileReferences, type FilesSortOrder } from '@/utils/FileSortOrder';
import { DEFAULT_PLATFORM, type PlatformInfo } from '@/utils/Platform';
import type { ReviewSuggester } from '@/utils/ReviewSuggester';
import { SettingsKey, type Settings } from '@/utils/Settings';
import { AppErrorCode, formatErrorWithCode } from '@/utils/types/errors/AppErrorCodes';

/**
 * Delay between the last file info update and the final re-sort, so row animations can finish.
 */
const SORTING_ANIMATION_DURATION_MS = 300;

export interface DatabasePickerOptions {
  mode: DatabasePickerMode;
  settings: Settings;
  fileKeeper: FileKeeper;
  fileInfoReloader: FileInfoReloader;
  delegate?: DatabasePickerDelegate;
  platform?: PlatformInfo;
  reviewSuggester?: ReviewSuggester;
  sortingAnimationDuration?: number;
}

/**
 * View model of the database list.
 *
 * Owns the list of database references, their order and the selection,
 * decides which rows and actions exist, and reports user decisions to the delegate.
 * Rendering is left to whoever subscribes to its events.
 */
export class DatabasePicker implements SettingsObserver {
  public delegate?: DatabasePickerDelegate;
  public readonly mode: DatabasePickerMode;

  private readonly settings: Settings;
  private readonly fileKeeper: FileKeeper;
  private readonly fileInfoReloader: FileInfoReloader;
  private readonly platform: PlatformInfo;
  private readonly reviewSuggester?: ReviewSuggester;
  private readonly sortingAnimationDuration: number;
  private readonly settingsNotifications: SettingsNotifications;
  private readonly listeners: Set<DatabasePickerListener> = new Set();

  private _isEnabled = true;
  private _databaseRefs: FileReference[] = [];
  private _selectedRef: FileReference | null = null;
  private _hasCancelButton = false;

  /**
   * Creates a new database picker.
   */
  public constructor(options: DatabasePickerOptions) {
    this.mode = options.mode;
    this.settings = options.settings;
    this.fileKeeper = options.fileKeeper;
    this.fileInfoReloader = options.fileInfoReloader;
    this.delegate = options.delegate;
    this.platform = options.platform ?? DEFAULT_PLATFORM;
    this.reviewSuggester = options.reviewSuggester;
    this.sortingAnimationDuration = options.sortingAnimationDuration ?? SORTING_ANIMATION_DURATION_MS;
    this.settingsNotifications = new SettingsNotifications(this.settings.notifications, this);
  }

  public get databaseRefs(): readonly FileReference[] {
    return this._databaseRefs;
  }

  public get selectedRef(): FileReference | null {
    return this._selectedRef;
  }

  public get hasCancelButton(): boolean {
    return this._hasCancelButton;
  }

  /**
   * Pull-to-refresh makes no sense with a pointer, so Mac gets none.
   */
  public get isPullToRefreshEnabled(): boolean {
    return !this.platform.isRunningOnMac;
  }

  public get isEnabled(): boolean {
    return this._isEnabled;
  }

  /**
   * Enables or disables all interaction with the list and its bar buttons.
   */
  public set isEnabled(enabled: boolean) {
    this._isEnabled = enabled;
    this.emit({ type: 'enabled', isEnabled: enabled });
  }

  /**
   * Subscribe to view changes.
   * Returns an unsubscribe function.
   */
  public subscribe(listener: DatabasePickerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Prepare the screen once.
   *
   * @param navigationDepth - Number of screens on the navigation stack, including this one.
   */
  public load(navigationDepth: number): void {
    switch (this.mode) {
      case 'autoFill':
        this._hasCancelButton = true;
        break;
      case 'full':
        this._hasCancelButton = false;
        break;
      case 'light':
        this._hasCancelButton = navigationDepth <= 1;
        break;
    }
  }

  public willAppear(): void {
    this.refreshInBackground();
  }

  public didAppear(): void {
    this.emit({ type: 'toolbar', isHidden: this.mode !== 'full' });
    this.settingsNotifications.startObserving();
    this.refreshInBackground();
  }

  public willDisappear(): void {
    this.settingsNotifications.stopObserving();
    this._selectedRef = null;
  }

  /**
   * Pull-to-refresh was triggered. While the user still drags, wait for `didEndDragging`.
   */
  public didPullToRefresh(isDragging: boolean): void {
    if (!isDragging) {
      this.emit({ type: 'endRefreshing' });
      this.refreshInBackground();
    }
  }

  public didEndDragging(isRefreshing: boolean): void {
    if (isRefreshing) {
      this.emit({ type: 'endRefreshing' });
      this.refreshInBackground();
    }
  }

  /**
   * Reload the references, apply the default selection and refresh file info.
   * Resolves after the final re-sort.
   */
  public async refresh(): Promise<void> {
    const includeBackup = this.mode === 'light' ? false : this.settings.isBackupFilesVisible;
    this._databaseRefs = this.fileKeeper.getAllReferences('database', includeBackup);
    this.sortFileList();

    const defaultDatabase = this.delegate?.getDefaultDatabase(this._databaseRefs);
    if (defaultDatabase) {
      this.selectDatabase(defaultDatabase, false);
      this.delegate?.didSelectDatabase(defaultDatabase);
    }

    await this.fileInfoReloader.getInfo(this._databaseRefs, () => {
      this.sortFileList();
    });
    await delay(this.sortingAnimationDuration);
    this.sortFileList();
  }

  /**
   * Sort the list by the current order and restore the kept selection.
   */
  public sortFileList(): void {
    sortFileReferences(this._databaseRefs, this.settings.filesSortOrder);
    this.emit({ type: 'reload' });
    if (this._selectedRef && (this.delegate?.shouldKeepSelection() ?? false)) {
      this.selectDatabase(this._selectedRef, false);
    }
  }

  /**
   * Select the row of the given reference, or clear the selection.
   */
  public selectDatabase(ref: FileReference | null, animated: boolean): void {
    this._selectedRef = ref;
    const row = ref ? this.getRow(ref) : null;
    this.emit({ type: 'select', row, animated });
  }

  /**
   * Get the menu behind the sort-order button.
   */
  public getListSettingsMenu(): ListSettingsMenu {
    const currentOrder = this.settings.filesSortOrder;
    return {
      title: t('databasePicker.sortBy'),
      sortOptions: FILES_SORT_ORDERS.map(order => ({
        order,
        title: getFilesSortOrderTitle(order),
        isSelected: order === currentOrder,
        select: (): void => this.setFilesSortOrder(order),
      })),
      backup: {
        title: t('databasePicker.backupSettings'),
        showBackupFiles: {
          title: t('databasePicker.showBackupFiles'),
          isOn: this.settings.isBackupFilesVisible,
          toggle: (): void => this.toggleBackupFilesVisible(),
        },
      },
    };
  }

  public setFilesSortOrder(order: FilesSortOrder): void {
    this.settings.filesSortOrder = order;
    this.refreshInBackground();
  }

  public toggleBackupFilesVisible(): void {
    this.settings.isBackupFilesVisible = !this.settings.isBackupFilesVisible;
    this.refreshInBackground();
  }

  public didPressSettings(anchor: PopoverAnchor): void {
    this.delegate?.didPressSettings?.(anchor);
  }

  public didPressHelp(anchor: PopoverAnchor): void {
    this.delegate?.didPressHelp?.(anchor);
  }

  public didPressCancel(): void {
    this.delegate?.didPressCancel();
  }

  public didPressAddDatabase(anchor: PopoverAnchor): void {
    this.delegate?.didPressAddDatabaseOptions(anchor);
  }

  /**
   * Get the entries of the "add database" action sheet.
   * Creating databases is only offered in the main app.
   */
  public getAddDatabaseOptions(anchor: PopoverAnchor): SheetAction[] {
    const options: SheetAction[] = [{
      title: t('actions.openDatabase'),
      style: 'default',
      handler: (): void => this.delegate?.didPressAddExistingDatabase(anchor),
    }];

    if (this.platform.isMainApp) {
      if (this.mode === 'autoFill') {
        throw new Error(formatErrorWithCode('AutoFill mode used in the main app', AppErrorCode.INVALID_PICKER_MODE));
      }
      options.push({
        title: t('actions.createDatabase'),
        style: 'default',
        handler: (): void => this.delegate?.didPressCreateDatabase?.(anchor),
      });
    }

    options.push({ title: t('actions.cancel'), style: 'cancel' });
    return options;
  }

  public didPressRevealInFinder(row: number): void {
    if (!this.platform.isRunningOnMac) {
      throw new Error('Reveal in Finder is only available on Mac');
    }
    this.delegate?.didPressRevealDatabaseInFinder(this.getFileRef(row));
  }

  public didPressExportDatabase(row: number): void {
    this.delegate?.didPressExportDatabase(this.getFileRef(row), { kind: 'row', row });
  }

  /**
   * Delete or remove a database. Files that already fail to open are eliminated without confirmation.
   */
  public didPressEliminateDatabase(row: number): void {
    this.reviewSuggester?.registerEvent('trouble');
    const ref = this.getFileRef(row);
    this.delegate?.didPressEliminateDatabase(ref, !ref.hasError, { kind: 'row', row });
  }

  /**
   * The app lock reminder only shows while remembered keys are not protected by an app lock.
   */
  public shouldShowAppLockSetup(): boolean {
    if (this.settings.isHideAppLockSetupReminder) {
      return false;
    }
    return this.settings.isRememberDatabaseKey && !this.settings.isAppLockEnabled;
  }

  public numberOfRows(): number {
    // either files or "there is nothing"
    const contentRowCount = Math.max(this._databaseRefs.length, 1);
    return this.shouldShowAppLockSetup() ? contentRowCount + 1 : contentRowCount;
  }

  public getRowKind(row: number): DatabasePickerRowKind {
    if (!Number.isInteger(row) || row < 0 || row >= this.numberOfRows()) {
      throw new RangeError(formatErrorWithCode(`Row ${row} is out of range`, AppErrorCode.ROW_OUT_OF_RANGE));
    }
    if (row < this._databaseRefs.length) {
      return 'fileItem';
    }
    if (this.shouldShowAppLockSetup() && row === this.numberOfRows() - 1) {
      return 'appLockSetup';
    }
    return 'noFiles';
  }

  /**
   * Get the models of all rows, in display order.
   */
  public getRows(): DatabasePickerRow[] {
    const rows: DatabasePickerRow[] = [];
    for (let row = 0; row < this.numberOfRows(); row++) {
      const kind = this.getRowKind(row);
      if (kind === 'fileItem') {
        const ref = this._databaseRefs[row];
        rows.push({ kind, ref, isAnimating: ref.isRefreshingInfo });
      } else {
        rows.push({ kind });
      }
    }
    return rows;
  }

  public didSelectRow(row: number): void {
    const shouldKeepSelection = this.delegate?.shouldKeepSelection() ?? true;
    try {
      if (this.getRowKind(row) === 'fileItem') {
        const selectedDatabaseRef = this._databaseRefs[row];
        this._selectedRef = selectedDatabaseRef;
        this.delegate?.didSelectDatabase(selectedDatabaseRef);
      }
    } finally {
      if (!shouldKeepSelection) {
        this.emit({ type: 'select', row: null, animated: true });
        this._selectedRef = null;
      }
    }
  }

  public didTapAccessory(row: number): void {
    if (this.getRowKind(row) !== 'fileItem') {
      console.warn('[DATABASE_PICKER] Accessory button tapped for an unexpected item');
      throw new Error(`Row ${row} has no accessory button`);
    }
    this.delegate?.didPressDatabaseProperties(this._databaseRefs[row], { kind: 'row', row });
  }

  /**
   * Get the swipe and context-menu actions of a row. Only file rows have any.
   */
  public getContextActions(row: number): ContextualAction[] {
    if (this.getRowKind(row) !== 'fileItem') {
      return [];
    }

    const actions: ContextualAction[] = [];
    const ref = this._databaseRefs[row];
    if (this.platform.isRunningOnMac) {
      actions.push({
        title: t('actions.revealInFinder'),
        style: 'default',
        handler: () => this.didPressRevealInFinder(row),
      });
    } else {
      actions.push({
        title: t('actions.export'),
        icon: 'squareAndArrowUp',
        style: 'default',
        handler: () => this.didPressExportDatabase(row),
      });
    }

    actions.push({
      title: getDestructiveFileAction(ref.location).title,
      icon: 'trash',
      style: 'destructive',
      handler: () => this.didPressEliminateDatabase(row),
    });
    return actions;
  }

  public settingsDidChange(key: SettingsKey): void {
    switch (key) {
      case SettingsKey.FILES_SORT_ORDER:
      case SettingsKey.BACKUP_FILES_VISIBLE:
        this.refreshInBackground();
        break;
      case SettingsKey.APP_LOCK_ENABLED:
      case SettingsKey.REMEMBER_DATABASE_KEY:
        this.emit({ type: 'reload' });
        break;
      default:
        break;
    }
  }

  /**
   * The user dismissed the app lock reminder for good.
   */
  public didPressCloseAppLockSetup(): void {
    this.settings.isHideAppLockSetupReminder = true;
    this.emit({ type: 'reload' });
  }

  public didPressEnableAppLock(): void {
    this.delegate?.didPressSetupAppLock();
  }

  /**
   * Get the row of the list's own instance of the reference.
   */
  private getRow(ref: FileReference): number | null {
    const originalInstance = findReference(ref, this._databaseRefs, false);
    if (!originalInstance) {
      return null;
    }
    return this._databaseRefs.indexOf(originalInstance);
  }

  private getFileRef(row: number): FileReference {
    if (this.getRowKind(row) !== 'fileItem') {
      throw new RangeError(formatErrorWithCode(`Row ${row} is not a file`, AppErrorCode.ROW_OUT_OF_RANGE));
    }
    return this._databaseRefs[row];
  }

  private refreshInBackground(): void {
    this.refresh().catch((error: unknown) => {
      console.error('[DATABASE_PICKER] Failed to refresh the database list:', error);
    });
  }

  private emit(event: DatabasePickerEvent): void {
    this.listeners.forEach(listener => {
      try {
        listener(event);
      } catch (error) {
        console.error('[DATABASE_PICKER] Error in view listener:', error);
      }
    });
  }
}

/**
 * Wait for the given number of milliseconds.
 */
function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
