import { BaseCoordinator } from '@/coordinators/Coordinator';
import type { NavigationRouter, Screen } from '@/coordinators/NavigationRouter';
import { DatabasePicker } from '@/database/DatabasePicker';
import type { FileInfoReloader } from '@/database/FileInfoReloader';
import type { FileKeeper } from '@/database/FileKeeper';
import type { DatabasePickerDelegate, DatabasePickerMode, PopoverAnchor } from '@/database/types';
import { findReference, type FileReference } from '@/models/FileReference';
import { DEFAULT_PLATFORM, type PlatformInfo } from '@/utils/Platform';
import type { ReviewSuggester } from '@/utils/ReviewSuggester';
import type { Settings } from '@/utils/Settings';

/**
 * Lets the user pick a database file from outside the app's file list.
 */
export interface FileImporter {
  /**
   * Resolves with the added reference, or null when the user cancelled.
   */
  pickExistingDatabase(): Promise<FileReference | null>;
}

/**
 * Side effects of the file actions offered by the picker.
 */
export interface FileActions {
  exportDatabase(ref: FileReference, anchor: PopoverAnchor): void;
  revealInFinder(ref: FileReference): void;
  showProperties(ref: FileReference, anchor: PopoverAnchor): void;
  confirmElimination(ref: FileReference, anchor: PopoverAnchor): Promise<boolean>;
  eliminateDatabase(ref: FileReference): Promise<void>;
  setupAppLock(): void;
  createDatabase?(anchor: PopoverAnchor): void;
  showHelp?(anchor: PopoverAnchor): void;
  showSettings?(anchor: PopoverAnchor): void;
}

export interface DatabasePickerCoordinatorDelegate {
  shouldAcceptDatabaseSelection(ref: FileReference, coordinator: DatabasePickerCoordinator): boolean;
  didSelectDatabase(ref: FileReference | undefined, coordinator: DatabasePickerCoordinator): void;
  shouldKeepSelection(coordinator: DatabasePickerCoordinator): boolean;
}

export interface DatabasePickerCoordinatorOptions {
  router: NavigationRouter;
  mode: DatabasePickerMode;
  settings: Settings;
  fileKeeper: FileKeeper;
  fileInfoReloader: FileInfoReloader;
  fileImporter: FileImporter;
  fileActions: FileActions;
  platform?: PlatformInfo;
  reviewSuggester?: ReviewSuggester;
  sortingAnimationDuration?: number;
}

/**
 * Flow around the database list: default selection, adding and removing databases.
 */
export class DatabasePickerCoordinator extends BaseCoordinator implements DatabasePickerDelegate {
  public delegate?: DatabasePickerCoordinatorDelegate;

  /**
   * When set, the next refresh selects the startup database. Consumed by that refresh.
   */
  public shouldSelectDefaultDatabase = false;

  public readonly picker: DatabasePicker;

  private readonly router: NavigationRouter;
  private readonly settings: Settings;
  private readonly fileImporter: FileImporter;
  private readonly fileActions: FileActions;
  private readonly platform: PlatformInfo;
  private readonly screen: Screen;

  /**
   * Creates a new database picker coordinator.
   */
  public constructor(options: DatabasePickerCoordinatorOptions) {
    super();
    this.router = options.router;
    this.settings = options.settings;
    this.fileImporter = options.fileImporter;
    this.fileActions = options.fileActions;
    this.platform = options.platform ?? DEFAULT_PLATFORM;
    this.picker = new DatabasePicker({
      mode: options.mode,
      settings: options.settings,
      fileKeeper: options.fileKeeper,
      fileInfoReloader: options.fileInfoReloader,
      platform: this.platform,
      reviewSuggester: options.reviewSuggester,
      sortingAnimationDuration: options.sortingAnimationDuration,
      delegate: this,
    });
    this.screen = { kind: 'databasePicker', picker: this.picker };
  }

  public start(): void {
    this.router.push(this.screen);
  }

  /**
   * Let the user add a database from elsewhere, then select it.
   */
  public async addExistingDatabase(): Promise<void> {
    try {
      const addedRef = await this.fileImporter.pickExistingDatabase();
      if (!addedRef) {
        return;
      }
      await this.picker.refresh();
      const listedRef = findReference(addedRef, this.picker.databaseRefs, true) ?? addedRef;
      this.picker.selectDatabase(listedRef, true);
      this.didSelectDatabase(listedRef);
    } catch (error) {
      console.error('[DATABASE_PICKER] Failed to add database:', error);
    }
  }

  public getDefaultDatabase(refs: readonly FileReference[]): FileReference | undefined {
    if (!this.shouldSelectDefaultDatabase) {
      return undefined;
    }
    this.shouldSelectDefaultDatabase = false;

    const startupDatabaseUrl = this.settings.startupDatabase;
    if (!startupDatabaseUrl) {
      return undefined;
    }
    return refs.find(ref => ref.url === startupDatabaseUrl);
  }

  public didSelectDatabase(ref: FileReference): void {
    if (!(this.delegate?.shouldAcceptDatabaseSelection(ref, this) ?? true)) {
      return;
    }
    if (this.picker.mode === 'full') {
      this.settings.startupDatabase = ref.url;
    }
    this.delegate?.didSelectDatabase(ref, this);
  }

  public shouldKeepSelection(): boolean {
    return this.delegate?.shouldKeepSelection(this) ?? true;
  }

  public didPressCancel(): void {
    this.router.dismiss(this.screen);
    this.dismissHandler?.(this);
  }

  /**
   * Extensions cannot create databases, so they skip the options sheet.
   */
  public didPressAddDatabaseOptions(anchor: PopoverAnchor): void {
    if (this.picker.mode === 'autoFill' || !this.platform.isMainApp) {
      void this.addExistingDatabase();
      return;
    }
    this.router.present({
      kind: 'addDatabaseOptions',
      options: this.picker.getAddDatabaseOptions(anchor),
      anchor,
    });
  }

  public didPressAddExistingDatabase(): void {
    void this.addExistingDatabase();
  }

  public didPressCreateDatabase(anchor: PopoverAnchor): void {
    this.fileActions.createDatabase?.(anchor);
  }

  public didPressSetupAppLock(): void {
    this.fileActions.setupAppLock();
  }

  public didPressHelp(anchor: PopoverAnchor): void {
    this.fileActions.showHelp?.(anchor);
  }

  public didPressSettings(anchor: PopoverAnchor): void {
    this.fileActions.showSettings?.(anchor);
  }

  public didPressRevealDatabaseInFinder(ref: FileReference): void {
    this.fileActions.revealInFinder(ref);
  }

  public didPressExportDatabase(ref: FileReference, anchor: PopoverAnchor): void {
    this.fileActions.exportDatabase(ref, anchor);
  }

  public didPressDatabaseProperties(ref: FileReference, anchor: PopoverAnchor): void {
    this.fileActions.showProperties(ref, anchor);
  }

  public didPressEliminateDatabase(ref: FileReference, shouldConfirm: boolean, anchor: PopoverAnchor): void {
    void this.eliminateDatabase(ref, shouldConfirm, anchor);
  }

  /**
   * Delete or remove a database, after confirmation where needed.
   */
  public async eliminateDatabase(ref: FileReference, shouldConfirm: boolean, anchor: PopoverAnchor): Promise<void> {
    try {
      if (shouldConfirm && !(await this.fileActions.confirmElimination(ref, anchor))) {
        return;
      }
      await this.fileActions.eliminateDatabase(ref);
      if (this.settings.startupDatabase === ref.url) {
        this.settings.startupDatabase = null;
      }
      await this.picker.refresh();
    } catch (error) {
      console.error('[DATABASE_PICKER] Failed to eliminate database:', error);
    }
  }
}
