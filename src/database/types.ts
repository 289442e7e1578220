import type { FileReference } from '@/models/FileReference';
import type { FilesSortOrder } from '@/utils/FileSortOrder';

/**
 * How the database picker is used.
 * - full: the main app's file list, with toolbar
 * - light: a picker pushed or presented over another screen
 * - autoFill: the first screen of the AutoFill extension
 */
export type DatabasePickerMode = 'light' | 'full' | 'autoFill';

/**
 * Identifies the control a popover or action sheet should point at.
 */
export type PopoverAnchor =
  | { kind: 'barButton'; button: 'addDatabase' | 'settings' | 'help' | 'cancel' }
  | { kind: 'row'; row: number };

export type DatabasePickerRowKind = 'fileItem' | 'noFiles' | 'appLockSetup';

export type DatabasePickerRow =
  | { kind: 'fileItem'; ref: FileReference; isAnimating: boolean }
  | { kind: 'noFiles' }
  | { kind: 'appLockSetup' };

/**
 * A swipe or context-menu action on a file row.
 */
export interface ContextualAction {
  title: string;
  icon?: 'squareAndArrowUp' | 'trash';
  style: 'default' | 'destructive';
  handler: () => void;
}

/**
 * An entry of an action sheet.
 */
export interface SheetAction {
  title: string;
  style: 'default' | 'cancel';
  handler?: () => void;
}

export interface SortMenuOption {
  order: FilesSortOrder;
  title: string;
  isSelected: boolean;
  select: () => void;
}

/**
 * Content of the list settings menu behind the sort-order button.
 */
export interface ListSettingsMenu {
  title: string;
  sortOptions: SortMenuOption[];
  backup: {
    title: string;
    showBackupFiles: {
      title: string;
      isOn: boolean;
      toggle: () => void;
    };
  };
}

/**
 * Changes the view adapter has to render.
 */
export type DatabasePickerEvent =
  | { type: 'reload' }
  | { type: 'select'; row: number | null; animated: boolean }
  | { type: 'enabled'; isEnabled: boolean }
  | { type: 'toolbar'; isHidden: boolean }
  | { type: 'endRefreshing' };

export type DatabasePickerListener = (event: DatabasePickerEvent) => void;

/**
 * Receives the user's decisions made in the database picker.
 * Methods marked optional only exist in the main app.
 */
export interface DatabasePickerDelegate {
  didPressSetupAppLock(): void;
  didPressHelp?(anchor: PopoverAnchor): void;
  didPressSettings?(anchor: PopoverAnchor): void;
  didPressCancel(): void;

  didPressAddDatabaseOptions(anchor: PopoverAnchor): void;
  didPressAddExistingDatabase(anchor: PopoverAnchor): void;
  didPressCreateDatabase?(anchor: PopoverAnchor): void;

  didPressRevealDatabaseInFinder(ref: FileReference): void;
  didPressExportDatabase(ref: FileReference, anchor: PopoverAnchor): void;
  didPressEliminateDatabase(ref: FileReference, shouldConfirm: boolean, anchor: PopoverAnchor): void;
  didPressDatabaseProperties(ref: FileReference, anchor: PopoverAnchor): void;

  shouldKeepSelection(): boolean;
  getDefaultDatabase(refs: readonly FileReference[]): FileReference | undefined;
  didSelectDatabase(ref: FileReference): void;
}
