import { SettingsEventEmitter } from '@/events/SettingsEventEmitter';
import { isFilesSortOrder, type FilesSortOrder } from '@/utils/FileSortOrder';
import { MemoryStorage, type KeyValueStorage } from '@/utils/MemoryStorage';

/**
 * Keys of the settings that emit change notifications.
 */
export enum SettingsKey {
  FILES_SORT_ORDER = 'filesSortOrder',
  BACKUP_FILES_VISIBLE = 'backupFilesVisible',
  HIDE_APP_LOCK_SETUP_REMINDER = 'hideAppLockSetupReminder',
  REMEMBER_DATABASE_KEY = 'rememberDatabaseKey',
  APP_LOCK_ENABLED = 'appLockEnabled',
  AUTOFILL_FINISHED_OK = 'autoFillFinishedOK',
  COPY_TOTP_ON_AUTOFILL = 'copyTOTPOnAutoFill',
  CLIPBOARD_TIMEOUT = 'clipboardTimeout',
  BIOMETRIC_APP_LOCK_ENABLED = 'biometricAppLockEnabled',
  LOCK_DATABASES_ON_TIMEOUT = 'lockDatabasesOnTimeout',
  LOCK_ALL_DATABASES_ON_FAILED_PASSCODE = 'lockAllDatabasesOnFailedPasscode',
  APP_LOCK_TIMEOUT = 'appLockTimeout',
  DATABASE_LOCK_TIMEOUT = 'databaseLockTimeout',
  STARTUP_DATABASE = 'startupDatabase',
  BIOMETRIC_PROMPT_LAST_SEEN_TIME = 'biometricPromptLastSeenTime',
}

/**
 * Timeout value meaning "never".
 */
export const TIMEOUT_NEVER = -1;

/**
 * Timeout value meaning "immediately".
 */
export const TIMEOUT_IMMEDIATELY = 0;

const DEFAULT_CLIPBOARD_TIMEOUT_SECONDS = 60;
const DEFAULT_APP_LOCK_TIMEOUT_SECONDS = 60;

/**
 * Build the storage key for a setting.
 */
function storageKey(key: SettingsKey): string {
  return `local:vault_autofill_${key}`;
}

/**
 * App-wide preferences shared by the main app and the AutoFill extension.
 * Typed accessors with defaults over a synchronous storage.
 * Every change is announced on `notifications`.
 */
export class Settings {
  public readonly notifications: SettingsEventEmitter;

  /**
   * Creates a new settings instance.
   * @param storage - Backing storage; defaults to memory.
   * @param notifications - Emitter for change notifications.
   */
  public constructor(
    private readonly storage: KeyValueStorage = new MemoryStorage(),
    notifications: SettingsEventEmitter = new SettingsEventEmitter(),
  ) {
    this.notifications = notifications;
  }

  public get filesSortOrder(): FilesSortOrder {
    const value = this.storage.getItem(storageKey(SettingsKey.FILES_SORT_ORDER));
    return isFilesSortOrder(value) ? value : 'noSorting';
  }

  public set filesSortOrder(order: FilesSortOrder) {
    this.update(SettingsKey.FILES_SORT_ORDER, order);
  }

  public get isBackupFilesVisible(): boolean {
    return this.readBoolean(SettingsKey.BACKUP_FILES_VISIBLE, true);
  }

  public set isBackupFilesVisible(visible: boolean) {
    this.update(SettingsKey.BACKUP_FILES_VISIBLE, visible);
  }

  public get isHideAppLockSetupReminder(): boolean {
    return this.readBoolean(SettingsKey.HIDE_APP_LOCK_SETUP_REMINDER, false);
  }

  public set isHideAppLockSetupReminder(hide: boolean) {
    this.update(SettingsKey.HIDE_APP_LOCK_SETUP_REMINDER, hide);
  }

  public get isRememberDatabaseKey(): boolean {
    return this.readBoolean(SettingsKey.REMEMBER_DATABASE_KEY, true);
  }

  public set isRememberDatabaseKey(remember: boolean) {
    this.update(SettingsKey.REMEMBER_DATABASE_KEY, remember);
  }

  public get isAppLockEnabled(): boolean {
    return this.readBoolean(SettingsKey.APP_LOCK_ENABLED, false);
  }

  public set isAppLockEnabled(enabled: boolean) {
    this.update(SettingsKey.APP_LOCK_ENABLED, enabled);
  }

  /**
   * False while an AutoFill session is unlocking a database.
   * Finding it false at the next launch means the extension crashed mid-unlock.
   */
  public get isAutoFillFinishedOK(): boolean {
    return this.readBoolean(SettingsKey.AUTOFILL_FINISHED_OK, true);
  }

  public set isAutoFillFinishedOK(finishedOK: boolean) {
    this.update(SettingsKey.AUTOFILL_FINISHED_OK, finishedOK);
  }

  public get isCopyTOTPOnAutoFill(): boolean {
    return this.readBoolean(SettingsKey.COPY_TOTP_ON_AUTOFILL, true);
  }

  public set isCopyTOTPOnAutoFill(copy: boolean) {
    this.update(SettingsKey.COPY_TOTP_ON_AUTOFILL, copy);
  }

  /**
   * Seconds before copied values are cleared from the clipboard; TIMEOUT_NEVER keeps them.
   */
  public get clipboardTimeout(): number {
    return this.readNumber(SettingsKey.CLIPBOARD_TIMEOUT, DEFAULT_CLIPBOARD_TIMEOUT_SECONDS);
  }

  public set clipboardTimeout(seconds: number) {
    this.update(SettingsKey.CLIPBOARD_TIMEOUT, seconds);
  }

  public get isBiometricAppLockEnabled(): boolean {
    return this.readBoolean(SettingsKey.BIOMETRIC_APP_LOCK_ENABLED, true);
  }

  public set isBiometricAppLockEnabled(enabled: boolean) {
    this.update(SettingsKey.BIOMETRIC_APP_LOCK_ENABLED, enabled);
  }

  /**
   * When the database timeout fires: lock the database (true) or just close it (false).
   */
  public get isLockDatabasesOnTimeout(): boolean {
    return this.readBoolean(SettingsKey.LOCK_DATABASES_ON_TIMEOUT, false);
  }

  public set isLockDatabasesOnTimeout(lock: boolean) {
    this.update(SettingsKey.LOCK_DATABASES_ON_TIMEOUT, lock);
  }

  public get isLockAllDatabasesOnFailedPasscode(): boolean {
    return this.readBoolean(SettingsKey.LOCK_ALL_DATABASES_ON_FAILED_PASSCODE, true);
  }

  public set isLockAllDatabasesOnFailedPasscode(lock: boolean) {
    this.update(SettingsKey.LOCK_ALL_DATABASES_ON_FAILED_PASSCODE, lock);
  }

  /**
   * Idle seconds before the app lock is shown.
   */
  public get appLockTimeout(): number {
    return this.readNumber(SettingsKey.APP_LOCK_TIMEOUT, DEFAULT_APP_LOCK_TIMEOUT_SECONDS);
  }

  public set appLockTimeout(seconds: number) {
    this.update(SettingsKey.APP_LOCK_TIMEOUT, seconds);
  }

  /**
   * Idle seconds before an open database is closed.
   */
  public get databaseLockTimeout(): number {
    return this.readNumber(SettingsKey.DATABASE_LOCK_TIMEOUT, TIMEOUT_NEVER);
  }

  public set databaseLockTimeout(seconds: number) {
    this.update(SettingsKey.DATABASE_LOCK_TIMEOUT, seconds);
  }

  /**
   * URL of the database to open automatically, if any.
   */
  public get startupDatabase(): string | null {
    const value = this.storage.getItem(storageKey(SettingsKey.STARTUP_DATABASE));
    return typeof value === 'string' ? value : null;
  }

  public set startupDatabase(url: string | null) {
    this.update(SettingsKey.STARTUP_DATABASE, url);
  }

  /**
   * Epoch milliseconds of the last biometric prompt, if one was ever shown.
   */
  public get biometricPromptLastSeenTime(): number | null {
    const value = this.storage.getItem(storageKey(SettingsKey.BIOMETRIC_PROMPT_LAST_SEEN_TIME));
    return typeof value === 'number' ? value : null;
  }

  public set biometricPromptLastSeenTime(time: number | null) {
    this.update(SettingsKey.BIOMETRIC_PROMPT_LAST_SEEN_TIME, time);
  }

  /**
   * Read a boolean setting.
   */
  private readBoolean(key: SettingsKey, fallback: boolean): boolean {
    const value = this.storage.getItem(storageKey(key));
    return typeof value === 'boolean' ? value : fallback;
  }

  /**
   * Read a numeric setting.
   */
  private readNumber(key: SettingsKey, fallback: number): number {
    const value = this.storage.getItem(storageKey(key));
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
  }

  /**
   * Store a value and notify observers if it changed.
   */
  private update(key: SettingsKey, value: string | number | boolean | null): void {
    const previous = this.storage.getItem(storageKey(key));
    if (value === null) {
      this.storage.removeItem(storageKey(key));
    } else {
      this.storage.setItem(storageKey(key), value);
    }
    if (previous !== value) {
      this.notifications.emit(key);
    }
  }
}
