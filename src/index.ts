export { AutoFillCoordinator, type AutoFillCoordinatorOptions } from '@/autofill/AutoFillCoordinator';
export type * from '@/autofill/types';

export { BaseCoordinator, type Coordinator, type CoordinatorDismissHandler } from '@/coordinators/Coordinator';
export {
  DatabasePickerCoordinator,
  type DatabasePickerCoordinatorDelegate,
  type DatabasePickerCoordinatorOptions,
  type FileActions,
  type FileImporter,
} from '@/coordinators/DatabasePickerCoordinator';
export type {
  CrashReportDelegate,
  FirstSetupDelegate,
  NavigationRouter,
  Screen,
} from '@/coordinators/NavigationRouter';

export { DatabasePicker, type DatabasePickerOptions } from '@/database/DatabasePicker';
export { FileInfoReloader } from '@/database/FileInfoReloader';
export type { FileInfoProvider, FileKeeper } from '@/database/FileKeeper';
export type * from '@/database/types';

export { SettingsEventEmitter, SettingsNotifications, type SettingsObserver } from '@/events/SettingsEventEmitter';
export { default as i18n, initI18n, isSupportedLanguage, t, type SupportedLanguage } from '@/i18n';

export {
  FileReference,
  findReference,
  getFileNameFromUrl,
  type FileInfo,
  type FileLocation,
  type FileReferenceOptions,
  type FileType,
} from '@/models/FileReference';

export { getDestructiveFileAction, type DestructiveFileAction, type DestructiveFileActionKind } from '@/utils/DestructiveFileAction';
export {
  FILES_SORT_ORDERS,
  compareFileReferences,
  getFilesSortOrderTitle,
  isFilesSortOrder,
  sortFileReferences,
  type FilesSortOrder,
} from '@/utils/FileSortOrder';
export { MemoryStorage, type KeyValueStorage } from '@/utils/MemoryStorage';
export {
  PasscodeKeychain,
  type BiometricAuthenticator,
  type Keychain,
  type PasscodeHashOptions,
} from '@/utils/PasscodeKeychain';
export { DEFAULT_PLATFORM, type PlatformInfo } from '@/utils/Platform';
export type { ReviewEvent, ReviewSuggester } from '@/utils/ReviewSuggester';
export { Settings, SettingsKey, TIMEOUT_IMMEDIATELY, TIMEOUT_NEVER } from '@/utils/Settings';
export { Watchdog, type WatchdogDelegate } from '@/utils/Watchdog';
export * from '@/utils/types/errors/AppErrorCodes';
export { FileAccessError } from '@/utils/types/errors/FileAccessError';
export { KeychainError } from '@/utils/types/errors/KeychainError';
