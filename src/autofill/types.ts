import type { Coordinator } from '@/coordinators/Coordinator';
import type { DatabasePickerCoordinator } from '@/coordinators/DatabasePickerCoordinator';
import type { NavigationRouter } from '@/coordinators/NavigationRouter';
import type { DatabasePickerMode } from '@/database/types';
import type { FileReference } from '@/models/FileReference';

/**
 * An entry of an unlocked database, with placeholders and references already resolved.
 */
export interface AutoFillEntry {
  readonly title: string;
  readonly resolvedUserName: string;
  readonly resolvedPassword: string;
}

/**
 * The credential handed back to the requesting app.
 */
export interface PasswordCredential {
  user: string;
  password: string;
}

/**
 * A domain or URL the requesting app asked credentials for.
 */
export interface CredentialServiceIdentifier {
  identifier: string;
  type: 'domain' | 'URL';
}

/**
 * An unlocked database, as returned by the unlocker. Opaque to this package.
 */
export interface DatabaseFile {
  readonly fileName: string;
}

export interface DatabaseLoadingWarnings {
  readonly messages: readonly string[];
}

export type PasscodeInputMode = 'setup' | 'change' | 'verification';

export interface PasscodeInputConfig {
  mode: PasscodeInputMode;
  isCancelAllowed: boolean;
  isBiometricsAllowed: boolean;
  shouldActivateKeyboard: boolean;
}

/**
 * Receives the input of the passcode screen.
 */
export interface PasscodeInputDelegate {
  passcodeInputDidCancel(sender: PasscodeInputView): void;
  passcodeInputDidEnterPasscode(sender: PasscodeInputView, passcode: string): Promise<void>;
  passcodeInputDidRequestBiometrics(sender: PasscodeInputView): void;
}

/**
 * The passcode screen shown by the host while the app is locked.
 */
export interface PasscodeInputView {
  shouldActivateKeyboard: boolean;
  showKeyboard(): void;
  animateWrongPasscode(): void;
  showErrorAlert(error: Error, title: string): void;
}

/**
 * The system-facing side of the extension: shows the top-level screens and answers the request.
 */
export interface CredentialProviderHost {
  /**
   * Swap the passcode screen (if any) for the navigation stack. Resolves when the transition is over.
   */
  showNavigation(): Promise<void>;

  /**
   * Swap the navigation stack for a passcode screen.
   */
  showPasscodeInput(config: PasscodeInputConfig, delegate: PasscodeInputDelegate): PasscodeInputView;

  /**
   * End the request without a credential.
   */
  cancelRequest(): void;

  /**
   * End the request with a credential. Resolves once the system has accepted it.
   */
  completeRequest(credential: PasswordCredential): Promise<void>;
}

export interface UsageMonitor {
  startInterval(): void;
  stopInterval(): void;
}

export interface PremiumManager {
  readonly usageMonitor: UsageMonitor;
  reloadReceipt(): void;
}

export type HapticEvent = 'credentialsPasted' | 'appUnlocked' | 'wrongPassword';

export interface HapticFeedback {
  play(event: HapticEvent): void;
}

export interface Clipboard {
  /**
   * Put text on the clipboard, to be cleared after `timeoutSeconds` (negative: never).
   */
  insert(text: string, timeoutSeconds: number): void;
}

export interface TotpGenerator {
  generate(): string;
}

export interface TotpGeneratorFactory {
  /**
   * Get a generator for the entry's TOTP settings, or null when the entry has none.
   */
  makeGenerator(entry: AutoFillEntry): TotpGenerator | null;
}

export interface DatabaseSettingsManager {
  eraseAllMasterKeys(): void;
}

export type DatabaseLoadingCancelReason = 'userRequest' | 'lowMemoryWarning';

export interface DatabaseUnlockerCoordinatorDelegate {
  shouldAutoUnlockDatabase(ref: FileReference, coordinator: DatabaseUnlockerCoordinator): boolean;
  willUnlockDatabase(ref: FileReference, coordinator: DatabaseUnlockerCoordinator): void;
  didNotUnlockDatabase(
    ref: FileReference,
    message: string | undefined,
    reason: string | undefined,
    coordinator: DatabaseUnlockerCoordinator,
  ): void;
  didUnlockDatabase(
    databaseFile: DatabaseFile,
    ref: FileReference,
    warnings: DatabaseLoadingWarnings,
    coordinator: DatabaseUnlockerCoordinator,
  ): void;
  didPressReinstateDatabase(ref: FileReference, coordinator: DatabaseUnlockerCoordinator): void;
}

/**
 * Asks for the master key of a database and loads it.
 */
export interface DatabaseUnlockerCoordinator extends Coordinator {
  delegate?: DatabaseUnlockerCoordinatorDelegate;
  setDatabase(ref: FileReference): void;
  cancelLoading(reason: DatabaseLoadingCancelReason): void;
}

export interface EntryFinderCoordinatorDelegate {
  didLeaveDatabase(coordinator: EntryFinderCoordinator): void;
  didSelectEntry(entry: AutoFillEntry, coordinator: EntryFinderCoordinator): void;
}

/**
 * Searches an unlocked database for entries matching the requested services.
 */
export interface EntryFinderCoordinator extends Coordinator {
  delegate?: EntryFinderCoordinatorDelegate;
  lockDatabase(): void;
  stop(animated: boolean): void;
}

/**
 * Creates the child flows of the AutoFill coordinator.
 */
export interface AutoFillCoordinatorFactory {
  makeDatabasePicker(router: NavigationRouter, mode: DatabasePickerMode): DatabasePickerCoordinator;
  makeDatabaseUnlocker(router: NavigationRouter, ref: FileReference): DatabaseUnlockerCoordinator;
  makeEntryFinder(
    router: NavigationRouter,
    databaseFile: DatabaseFile,
    warnings: DatabaseLoadingWarnings,
    serviceIdentifiers: readonly CredentialServiceIdentifier[],
  ): EntryFinderCoordinator;
}

export interface AppInfo {
  readonly description: string;
}
