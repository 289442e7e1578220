import type {
  AppInfo,
  AutoFillCoordinatorFactory,
  AutoFillEntry,
  Clipboard,
  CredentialProviderHost,
  CredentialServiceIdentifier,
  DatabaseFile,
  DatabaseLoadingWarnings,
  DatabaseSettingsManager,
  DatabaseUnlockerCoordinator,
  DatabaseUnlockerCoordinatorDelegate,
  EntryFinderCoordinator,
  EntryFinderCoordinatorDelegate,
  HapticFeedback,
  PasscodeInputDelegate,
  PasscodeInputView,
  PremiumManager,
  TotpGeneratorFactory,
} from '@/autofill/types';
import { BaseCoordinator, type Coordinator } from '@/coordinators/Coordinator';
import type {
  DatabasePickerCoordinator,
  DatabasePickerCoordinatorDelegate,
} from '@/coordinators/DatabasePickerCoordinator';
import type {
  CrashReportDelegate,
  FirstSetupDelegate,
  NavigationRouter,
  Screen,
} from '@/coordinators/NavigationRouter';
import type { FileKeeper } from '@/database/FileKeeper';
import { t } from '@/i18n';
import type { FileReference } from '@/models/FileReference';
import type { Keychain } from '@/utils/PasscodeKeychain';
import type { ReviewSuggester } from '@/utils/ReviewSuggester';
import type { Settings } from '@/utils/Settings';
import {
  AppErrorCode,
  formatErrorWithCode,
  getErrorCode,
  getErrorMessage,
  getErrorTranslationKey,
} from '@/utils/types/errors/AppErrorCodes';
import type { Watchdog, WatchdogDelegate } from '@/utils/Watchdog';

export interface AutoFillCoordinatorOptions {
  host: CredentialProviderHost;
  router: NavigationRouter;
  watchdog: Watchdog;
  keychain: Keychain;
  settings: Settings;
  fileKeeper: FileKeeper;
  premiumManager: PremiumManager;
  reviewSuggester: ReviewSuggester;
  haptics: HapticFeedback;
  clipboard: Clipboard;
  totpGeneratorFactory: TotpGeneratorFactory;
  databaseSettingsManager: DatabaseSettingsManager;
  factory: AutoFillCoordinatorFactory;
  appInfo: AppInfo;
  serviceIdentifiers?: CredentialServiceIdentifier[];
}

/**
 * Top-level flow of the AutoFill extension.
 *
 * Guards the extension with the app lock, walks the user from the database list
 * through unlocking to picking an entry, and hands the chosen credential back to the system.
 */
export class AutoFillCoordinator extends BaseCoordinator implements
  WatchdogDelegate,
  PasscodeInputDelegate,
  FirstSetupDelegate,
  CrashReportDelegate,
  DatabasePickerCoordinatorDelegate,
  DatabaseUnlockerCoordinatorDelegate,
  EntryFinderCoordinatorDelegate {
  public serviceIdentifiers: CredentialServiceIdentifier[];

  private readonly host: CredentialProviderHost;
  private readonly router: NavigationRouter;
  private readonly watchdog: Watchdog;
  private readonly keychain: Keychain;
  private readonly settings: Settings;
  private readonly fileKeeper: FileKeeper;
  private readonly premiumManager: PremiumManager;
  private readonly reviewSuggester: ReviewSuggester;
  private readonly haptics: HapticFeedback;
  private readonly clipboard: Clipboard;
  private readonly totpGeneratorFactory: TotpGeneratorFactory;
  private readonly databaseSettingsManager: DatabaseSettingsManager;
  private readonly factory: AutoFillCoordinatorFactory;

  private databasePickerCoordinator: DatabasePickerCoordinator | null = null;
  private databaseUnlockerCoordinator: DatabaseUnlockerCoordinator | null = null;
  private entryFinderCoordinator: EntryFinderCoordinator | null = null;

  private passcodeInputView: PasscodeInputView | null = null;
  private onboardingScreen: Screen | null = null;
  private isBiometricAuthShown = false;
  private isPasscodeInputShown = false;

  /**
   * Creates the coordinator and takes over the watchdog.
   */
  public constructor(options: AutoFillCoordinatorOptions) {
    super();
    this.host = options.host;
    this.router = options.router;
    this.watchdog = options.watchdog;
    this.keychain = options.keychain;
    this.settings = options.settings;
    this.fileKeeper = options.fileKeeper;
    this.premiumManager = options.premiumManager;
    this.reviewSuggester = options.reviewSuggester;
    this.haptics = options.haptics;
    this.clipboard = options.clipboard;
    this.totpGeneratorFactory = options.totpGeneratorFactory;
    this.databaseSettingsManager = options.databaseSettingsManager;
    this.factory = options.factory;
    this.serviceIdentifiers = options.serviceIdentifiers ?? [];

    console.info('[AUTOFILL]', options.appInfo.description);
    this.watchdog.delegate = this;
  }

  public get databasePicker(): DatabasePickerCoordinator | null {
    return this.databasePickerCoordinator;
  }

  public get databaseUnlocker(): DatabaseUnlockerCoordinator | null {
    return this.databaseUnlockerCoordinator;
  }

  public get entryFinder(): EntryFinderCoordinator | null {
    return this.entryFinderCoordinator;
  }

  public start(): void {
    this.watchdog.didBecomeActive();
    if (!this.isAppLockVisible) {
      this.showNavigation();
      if (this.isNeedsOnboarding()) {
        queueMicrotask(() => this.presentOnboarding());
      }
    }

    this.premiumManager.reloadReceipt();
    this.premiumManager.usageMonitor.startInterval();

    this.showDatabasePicker();
    this.reviewSuggester.registerEvent('sessionStart');
    if (this.settings.isAutoFillFinishedOK) {
      if (this.databasePickerCoordinator) {
        this.databasePickerCoordinator.shouldSelectDefaultDatabase = true;
      }
    } else {
      this.showCrashReport();
    }
  }

  /**
   * The system is short on memory; abort database loading, which is the most memory-hungry step.
   */
  public handleMemoryWarning(): void {
    console.error('[AUTOFILL] Received a memory warning');
    this.databaseUnlockerCoordinator?.cancelLoading('lowMemoryWarning');
  }

  public cleanup(): void {
    this.watchdog.stop();
    this.premiumManager.usageMonitor.stopInterval();
    this.router.popToRoot();
  }

  private dismissAndQuit(): void {
    this.host.cancelRequest();
    this.settings.isAutoFillFinishedOK = true;
    this.cleanup();
  }

  private returnCredentials(entry: AutoFillEntry): void {
    this.watchdog.restart();

    if (this.settings.isCopyTOTPOnAutoFill) {
      const totpGenerator = this.totpGeneratorFactory.makeGenerator(entry);
      if (totpGenerator) {
        this.clipboard.insert(totpGenerator.generate(), this.settings.clipboardTimeout);
      }
    }

    this.host
      .completeRequest({
        user: entry.resolvedUserName,
        password: entry.resolvedPassword,
      })
      .then(() => {
        this.haptics.play('credentialsPasted');
      })
      .catch((error: unknown) => {
        console.error(
          '[AUTOFILL]',
          formatErrorWithCode(getErrorMessage(error, 'Failed to complete the request'), AppErrorCode.CREDENTIAL_REQUEST_FAILED),
        );
      });
    this.settings.isAutoFillFinishedOK = true;
    this.cleanup();
  }

  /**
   * Onboarding is only needed when the extension sees no usable database.
   */
  private isNeedsOnboarding(): boolean {
    if (this.fileKeeper.canAccessAppSandbox) {
      return false;
    }

    const validDatabases = this.fileKeeper
      .getAllReferences('database', false)
      .filter(ref => !ref.hasError);
    return validDatabases.length === 0;
  }

  private showNavigation(): void {
    this.host.showNavigation().catch((error: unknown) => {
      console.error('[AUTOFILL] Failed to show navigation:', error);
    });
  }

  private showDatabasePicker(): void {
    const databasePickerCoordinator = this.factory.makeDatabasePicker(this.router, 'autoFill');
    databasePickerCoordinator.delegate = this;
    databasePickerCoordinator.dismissHandler = (coordinator: Coordinator): void => {
      this.removeChildCoordinator(coordinator);
      this.databasePickerCoordinator = null;
      this.dismissAndQuit();
    };
    databasePickerCoordinator.start();
    this.addChildCoordinator(databasePickerCoordinator);
    this.databasePickerCoordinator = databasePickerCoordinator;
  }

  private presentOnboarding(): void {
    const onboardingScreen: Screen = { kind: 'onboarding', delegate: this };
    this.onboardingScreen = onboardingScreen;
    this.router.present(onboardingScreen);
  }

  private dismissOnboarding(): void {
    if (this.onboardingScreen) {
      this.router.dismiss(this.onboardingScreen);
      this.onboardingScreen = null;
    }
  }

  private showCrashReport(): void {
    this.reviewSuggester.registerEvent('trouble');
    this.router.push({ kind: 'crashReport', delegate: this });
  }

  private showDatabaseUnlocker(ref: FileReference): void {
    const databaseUnlockerCoordinator = this.factory.makeDatabaseUnlocker(this.router, ref);
    databaseUnlockerCoordinator.dismissHandler = (coordinator: Coordinator): void => {
      this.removeChildCoordinator(coordinator);
      this.databaseUnlockerCoordinator = null;
    };
    databaseUnlockerCoordinator.delegate = this;
    databaseUnlockerCoordinator.setDatabase(ref);

    databaseUnlockerCoordinator.start();
    this.addChildCoordinator(databaseUnlockerCoordinator);
    this.databaseUnlockerCoordinator = databaseUnlockerCoordinator;
  }

  private showDatabaseViewer(databaseFile: DatabaseFile, warnings: DatabaseLoadingWarnings): void {
    const entryFinderCoordinator = this.factory.makeEntryFinder(
      this.router,
      databaseFile,
      warnings,
      this.serviceIdentifiers,
    );
    entryFinderCoordinator.dismissHandler = (coordinator: Coordinator): void => {
      this.removeChildCoordinator(coordinator);
      this.entryFinderCoordinator = null;
    };
    entryFinderCoordinator.delegate = this;

    entryFinderCoordinator.start();
    this.addChildCoordinator(entryFinderCoordinator);
    this.entryFinderCoordinator = entryFinderCoordinator;
  }

  // MARK: - Watchdog

  /**
   * The extension is too short-lived to need an app cover.
   */
  public get isAppCoverVisible(): boolean {
    return false;
  }

  public showAppCover(): void {
    // no-op
  }

  public hideAppCover(): void {
    // no-op
  }

  public get isAppLockVisible(): boolean {
    return this.isBiometricAuthShown || this.isPasscodeInputShown;
  }

  public showAppLock(): void {
    if (this.isAppLockVisible) {
      return;
    }
    const shouldUseBiometrics = this.canUseBiometrics();

    const passcodeInputView = this.host.showPasscodeInput(
      {
        mode: 'verification',
        isCancelAllowed: true,
        isBiometricsAllowed: shouldUseBiometrics,
        shouldActivateKeyboard: !shouldUseBiometrics,
      },
      this,
    );
    this.router.dismissModals();
    this.onboardingScreen = null;

    this.passcodeInputView = passcodeInputView;
    this.maybeShowBiometricAuth();
    passcodeInputView.shouldActivateKeyboard = !this.isBiometricAuthShown;
    this.isPasscodeInputShown = true;
  }

  public hideAppLock(): void {
    this.dismissPasscodeAndContinue();
  }

  public mustCloseDatabase(_sender: Watchdog, animate: boolean): void {
    if (this.settings.isLockDatabasesOnTimeout) {
      this.entryFinderCoordinator?.lockDatabase();
    } else {
      this.entryFinderCoordinator?.stop(animate);
    }
  }

  private dismissPasscodeAndContinue(): void {
    if (this.passcodeInputView) {
      this.host
        .showNavigation()
        .then(() => {
          if (this.isNeedsOnboarding()) {
            this.presentOnboarding();
          }
        })
        .catch((error: unknown) => {
          console.error('[AUTOFILL] Failed to show navigation:', error);
        });
      this.passcodeInputView = null;
    } else {
      console.error('[AUTOFILL]', formatErrorWithCode('App lock hidden while not shown', AppErrorCode.APP_LOCK_NOT_SHOWN));
    }

    this.isPasscodeInputShown = false;
    this.watchdog.restart();
  }

  private canUseBiometrics(): boolean {
    return this.settings.isBiometricAppLockEnabled
      && this.keychain.isBiometricsAvailable()
      && this.keychain.isBiometricAuthPrepared();
  }

  private maybeShowBiometricAuth(): void {
    if (!this.canUseBiometrics()) {
      this.isBiometricAuthShown = false;
      return;
    }

    console.debug('[AUTOFILL] Biometric auth: showing request');
    this.keychain
      .performBiometricAuth()
      .catch((error: unknown) => {
        console.error('[AUTOFILL] Biometric auth error:', getErrorMessage(error, 'unknown error'));
        return false;
      })
      .then(success => this.handleBiometricAuthResult(success))
      .catch((error: unknown) => {
        console.error('[AUTOFILL] Failed to handle biometric auth result:', error);
      });
    this.isBiometricAuthShown = true;
  }

  private handleBiometricAuthResult(success: boolean): void {
    this.settings.biometricPromptLastSeenTime = Date.now();
    this.isBiometricAuthShown = false;
    if (success) {
      console.info('[AUTOFILL] Biometric auth successful');
      this.watchdog.unlockApp();
    } else {
      console.warn('[AUTOFILL] Biometric auth failed');
      this.passcodeInputView?.showKeyboard();
    }
  }

  // MARK: - Passcode input

  public passcodeInputDidCancel(): void {
    this.dismissAndQuit();
  }

  public async passcodeInputDidEnterPasscode(sender: PasscodeInputView, passcode: string): Promise<void> {
    let isMatch: boolean;
    try {
      isMatch = await this.keychain.isAppPasscodeMatch(passcode);
    } catch (error) {
      const code = getErrorCode(error) ?? AppErrorCode.UNKNOWN_ERROR;
      console.error('[AUTOFILL]', getErrorMessage(error, 'Passcode check failed'));
      sender.showErrorAlert(
        new Error(formatErrorWithCode(t(getErrorTranslationKey(code)), code)),
        t('autofill.keychainError'),
      );
      return;
    }

    if (isMatch) {
      this.haptics.play('appUnlocked');
      this.keychain.prepareBiometricAuth(true);
      this.watchdog.unlockApp();
      return;
    }

    this.haptics.play('wrongPassword');
    sender.animateWrongPasscode();
    this.reviewSuggester.registerEvent('trouble');
    if (this.settings.isLockAllDatabasesOnFailedPasscode) {
      this.databaseSettingsManager.eraseAllMasterKeys();
      this.entryFinderCoordinator?.lockDatabase();
    }
  }

  public passcodeInputDidRequestBiometrics(): void {
    this.maybeShowBiometricAuth();
  }

  // MARK: - Crash report

  public didPressDismiss(): void {
    this.settings.isAutoFillFinishedOK = true;
    this.router.pop().catch((error: unknown) => {
      console.error('[AUTOFILL] Failed to close the crash report:', error);
    });
  }

  // MARK: - First setup

  public didPressCancel(): void {
    this.dismissAndQuit();
  }

  public didPressAddDatabase(): void {
    this.watchdog.restart();
    this.dismissOnboarding();
    void this.databasePickerCoordinator?.addExistingDatabase();
  }

  public didPressSkip(): void {
    this.watchdog.restart();
    this.dismissOnboarding();
  }

  // MARK: - Database picker

  public shouldAcceptDatabaseSelection(): boolean {
    return true;
  }

  public didSelectDatabase(ref: FileReference | undefined): void {
    if (!ref) {
      return;
    }
    this.showDatabaseUnlocker(ref);
  }

  public shouldKeepSelection(): boolean {
    return false;
  }

  // MARK: - Database unlocker

  public shouldAutoUnlockDatabase(): boolean {
    return true;
  }

  /**
   * Cleared before loading and restored after, so that a crash while loading shows up at the next launch.
   */
  public willUnlockDatabase(): void {
    this.settings.isAutoFillFinishedOK = false;
  }

  public didNotUnlockDatabase(): void {
    this.settings.isAutoFillFinishedOK = true;
  }

  public didUnlockDatabase(databaseFile: DatabaseFile, _ref: FileReference, warnings: DatabaseLoadingWarnings): void {
    this.settings.isAutoFillFinishedOK = true;
    this.showDatabaseViewer(databaseFile, warnings);
  }

  public didPressReinstateDatabase(): void {
    this.router
      .pop()
      .then(() => this.databasePickerCoordinator?.addExistingDatabase())
      .catch((error: unknown) => {
        console.error('[AUTOFILL] Failed to reinstate database:', error);
      });
  }

  // MARK: - Entry finder

  public didLeaveDatabase(): void {
    // no-op
  }

  public didSelectEntry(entry: AutoFillEntry): void {
    this.returnCredentials(entry);
  }
}
