import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';

import { AutoFillCoordinator } from '@/autofill/AutoFillCoordinator';
import type {
  AutoFillCoordinatorFactory,
  AutoFillEntry,
  CredentialProviderHost,
  CredentialServiceIdentifier,
  DatabaseFile,
  DatabaseLoadingWarnings,
  DatabaseUnlockerCoordinator,
  DatabaseUnlockerCoordinatorDelegate,
  EntryFinderCoordinator,
  EntryFinderCoordinatorDelegate,
  PasscodeInputConfig,
  PasscodeInputDelegate,
  PasscodeInputView,
  PasswordCredential,
  TotpGenerator,
} from '@/autofill/types';
import type { Coordinator, CoordinatorDismissHandler } from '@/coordinators/Coordinator';
import { DatabasePickerCoordinator } from '@/coordinators/DatabasePickerCoordinator';
import type { NavigationRouter } from '@/coordinators/NavigationRouter';
import { FileInfoReloader } from '@/database/FileInfoReloader';
import type { DatabasePickerMode } from '@/database/types';
import { FileReference } from '@/models/FileReference';
import type { Keychain } from '@/utils/PasscodeKeychain';
import { Settings } from '@/utils/Settings';
import { AppErrorCode } from '@/utils/types/errors/AppErrorCodes';
import { KeychainError } from '@/utils/types/errors/KeychainError';
import { Watchdog } from '@/utils/Watchdog';

/**
 * Unlocker child flow that only records calls.
 */
class FakeDatabaseUnlocker implements DatabaseUnlockerCoordinator {
  public childCoordinators: Coordinator[] = [];
  public delegate?: DatabaseUnlockerCoordinatorDelegate;
  public dismissHandler?: CoordinatorDismissHandler;
  public start = vi.fn();
  public setDatabase = vi.fn();
  public cancelLoading = vi.fn();
}

/**
 * Entry finder child flow that only records calls.
 */
class FakeEntryFinder implements EntryFinderCoordinator {
  public childCoordinators: Coordinator[] = [];
  public delegate?: EntryFinderCoordinatorDelegate;
  public dismissHandler?: CoordinatorDismissHandler;
  public start = vi.fn();
  public lockDatabase = vi.fn();
  public stop = vi.fn();
}

/**
 * Create a passcode screen where every method is a mock.
 */
function createPasscodeView() {
  return {
    shouldActivateKeyboard: false,
    showKeyboard: vi.fn(),
    animateWrongPasscode: vi.fn(),
    showErrorAlert: vi.fn(),
  } satisfies PasscodeInputView;
}

const databaseFile: DatabaseFile = { fileName: 'work.kdbx' };
const warnings: DatabaseLoadingWarnings = { messages: [] };
const entry: AutoFillEntry = { title: 'Example', resolvedUserName: 'alice', resolvedPassword: 'test-password' };

describe('AutoFillCoordinator', () => {
  let settings: Settings;
  let watchdog: Watchdog;
  let router: NavigationRouter & {
    push: Mock;
    present: Mock;
    pop: Mock<() => Promise<void>>;
    popToRoot: Mock;
    dismiss: Mock;
    dismissModals: Mock;
  };
  let passcodeView: ReturnType<typeof createPasscodeView>;
  let showNavigation: Mock<() => Promise<void>>;
  let showPasscodeInput: Mock<(config: PasscodeInputConfig, delegate: PasscodeInputDelegate) => PasscodeInputView>;
  let cancelRequest: Mock<() => void>;
  let completeRequest: Mock<(credential: PasswordCredential) => Promise<void>>;
  let host: CredentialProviderHost;
  let keychain: {
    isAppPasscodeMatch: Mock<(passcode: string) => Promise<boolean>>;
    isBiometricAuthPrepared: Mock<() => boolean>;
    prepareBiometricAuth: Mock<(enabled: boolean) => void>;
    performBiometricAuth: Mock<() => Promise<boolean>>;
    isBiometricsAvailable: Mock<() => boolean>;
  };
  let refs: FileReference[];
  let canAccessAppSandbox: boolean;
  let pickExistingDatabase: Mock<() => Promise<FileReference | null>>;
  let unlocker: FakeDatabaseUnlocker;
  let entryFinder: FakeEntryFinder;
  let factory: AutoFillCoordinatorFactory & {
    makeDatabaseUnlocker: Mock<(router: NavigationRouter, ref: FileReference) => DatabaseUnlockerCoordinator>;
    makeEntryFinder: Mock<(
      router: NavigationRouter,
      databaseFile: DatabaseFile,
      warnings: DatabaseLoadingWarnings,
      serviceIdentifiers: readonly CredentialServiceIdentifier[],
    ) => EntryFinderCoordinator>;
  };
  let premium: { reloadReceipt: Mock; usageMonitor: { startInterval: Mock; stopInterval: Mock } };
  let registerEvent: Mock;
  let playHaptic: Mock;
  let insertIntoClipboard: Mock;
  let makeTotpGenerator: Mock<(entry: AutoFillEntry) => TotpGenerator | null>;
  let eraseAllMasterKeys: Mock;

  /**
   * Create the coordinator under test with the current fakes.
   */
  function createCoordinator(): AutoFillCoordinator {
    const keychainService: Keychain = keychain;
    return new AutoFillCoordinator({
      host,
      router,
      watchdog,
      keychain: keychainService,
      settings,
      fileKeeper: {
        get canAccessAppSandbox(): boolean {
          return canAccessAppSandbox;
        },
        getAllReferences: (_fileType, includeBackup) => refs.filter(ref => includeBackup || !ref.isBackup),
      },
      premiumManager: premium,
      reviewSuggester: { registerEvent },
      haptics: { play: playHaptic },
      clipboard: { insert: insertIntoClipboard },
      totpGeneratorFactory: { makeGenerator: makeTotpGenerator },
      databaseSettingsManager: { eraseAllMasterKeys },
      factory,
      appInfo: { description: 'Vault AutoFill 1.0 (test)' },
      serviceIdentifiers: [{ identifier: 'example.com', type: 'domain' }],
    });
  }

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});

    settings = new Settings();
    watchdog = new Watchdog(settings);
    router = {
      present: vi.fn(),
      push: vi.fn(),
      pop: vi.fn(() => Promise.resolve()),
      popToRoot: vi.fn(),
      dismissModals: vi.fn(),
      dismiss: vi.fn(),
    };
    passcodeView = createPasscodeView();
    showNavigation = vi.fn(() => Promise.resolve());
    showPasscodeInput = vi.fn((_config: PasscodeInputConfig, _delegate: PasscodeInputDelegate): PasscodeInputView => passcodeView);
    cancelRequest = vi.fn<() => void>();
    completeRequest = vi.fn((_credential: PasswordCredential) => Promise.resolve());
    host = { showNavigation, showPasscodeInput, cancelRequest, completeRequest };
    keychain = {
      isAppPasscodeMatch: vi.fn((_passcode: string) => Promise.resolve(true)),
      isBiometricAuthPrepared: vi.fn(() => false),
      prepareBiometricAuth: vi.fn<(enabled: boolean) => void>(),
      performBiometricAuth: vi.fn(() => Promise.resolve(true)),
      isBiometricsAvailable: vi.fn(() => true),
    };
    refs = [new FileReference({ url: 'file:///shared/work.kdbx', location: 'external' })];
    canAccessAppSandbox = true;
    pickExistingDatabase = vi.fn(() => Promise.resolve<FileReference | null>(null));
    unlocker = new FakeDatabaseUnlocker();
    entryFinder = new FakeEntryFinder();
    factory = {
      makeDatabasePicker: (pickerRouter: NavigationRouter, mode: DatabasePickerMode) => new DatabasePickerCoordinator({
        router: pickerRouter,
        mode,
        settings,
        fileKeeper: { canAccessAppSandbox: false, getAllReferences: () => [...refs] },
        fileInfoReloader: new FileInfoReloader({
          refreshInfo: (ref: FileReference) => Promise.resolve({ fileName: ref.visibleFileName }),
        }),
        fileImporter: { pickExistingDatabase },
        fileActions: {
          exportDatabase: vi.fn(),
          revealInFinder: vi.fn(),
          showProperties: vi.fn(),
          confirmElimination: () => Promise.resolve(true),
          eliminateDatabase: () => Promise.resolve(),
          setupAppLock: vi.fn(),
        },
        platform: { isRunningOnMac: false, isMainApp: false },
        sortingAnimationDuration: 0,
      }),
      makeDatabaseUnlocker: vi.fn((_router: NavigationRouter, _ref: FileReference): DatabaseUnlockerCoordinator => unlocker),
      makeEntryFinder: vi.fn((
        _router: NavigationRouter,
        _databaseFile: DatabaseFile,
        _warnings: DatabaseLoadingWarnings,
        _serviceIdentifiers: readonly CredentialServiceIdentifier[],
      ): EntryFinderCoordinator => entryFinder),
    };
    premium = { reloadReceipt: vi.fn(), usageMonitor: { startInterval: vi.fn(), stopInterval: vi.fn() } };
    registerEvent = vi.fn();
    playHaptic = vi.fn();
    insertIntoClipboard = vi.fn();
    makeTotpGenerator = vi.fn((_entry: AutoFillEntry): TotpGenerator | null => null);
    eraseAllMasterKeys = vi.fn();
  });

  afterEach(() => {
    watchdog.stop();
    vi.useRealTimers();
  });

  it('should take over the watchdog and log the app description', () => {
    const coordinator = createCoordinator();

    expect(watchdog.delegate).toBe(coordinator);
    expect(console.info).toHaveBeenCalledWith('[AUTOFILL]', 'Vault AutoFill 1.0 (test)');
  });

  describe('start', () => {
    it('should show the database picker and select the startup database', () => {
      const coordinator = createCoordinator();

      coordinator.start();

      expect(showNavigation).toHaveBeenCalledTimes(1);
      expect(premium.reloadReceipt).toHaveBeenCalledTimes(1);
      expect(premium.usageMonitor.startInterval).toHaveBeenCalledTimes(1);
      expect(router.push).toHaveBeenCalledWith({ kind: 'databasePicker', picker: coordinator.databasePicker?.picker });
      expect(coordinator.childCoordinators).toHaveLength(1);
      expect(coordinator.databasePicker?.shouldSelectDefaultDatabase).toBe(true);
      expect(registerEvent).toHaveBeenCalledWith('sessionStart');
    });

    it('should show the crash report after an unfinished session', () => {
      settings.isAutoFillFinishedOK = false;
      const coordinator = createCoordinator();

      coordinator.start();

      expect(router.push).toHaveBeenLastCalledWith({ kind: 'crashReport', delegate: coordinator });
      expect(registerEvent.mock.calls).toEqual([['sessionStart'], ['trouble']]);
      expect(coordinator.databasePicker?.shouldSelectDefaultDatabase).toBe(false);
    });

    it('should present onboarding when no usable database is shared', async () => {
      canAccessAppSandbox = false;
      refs = [new FileReference({ url: 'file:///shared/gone.kdbx', location: 'external', error: new Error('gone') })];
      const coordinator = createCoordinator();

      coordinator.start();
      expect(router.present).not.toHaveBeenCalled();
      await Promise.resolve();

      expect(router.present).toHaveBeenCalledWith({ kind: 'onboarding', delegate: coordinator });
    });

    it('should skip onboarding when the app sandbox is reachable', async () => {
      refs = [];
      const coordinator = createCoordinator();

      coordinator.start();
      await Promise.resolve();

      expect(router.present).not.toHaveBeenCalled();
    });

    it('should show the passcode instead of the navigation when app lock is on', () => {
      settings.isAppLockEnabled = true;
      const coordinator = createCoordinator();

      coordinator.start();

      expect(showNavigation).not.toHaveBeenCalled();
      expect(showPasscodeInput).toHaveBeenCalledWith(
        { mode: 'verification', isCancelAllowed: true, isBiometricsAllowed: false, shouldActivateKeyboard: true },
        coordinator,
      );
      expect(router.dismissModals).toHaveBeenCalledTimes(1);
      expect(passcodeView.shouldActivateKeyboard).toBe(true);
      expect(coordinator.isAppLockVisible).toBe(true);
    });
  });

  describe('biometric unlock', () => {
    beforeEach(() => {
      settings.isAppLockEnabled = true;
      keychain.isBiometricAuthPrepared.mockReturnValue(true);
    });

    it('should unlock when the prompt succeeds', async () => {
      const coordinator = createCoordinator();

      coordinator.start();
      expect(showPasscodeInput).toHaveBeenCalledWith(
        { mode: 'verification', isCancelAllowed: true, isBiometricsAllowed: true, shouldActivateKeyboard: false },
        coordinator,
      );
      expect(passcodeView.shouldActivateKeyboard).toBe(false);

      await vi.waitFor(() => expect(showNavigation).toHaveBeenCalledTimes(1));
      expect(watchdog.isAppLocked).toBe(false);
      expect(coordinator.isAppLockVisible).toBe(false);
      expect(settings.biometricPromptLastSeenTime).toEqual(expect.any(Number));
    });

    it('should fall back to the keyboard when the prompt fails', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      keychain.performBiometricAuth.mockResolvedValue(false);
      const coordinator = createCoordinator();

      coordinator.start();

      await vi.waitFor(() => expect(passcodeView.showKeyboard).toHaveBeenCalledTimes(1));
      expect(watchdog.isAppLocked).toBe(true);
      expect(coordinator.isAppLockVisible).toBe(true);
    });

    it('should treat a prompt error as a failure', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      keychain.performBiometricAuth.mockRejectedValue(new Error('sensor busy'));
      const coordinator = createCoordinator();

      coordinator.start();

      await vi.waitFor(() => expect(passcodeView.showKeyboard).toHaveBeenCalledTimes(1));
      expect(consoleError).toHaveBeenCalledWith('[AUTOFILL] Biometric auth error:', 'sensor busy');
    });

    it('should skip the prompt when biometric unlock is switched off', () => {
      settings.isBiometricAppLockEnabled = false;
      const coordinator = createCoordinator();

      coordinator.start();

      expect(keychain.performBiometricAuth).not.toHaveBeenCalled();
      expect(passcodeView.shouldActivateKeyboard).toBe(true);
    });
  });

  describe('passcode input', () => {
    it('should unlock on the right passcode', async () => {
      settings.isAppLockEnabled = true;
      const coordinator = createCoordinator();
      coordinator.start();

      await coordinator.passcodeInputDidEnterPasscode(passcodeView, '1234');

      expect(keychain.isAppPasscodeMatch).toHaveBeenCalledWith('1234');
      expect(playHaptic).toHaveBeenCalledWith('appUnlocked');
      expect(keychain.prepareBiometricAuth).toHaveBeenCalledWith(true);
      expect(watchdog.isAppLocked).toBe(false);
      expect(showNavigation).toHaveBeenCalledTimes(1);
      expect(coordinator.isAppLockVisible).toBe(false);
    });

    it('should lock all databases on a wrong passcode', async () => {
      keychain.isAppPasscodeMatch.mockResolvedValue(false);
      const coordinator = createCoordinator();
      coordinator.didUnlockDatabase(databaseFile, refs[0], warnings);

      await coordinator.passcodeInputDidEnterPasscode(passcodeView, '0000');

      expect(playHaptic).toHaveBeenCalledWith('wrongPassword');
      expect(passcodeView.animateWrongPasscode).toHaveBeenCalledTimes(1);
      expect(registerEvent).toHaveBeenCalledWith('trouble');
      expect(eraseAllMasterKeys).toHaveBeenCalledTimes(1);
      expect(entryFinder.lockDatabase).toHaveBeenCalledTimes(1);
    });

    it('should keep databases open on a wrong passcode when configured so', async () => {
      settings.isLockAllDatabasesOnFailedPasscode = false;
      keychain.isAppPasscodeMatch.mockResolvedValue(false);
      const coordinator = createCoordinator();

      await coordinator.passcodeInputDidEnterPasscode(passcodeView, '0000');

      expect(passcodeView.animateWrongPasscode).toHaveBeenCalledTimes(1);
      expect(eraseAllMasterKeys).not.toHaveBeenCalled();
    });

    it('should show keychain errors', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      keychain.isAppPasscodeMatch.mockRejectedValue(new KeychainError('No passcode stored', AppErrorCode.PASSCODE_NOT_SET));
      const coordinator = createCoordinator();

      await coordinator.passcodeInputDidEnterPasscode(passcodeView, '1234');

      expect(consoleError).toHaveBeenCalledWith('[AUTOFILL]', 'No passcode stored');
      expect(passcodeView.showErrorAlert).toHaveBeenCalledWith(
        new Error('App passcode is not set. (Code: E-103)'),
        'Keychain Error',
      );
      expect(playHaptic).not.toHaveBeenCalled();
    });

    it('should show a generic message for errors without a code', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      keychain.isAppPasscodeMatch.mockRejectedValue('storage offline');
      const coordinator = createCoordinator();

      await coordinator.passcodeInputDidEnterPasscode(passcodeView, '1234');

      expect(console.error).toHaveBeenCalledWith('[AUTOFILL]', 'storage offline');
      expect(passcodeView.showErrorAlert).toHaveBeenCalledWith(
        new Error('An unknown error occurred. Please try again. (Code: E-001)'),
        'Keychain Error',
      );
    });

    it('should present onboarding after unlocking when no usable database is shared', async () => {
      settings.isAppLockEnabled = true;
      canAccessAppSandbox = false;
      refs = [];
      const coordinator = createCoordinator();
      coordinator.start();
      await Promise.resolve();
      expect(router.present).not.toHaveBeenCalled();

      await coordinator.passcodeInputDidEnterPasscode(passcodeView, '1234');

      await vi.waitFor(() => expect(router.present).toHaveBeenCalledWith({ kind: 'onboarding', delegate: coordinator }));
      expect(showNavigation).toHaveBeenCalledTimes(1);
    });

    it('should end the request on cancel', () => {
      settings.isAutoFillFinishedOK = false;
      const coordinator = createCoordinator();

      coordinator.passcodeInputDidCancel();

      expect(cancelRequest).toHaveBeenCalledTimes(1);
      expect(settings.isAutoFillFinishedOK).toBe(true);
      expect(premium.usageMonitor.stopInterval).toHaveBeenCalledTimes(1);
      expect(router.popToRoot).toHaveBeenCalledTimes(1);
    });

    it('should retry biometrics on request', () => {
      keychain.isBiometricAuthPrepared.mockReturnValue(true);
      const coordinator = createCoordinator();

      coordinator.passcodeInputDidRequestBiometrics();

      expect(keychain.performBiometricAuth).toHaveBeenCalledTimes(1);
      expect(coordinator.isAppLockVisible).toBe(true);
    });
  });

  it('should log hiding an app lock that is not shown', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const coordinator = createCoordinator();

    coordinator.hideAppLock();

    expect(consoleError).toHaveBeenCalledWith('[AUTOFILL]', 'App lock hidden while not shown (Code: E-301)');
    expect(showNavigation).not.toHaveBeenCalled();
  });

  describe('database flow', () => {
    it('should open the unlocker for the selected database', () => {
      const coordinator = createCoordinator();

      coordinator.didSelectDatabase(refs[0]);

      expect(factory.makeDatabaseUnlocker).toHaveBeenCalledWith(router, refs[0]);
      expect(unlocker.delegate).toBe(coordinator);
      expect(unlocker.setDatabase).toHaveBeenCalledWith(refs[0]);
      expect(unlocker.start).toHaveBeenCalledTimes(1);
      expect(coordinator.databaseUnlocker).toBe(unlocker);
      expect(coordinator.childCoordinators).toContain(unlocker);
    });

    it('should ignore an empty selection', () => {
      const coordinator = createCoordinator();

      coordinator.didSelectDatabase(undefined);

      expect(factory.makeDatabaseUnlocker).not.toHaveBeenCalled();
    });

    it('should forget the unlocker when it is dismissed', () => {
      const coordinator = createCoordinator();
      coordinator.didSelectDatabase(refs[0]);

      unlocker.dismissHandler?.(unlocker);

      expect(coordinator.databaseUnlocker).toBeNull();
      expect(coordinator.childCoordinators).not.toContain(unlocker);
    });

    it('should flag the session while a database is unlocking', () => {
      const coordinator = createCoordinator();

      coordinator.willUnlockDatabase();
      expect(settings.isAutoFillFinishedOK).toBe(false);

      coordinator.didNotUnlockDatabase();
      expect(settings.isAutoFillFinishedOK).toBe(true);
    });

    it('should open the entry finder for an unlocked database', () => {
      const coordinator = createCoordinator();
      coordinator.willUnlockDatabase();

      coordinator.didUnlockDatabase(databaseFile, refs[0], warnings);

      expect(settings.isAutoFillFinishedOK).toBe(true);
      expect(factory.makeEntryFinder).toHaveBeenCalledWith(
        router,
        databaseFile,
        warnings,
        [{ identifier: 'example.com', type: 'domain' }],
      );
      expect(entryFinder.delegate).toBe(coordinator);
      expect(entryFinder.start).toHaveBeenCalledTimes(1);
      expect(coordinator.entryFinder).toBe(entryFinder);
    });

    it('should cancel loading on a memory warning', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const coordinator = createCoordinator();
      coordinator.didSelectDatabase(refs[0]);

      coordinator.handleMemoryWarning();

      expect(unlocker.cancelLoading).toHaveBeenCalledWith('lowMemoryWarning');
    });

    it('should go back and add a database when reinstating', async () => {
      const coordinator = createCoordinator();
      coordinator.start();

      coordinator.didPressReinstateDatabase();

      expect(router.pop).toHaveBeenCalledTimes(1);
      await vi.waitFor(() => expect(pickExistingDatabase).toHaveBeenCalledTimes(1));
    });

    it('should end the request when the picker is cancelled', () => {
      const coordinator = createCoordinator();
      coordinator.start();
      const picker = coordinator.databasePicker;

      picker?.didPressCancel();

      expect(router.dismiss).toHaveBeenCalledWith({ kind: 'databasePicker', picker: picker?.picker });
      expect(coordinator.databasePicker).toBeNull();
      expect(coordinator.childCoordinators).toHaveLength(0);
      expect(cancelRequest).toHaveBeenCalledTimes(1);
    });

    it('should not keep the picker selection', () => {
      const coordinator = createCoordinator();

      expect(coordinator.shouldKeepSelection()).toBe(false);
      expect(coordinator.shouldAcceptDatabaseSelection()).toBe(true);
      expect(coordinator.shouldAutoUnlockDatabase()).toBe(true);
    });
  });

  describe('returning credentials', () => {
    it('should complete the request with the entry', async () => {
      const coordinator = createCoordinator();
      coordinator.willUnlockDatabase();

      coordinator.didSelectEntry(entry);

      expect(completeRequest).toHaveBeenCalledWith({ user: 'alice', password: 'test-password' });
      expect(settings.isAutoFillFinishedOK).toBe(true);
      expect(premium.usageMonitor.stopInterval).toHaveBeenCalledTimes(1);
      expect(router.popToRoot).toHaveBeenCalledTimes(1);
      await vi.waitFor(() => expect(playHaptic).toHaveBeenCalledWith('credentialsPasted'));
    });

    it('should stop the idle timers once the request is answered', () => {
      vi.useFakeTimers();
      settings.databaseLockTimeout = 30;
      const coordinator = createCoordinator();
      coordinator.start();
      coordinator.didUnlockDatabase(databaseFile, refs[0], warnings);

      coordinator.didSelectEntry(entry);
      vi.advanceTimersByTime(31_000);

      expect(entryFinder.stop).not.toHaveBeenCalled();
      expect(entryFinder.lockDatabase).not.toHaveBeenCalled();
    });

    it('should copy the TOTP code to the clipboard', () => {
      makeTotpGenerator.mockReturnValue({ generate: () => '123456' });
      settings.clipboardTimeout = 30;
      const coordinator = createCoordinator();

      coordinator.didSelectEntry(entry);

      expect(makeTotpGenerator).toHaveBeenCalledWith(entry);
      expect(insertIntoClipboard).toHaveBeenCalledWith('123456', 30);
    });

    it('should not copy the TOTP code when switched off', () => {
      makeTotpGenerator.mockReturnValue({ generate: () => '123456' });
      settings.isCopyTOTPOnAutoFill = false;
      const coordinator = createCoordinator();

      coordinator.didSelectEntry(entry);

      expect(makeTotpGenerator).not.toHaveBeenCalled();
      expect(insertIntoClipboard).not.toHaveBeenCalled();
    });

    it('should not copy anything for entries without TOTP', () => {
      const coordinator = createCoordinator();

      coordinator.didSelectEntry(entry);

      expect(insertIntoClipboard).not.toHaveBeenCalled();
    });

    it('should log a rejected request', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      completeRequest.mockRejectedValue(new Error('extension context gone'));
      const coordinator = createCoordinator();

      coordinator.didSelectEntry(entry);

      await vi.waitFor(() => expect(consoleError).toHaveBeenCalledWith(
        '[AUTOFILL]',
        'extension context gone (Code: E-303)',
      ));
      expect(playHaptic).not.toHaveBeenCalled();
    });
  });

  describe('database timeout', () => {
    it('should lock the database when configured so', () => {
      settings.isLockDatabasesOnTimeout = true;
      const coordinator = createCoordinator();
      coordinator.didUnlockDatabase(databaseFile, refs[0], warnings);

      coordinator.mustCloseDatabase(watchdog, true);

      expect(entryFinder.lockDatabase).toHaveBeenCalledTimes(1);
      expect(entryFinder.stop).not.toHaveBeenCalled();
    });

    it('should close the database otherwise', () => {
      const coordinator = createCoordinator();
      coordinator.didUnlockDatabase(databaseFile, refs[0], warnings);

      coordinator.mustCloseDatabase(watchdog, false);

      expect(entryFinder.stop).toHaveBeenCalledWith(false);
    });
  });

  describe('crash report', () => {
    it('should mark the session as fine and close the report', () => {
      settings.isAutoFillFinishedOK = false;
      const coordinator = createCoordinator();

      coordinator.didPressDismiss();

      expect(settings.isAutoFillFinishedOK).toBe(true);
      expect(router.pop).toHaveBeenCalledTimes(1);
    });
  });

  describe('onboarding', () => {
    beforeEach(() => {
      canAccessAppSandbox = false;
      refs = [];
    });

    it('should dismiss onboarding when skipped', async () => {
      const coordinator = createCoordinator();
      coordinator.start();
      await Promise.resolve();

      coordinator.didPressSkip();

      expect(router.dismiss).toHaveBeenCalledWith({ kind: 'onboarding', delegate: coordinator });
    });

    it('should add a database from onboarding', async () => {
      const coordinator = createCoordinator();
      coordinator.start();
      await Promise.resolve();

      coordinator.didPressAddDatabase();

      expect(router.dismiss).toHaveBeenCalledWith({ kind: 'onboarding', delegate: coordinator });
      expect(pickExistingDatabase).toHaveBeenCalledTimes(1);
    });

    it('should end the request when onboarding is cancelled', () => {
      const coordinator = createCoordinator();

      coordinator.didPressCancel();

      expect(cancelRequest).toHaveBeenCalledTimes(1);
    });
  });

  it('should not use an app cover', () => {
    const coordinator = createCoordinator();

    coordinator.showAppCover();
    coordinator.hideAppCover();

    expect(coordinator.isAppCoverVisible).toBe(false);
  });
});
