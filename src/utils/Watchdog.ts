import type { Settings } from '@/utils/Settings';

/**
 * Screens the watchdog shows and hides: the app cover hides content in the app switcher,
 * the app lock asks for the app passcode.
 */
export interface WatchdogDelegate {
  readonly isAppCoverVisible: boolean;
  showAppCover(sender: Watchdog): void;
  hideAppCover(sender: Watchdog): void;

  readonly isAppLockVisible: boolean;
  showAppLock(sender: Watchdog): void;
  hideAppLock(sender: Watchdog): void;

  mustCloseDatabase(sender: Watchdog, animate: boolean): void;
}

type TimerHandle = ReturnType<typeof setTimeout>;

/**
 * Check whether an idle period has reached a timeout.
 * Negative timeouts never expire.
 */
function isTimeoutExpired(idleSeconds: number | null, timeoutSeconds: number): boolean {
  if (timeoutSeconds < 0 || idleSeconds === null) {
    return false;
  }
  return idleSeconds >= timeoutSeconds;
}

/**
 * Tracks user activity and re-locks the app and its databases after inactivity.
 *
 * While the app is active, two idle timers run: one for the app lock and one
 * for closing open databases. Each user interaction should call `restart()`.
 * When the app comes back from background, the time spent away counts as idle.
 */
export class Watchdog {
  public delegate?: WatchdogDelegate;

  private _isAppLocked = false;
  private isFirstActivation = true;
  private lastActiveTime: number | null = null;
  private appLockTimer: TimerHandle | null = null;
  private databaseLockTimer: TimerHandle | null = null;

  /**
   * Creates a new watchdog.
   * @param settings - Source of the lock timeouts and the app lock switch.
   */
  public constructor(private readonly settings: Settings) {}

  public get isAppLocked(): boolean {
    return this._isAppLocked;
  }

  public get isAppLockEnabled(): boolean {
    return this.settings.isAppLockEnabled;
  }

  /**
   * The app has come to the foreground.
   */
  public didBecomeActive(): void {
    if (this.delegate?.isAppCoverVisible) {
      this.delegate.hideAppCover(this);
    }

    const idleSeconds = this.lastActiveTime === null
      ? null
      : (Date.now() - this.lastActiveTime) / 1000;
    this.lastActiveTime = null;

    const isFirstActivation = this.isFirstActivation;
    this.isFirstActivation = false;

    if (isTimeoutExpired(idleSeconds, this.settings.databaseLockTimeout)) {
      console.info('[WATCHDOG] Database timeout expired while in background');
      this.delegate?.mustCloseDatabase(this, false);
    }

    if (this._isAppLocked) {
      this.showAppLock();
      return;
    }

    const shouldLock = this.isAppLockEnabled
      && (isFirstActivation || isTimeoutExpired(idleSeconds, this.settings.appLockTimeout));
    if (shouldLock) {
      this.lockApp();
      return;
    }
    this.restart();
  }

  /**
   * The app is going to the background.
   */
  public willResignActive(): void {
    if (this.delegate && !this.delegate.isAppCoverVisible) {
      this.delegate.showAppCover(this);
    }
    this.lastActiveTime = Date.now();
    this.stop();
  }

  /**
   * Restart the idle countdown. Does nothing while the app is locked.
   */
  public restart(): void {
    this.stop();
    if (this._isAppLocked) {
      return;
    }

    const appLockTimeout = this.settings.appLockTimeout;
    if (this.isAppLockEnabled && appLockTimeout > 0) {
      this.appLockTimer = setTimeout(() => {
        this.appLockTimer = null;
        console.info('[WATCHDOG] App lock timeout expired');
        this.lockApp();
      }, appLockTimeout * 1000);
    }

    const databaseLockTimeout = this.settings.databaseLockTimeout;
    if (databaseLockTimeout > 0) {
      this.databaseLockTimer = setTimeout(() => {
        this.databaseLockTimer = null;
        console.info('[WATCHDOG] Database timeout expired');
        this.delegate?.mustCloseDatabase(this, true);
      }, databaseLockTimeout * 1000);
    }
  }

  /**
   * The user has proven their identity; lift the app lock.
   */
  public unlockApp(): void {
    if (!this._isAppLocked) {
      return;
    }
    this._isAppLocked = false;
    this.delegate?.hideAppLock(this);
    this.restart();
  }

  /**
   * Stop both idle timers.
   */
  public stop(): void {
    if (this.appLockTimer) {
      clearTimeout(this.appLockTimer);
      this.appLockTimer = null;
    }
    if (this.databaseLockTimer) {
      clearTimeout(this.databaseLockTimer);
      this.databaseLockTimer = null;
    }
  }

  private lockApp(): void {
    this._isAppLocked = true;
    this.stop();
    this.showAppLock();
  }

  private showAppLock(): void {
    if (this.delegate && !this.delegate.isAppLockVisible) {
      this.delegate.showAppLock(this);
    }
  }
}
