import type { SettingsKey } from '@/utils/Settings';

type SettingsListener = (key: SettingsKey) => void;

/**
 * Anything that reacts to settings changes.
 */
export interface SettingsObserver {
  settingsDidChange(key: SettingsKey): void;
}

/**
 * Event emitter for settings changes, so that screens can refresh
 * without holding a reference to whoever changed the setting.
 */
export class SettingsEventEmitter {
  private listeners: Set<SettingsListener> = new Set();

  /**
   * Subscribe to settings changes.
   * Returns an unsubscribe function.
   */
  public subscribe(listener: SettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Emit a settings change to all listeners.
   *
   * @param key - The key of the setting that changed.
   */
  public emit(key: SettingsKey): void {
    this.listeners.forEach(listener => {
      try {
        listener(key);
      } catch (error) {
        console.error('[SETTINGS] Error in settings listener:', error);
      }
    });
  }

  /**
   * Number of active subscriptions.
   */
  public get listenerCount(): number {
    return this.listeners.size;
  }
}

/**
 * Binds an observer to the settings emitter for the time a screen is visible.
 */
export class SettingsNotifications {
  private unsubscribe: (() => void) | null = null;

  /**
   * Creates a new instance of SettingsNotifications.
   * @param emitter - The emitter to listen on.
   * @param observer - The observer to forward changes to.
   */
  public constructor(
    private readonly emitter: SettingsEventEmitter,
    private readonly observer: SettingsObserver,
  ) {}

  public get isObserving(): boolean {
    return this.unsubscribe !== null;
  }

  /**
   * Start forwarding changes. Calling it twice keeps a single subscription.
   */
  public startObserving(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.emitter.subscribe(key => this.observer.settingsDidChange(key));
  }

  /**
   * Stop forwarding changes.
   */
  public stopObserving(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}
