import type { DatabasePicker } from '@/database/DatabasePicker';
import type { PopoverAnchor, SheetAction } from '@/database/types';

/**
 * Receives the buttons of the first-setup (onboarding) screen.
 */
export interface FirstSetupDelegate {
  didPressCancel(): void;
  didPressAddDatabase(anchor: PopoverAnchor): void;
  didPressSkip(): void;
}

/**
 * Receives the buttons of the crash report screen.
 */
export interface CrashReportDelegate {
  didPressDismiss(): void;
}

/**
 * Screens the coordinators in this package put on the navigation stack.
 */
export type Screen =
  | { kind: 'databasePicker'; picker: DatabasePicker }
  | { kind: 'addDatabaseOptions'; options: SheetAction[]; anchor: PopoverAnchor }
  | { kind: 'onboarding'; delegate: FirstSetupDelegate }
  | { kind: 'crashReport'; delegate: CrashReportDelegate };

/**
 * The navigation stack the host renders.
 */
export interface NavigationRouter {
  /**
   * Show a screen modally over the stack.
   */
  present(screen: Screen): void;

  /**
   * Push a screen; `onPop` runs when it leaves the stack.
   */
  push(screen: Screen, onPop?: () => void): void;

  /**
   * Pop the top screen. Resolves once the transition is over.
   */
  pop(): Promise<void>;

  popToRoot(): void;

  /**
   * Dismiss every modal screen.
   */
  dismissModals(): void;

  /**
   * Dismiss a specific screen, whether presented or pushed.
   */
  dismiss(screen: Screen): void;
}
