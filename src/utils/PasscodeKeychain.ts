import * as argon2 from 'argon2';

import type { KeyValueStorage } from '@/utils/MemoryStorage';
import { AppErrorCode } from '@/utils/types/errors/AppErrorCodes';
import { KeychainError } from '@/utils/types/errors/KeychainError';

/**
 * Keychain - holds the app passcode and gates biometric unlock.
 *
 * The passcode is never stored; only its Argon2id hash is. Biometric unlock
 * is "prepared" after the first successful passcode entry, so a newly enrolled
 * fingerprint cannot be used before the passcode has been entered once.
 */
export interface Keychain {
  isAppPasscodeMatch(passcode: string): Promise<boolean>;
  isBiometricAuthPrepared(): boolean;
  prepareBiometricAuth(enabled: boolean): void;
  performBiometricAuth(): Promise<boolean>;
  isBiometricsAvailable(): boolean;
}

/**
 * Platform biometric prompt (Face ID, Touch ID, fingerprint).
 */
export interface BiometricAuthenticator {
  isAvailable(): boolean;

  /**
   * Show the system prompt. Resolves true when the user was recognized.
   */
  authenticate(): Promise<boolean>;
}

/**
 * Cost parameters of the passcode hash.
 */
export interface PasscodeHashOptions {
  memoryCost?: number;
  timeCost?: number;
  parallelism?: number;
}

const APP_PASSCODE_HASH_KEY = 'keychain:vault_autofill_app_passcode_hash';
const BIOMETRIC_PREPARED_KEY = 'keychain:vault_autofill_biometric_prepared';

/*
 * Memory: 65536 KiB (64 MB), iterations: 3, parallelism: 1.
 * Passcodes are short, so the hash has to be expensive.
 */
const DEFAULT_HASH_OPTIONS: Required<PasscodeHashOptions> = {
  memoryCost: 65536,
  timeCost: 3,
  parallelism: 1,
};

/**
 * Keychain backed by a key/value storage and the platform biometric prompt.
 */
export class PasscodeKeychain implements Keychain {
  private readonly hashOptions: Required<PasscodeHashOptions>;

  /**
   * Creates a new keychain.
   * @param storage - Secure storage for the passcode hash and the biometric flag.
   * @param biometrics - The platform biometric prompt.
   * @param hashOptions - Argon2id cost parameters.
   */
  public constructor(
    private readonly storage: KeyValueStorage,
    private readonly biometrics: BiometricAuthenticator,
    hashOptions: PasscodeHashOptions = {},
  ) {
    this.hashOptions = { ...DEFAULT_HASH_OPTIONS, ...hashOptions };
  }

  /**
   * Set or replace the app passcode. Biometric unlock has to be prepared again afterwards.
   */
  public async setAppPasscode(passcode: string): Promise<void> {
    if (passcode.length === 0) {
      throw new KeychainError('Passcode must not be empty', AppErrorCode.PASSCODE_INVALID);
    }

    try {
      const hash = await argon2.hash(passcode, {
        type: argon2.argon2id,
        ...this.hashOptions,
      });
      this.storage.setItem(APP_PASSCODE_HASH_KEY, hash);
      this.storage.removeItem(BIOMETRIC_PREPARED_KEY);
    } catch (error: unknown) {
      if (error instanceof Error) {
        throw new KeychainError(`Failed to store passcode: ${error.message}`, AppErrorCode.KEYCHAIN_WRITE_FAILED);
      }
      throw new KeychainError('Failed to store passcode', AppErrorCode.KEYCHAIN_WRITE_FAILED);
    }
  }

  public removeAppPasscode(): void {
    this.storage.removeItem(APP_PASSCODE_HASH_KEY);
    this.storage.removeItem(BIOMETRIC_PREPARED_KEY);
  }

  public isAppPasscodeSet(): boolean {
    return typeof this.storage.getItem(APP_PASSCODE_HASH_KEY) === 'string';
  }

  /**
   * Check a passcode against the stored hash.
   * @throws KeychainError when no passcode is set or the hash cannot be verified.
   */
  public async isAppPasscodeMatch(passcode: string): Promise<boolean> {
    const hash = this.storage.getItem(APP_PASSCODE_HASH_KEY);
    if (typeof hash !== 'string') {
      throw new KeychainError('App passcode is not set', AppErrorCode.PASSCODE_NOT_SET);
    }

    try {
      return await argon2.verify(hash, passcode);
    } catch (error) {
      console.error('[KEYCHAIN] Failed to verify passcode:', error);
      throw new KeychainError('Stored passcode hash is unreadable', AppErrorCode.KEYCHAIN_READ_FAILED);
    }
  }

  public isBiometricAuthPrepared(): boolean {
    return this.storage.getItem(BIOMETRIC_PREPARED_KEY) === true;
  }

  public prepareBiometricAuth(enabled: boolean): void {
    if (enabled) {
      this.storage.setItem(BIOMETRIC_PREPARED_KEY, true);
    } else {
      this.storage.removeItem(BIOMETRIC_PREPARED_KEY);
    }
  }

  /**
   * Show the biometric prompt. Resolves false without prompting when biometric unlock is not prepared.
   */
  public async performBiometricAuth(): Promise<boolean> {
    if (!this.isBiometricAuthPrepared()) {
      return false;
    }

    try {
      return await this.biometrics.authenticate();
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new KeychainError(`Biometric authentication failed: ${reason}`, AppErrorCode.BIOMETRIC_AUTH_FAILED);
    }
  }

  public isBiometricsAvailable(): boolean {
    return this.biometrics.isAvailable();
  }
}
