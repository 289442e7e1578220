/**
 * Facts about the process the screens run in.
 */
export interface PlatformInfo {
  /**
   * True when running as an iPad app on a Mac, where files are revealed in Finder instead of exported.
   */
  isRunningOnMac: boolean;

  /**
   * True in the main app, false in app extensions such as AutoFill.
   */
  isMainApp: boolean;
}

export const DEFAULT_PLATFORM: PlatformInfo = {
  isRunningOnMac: false,
  isMainApp: true,
};
