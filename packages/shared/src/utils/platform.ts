/**
 * Platform detection and OS-specific keyboard conventions
 */

import * as os from "os";
import keyboardLayouts from "../config/keyboard-layouts.json";

export enum Platform {
  WINDOWS = "windows",
  LINUX = "linux",
  MACOS = "darwin",
  UNKNOWN = "unknown",
}

export interface Shortcut {
  description: string;
  key: string;
  modifiers: string[];
}

export interface KeyboardInfo {
  primaryModifier: string;
  secondaryModifier: string;
  appLauncher: {
    name: string;
    openMethod: string;
    key: string;
    modifiers: string[];
  };
  shortcuts: Record<string, Shortcut>;
}

/**
 * Detect the current operating system platform
 */
export function getPlatform(): Platform {
  const platform = os.platform();
  switch (platform) {
    case "win32":
      return Platform.WINDOWS;
    case "linux":
      return Platform.LINUX;
    case "darwin":
      return Platform.MACOS;
    default:
      return Platform.UNKNOWN;
  }
}

export function isWindows(platform: Platform = getPlatform()): boolean {
  return platform === Platform.WINDOWS;
}

export function isLinux(platform: Platform = getPlatform()): boolean {
  return platform === Platform.LINUX;
}

export function isMacOS(platform: Platform = getPlatform()): boolean {
  return platform === Platform.MACOS;
}

/**
 * Short platform identifier used in prompts: macos, windows or linux.
 */
export function getPlatformName(platform: Platform = getPlatform()): string {
  switch (platform) {
    case Platform.MACOS:
      return "macos";
    case Platform.WINDOWS:
      return "windows";
    case Platform.LINUX:
      return "linux";
    default:
      return os.platform();
  }
}

export function getPlatformDisplayName(
  platform: Platform = getPlatform(),
): string {
  switch (platform) {
    case Platform.MACOS:
      return "macOS";
    case Platform.WINDOWS:
      return "Windows";
    case Platform.LINUX:
      return "Linux";
    default:
      return os.platform();
  }
}

/**
 * Keyboard conventions for a platform. Anything that is not macOS or
 * Windows gets the Linux table.
 */
export function getKeyboardInfo(
  platform: Platform = getPlatform(),
): KeyboardInfo {
  switch (platform) {
    case Platform.MACOS:
      return keyboardLayouts.darwin;
    case Platform.WINDOWS:
      return keyboardLayouts.windows;
    default:
      return keyboardLayouts.linux;
  }
}

export function formatShortcut(key: string, modifiers: string[]): string {
  if (modifiers.length === 0) {
    return key;
  }
  return `${modifiers.join("+")}+${key}`;
}

/**
 * Get platform information for logging/debugging
 */
export function getPlatformInfo(): {
  platform: Platform;
  arch: string;
  release: string;
  hostname: string;
} {
  return {
    platform: getPlatform(),
    arch: os.arch(),
    release: os.release(),
    hostname: os.hostname(),
  };
}

/**
 * Log platform information on startup
 */
export function logPlatformInfo(logger: {
  log: (message: string) => void;
}): void {
  const info = getPlatformInfo();
  logger.log(`Platform: ${info.platform} (${info.arch})`);
  logger.log(`OS Release: ${info.release}`);
  logger.log(`Hostname: ${info.hostname}`);
}
