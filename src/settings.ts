// src/settings.ts

/**
 * Platform name the host matches against the `platform` key of the config block.
 */
export const PLATFORM_NAME = 'HomeKitTelevision';

/**
 * npm package name; also the prefix of the default console logger.
 */
export const PLUGIN_NAME = 'homekit-controller-tv';

export const DEFAULT_POLL_INTERVAL_SECONDS = 60;
export const MIN_POLL_INTERVAL_SECONDS = 5;
