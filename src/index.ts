import type { EntityHostRegistrar } from './host/media-player.js';
import { HomeKitTelevisionPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

/**
 * Host entry point.
 * Registers the HomeKitTelevisionPlatform with the host under PLATFORM_NAME.
 */
export default (api: EntityHostRegistrar) => {
	api.registerPlatform(PLATFORM_NAME, HomeKitTelevisionPlatform);
};

export { HomeKitTelevisionPlatform, parsePlatformConfig } from './platform.js';
export type { HomeKitTelevisionConfig, HomeKitPairingData, HapClientFactory } from './platform.js';
export { HomeKitConnection } from './homekit/connection.js';
export type { HapClient, ServiceListener } from './homekit/connection.js';
export {
	HomeKitTelevision,
	negotiateTelevisionCapabilities,
	registerTelevisionServices,
} from './homekit/television.js';
export type { TelevisionCapabilities } from './homekit/television.js';
export { SourceNotFoundError } from './homekit/errors.js';
export * from './host/media-player.js';
