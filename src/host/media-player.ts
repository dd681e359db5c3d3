// src/host/media-player.ts
import type { Logging, PlatformConfig } from 'homebridge';

/**
 * Media-player states the host renders.
 */
export const MediaPlayerState = {
	PLAYING: 'playing',
	PAUSED: 'paused',
	IDLE: 'idle',
	OK: 'ok',
	PROBLEM: 'problem',
} as const;

export type MediaPlayerState = typeof MediaPlayerState[keyof typeof MediaPlayerState];

/**
 * Supported-feature bits, using the host's bit values.
 */
export const MediaPlayerFeature = {
	PAUSE: 1,
	SELECT_SOURCE: 2048,
	STOP: 4096,
	PLAY: 16384,
} as const;

export const DEVICE_CLASS_TV = 'tv';

export type MediaPlayerDeviceClass = typeof DEVICE_CLASS_TV;

export interface DeviceInfo {
	manufacturer?: string;
	model?: string;
	serialNumber?: string;
	firmwareRevision?: string;
}

export interface MediaPlayerEntity {
	readonly uniqueId: string;
	readonly name: string;
	readonly available: boolean;
	readonly deviceClass: MediaPlayerDeviceClass;
	readonly supportedFeatures: number;
	readonly state: MediaPlayerState;
	readonly sourceList: string[];
	readonly source: string | undefined;
	readonly deviceInfo: DeviceInfo;

	mediaPlay(): Promise<void>;
	mediaPause(): Promise<void>;
	mediaStop(): Promise<void>;
	selectSource(source: string): Promise<void>;

	/**
	 * Called whenever a characteristic backing this entity changes.
	 * Returns a function that removes the listener.
	 */
	onUpdate(listener: () => void): () => void;
}

export type HostEvent = 'didFinishLaunching' | 'shutdown';

export type AddEntitiesCallback = (entities: MediaPlayerEntity[]) => void;

/**
 * What a platform instance gets from the host.
 */
export interface EntityHostApi {
	on(event: HostEvent, listener: () => void): void;
	addEntities: AddEntitiesCallback;
}

export interface EntityPlatformConstructor {
	new (log: Logging, config: PlatformConfig, api: EntityHostApi): object;
}

/**
 * What the module's entry point gets from the host.
 */
export interface EntityHostRegistrar {
	registerPlatform(platformName: string, constructor: EntityPlatformConstructor): void;
}
