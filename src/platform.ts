// src/platform.ts
import type { PlatformConfig } from 'homebridge';
import hapController from 'hap-controller';

import {
	DEFAULT_POLL_INTERVAL_SECONDS,
	MIN_POLL_INTERVAL_SECONDS,
	PLATFORM_NAME,
} from './settings.js';
import type { EntityHostApi } from './host/media-player.js';
import { HomeKitConnection, type HapClient } from './homekit/connection.js';
import { describeError, toHomeKitLogger, type HomeKitLogger } from './homekit/logger.js';
import { registerTelevisionServices } from './homekit/television.js';

const { HttpClient } = hapController;

/**
 * Long-term keys exchanged during pairing, in the field names hap-controller uses.
 */
export interface HomeKitPairingData {
	AccessoryPairingID: string;
	AccessoryLTPK: string;
	iOSDevicePairingID: string;
	iOSDeviceLTSK: string;
	iOSDeviceLTPK: string;
}

export interface HomeKitTelevisionConfig {
	pairingId: string;
	address: string;
	port: number;
	pairingData: HomeKitPairingData;
	pollIntervalMs: number;
}

export type HapClientFactory = (config: HomeKitTelevisionConfig) => HapClient;

export const createHttpClient: HapClientFactory = (config) =>
	new HttpClient(config.pairingId, config.address, config.port, config.pairingData);

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, ...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = raw[key];
		if (typeof value === 'string' && value.trim() !== '') {
			return value.trim();
		}
	}
	return undefined;
}

function readPort(value: unknown): number | undefined {
	const port = typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value;
	if (typeof port === 'number' && Number.isInteger(port) && port > 0 && port <= 65535) {
		return port;
	}
	return undefined;
}

/**
 * Validate the platform block. Returns null (after logging what is wrong)
 * when the platform cannot run.
 */
export function parsePlatformConfig(config: PlatformConfig, log: HomeKitLogger): HomeKitTelevisionConfig | null {
	const raw: Record<string, unknown> = config;
	const pairing = isRecord(raw.pairingData) ? raw.pairingData : {};

	// Canonical key is pairingId; AccessoryPairingID is what pairing tools emit
	const pairingId =
		readString(raw, 'pairingId', 'AccessoryPairingID') ??
		readString(pairing, 'AccessoryPairingID');
	const address = readString(raw, 'address');
	const port = readPort(raw.port);
	const accessoryLtpk = readString(pairing, 'AccessoryLTPK');
	const devicePairingId = readString(pairing, 'iOSDevicePairingID');
	const deviceLtsk = readString(pairing, 'iOSDeviceLTSK');
	const deviceLtpk = readString(pairing, 'iOSDeviceLTPK');

	const missing: string[] = [];
	if (!pairingId) {
		missing.push('pairingId');
	}
	if (!address) {
		missing.push('address');
	}
	if (port === undefined) {
		missing.push('port');
	}
	if (!accessoryLtpk) {
		missing.push('pairingData.AccessoryLTPK');
	}
	if (!devicePairingId) {
		missing.push('pairingData.iOSDevicePairingID');
	}
	if (!deviceLtsk) {
		missing.push('pairingData.iOSDeviceLTSK');
	}
	if (!deviceLtpk) {
		missing.push('pairingData.iOSDeviceLTPK');
	}

	if (
		!pairingId || !address || port === undefined ||
		!accessoryLtpk || !devicePairingId || !deviceLtsk || !deviceLtpk
	) {
		log.error('HomeKit: invalid config; missing or malformed: %s. Platform disabled.', missing.join(', '));
		return null;
	}

	let pollInterval = DEFAULT_POLL_INTERVAL_SECONDS;
	if (typeof raw.pollInterval === 'number' && Number.isFinite(raw.pollInterval)) {
		pollInterval = raw.pollInterval;
	}
	if (pollInterval < MIN_POLL_INTERVAL_SECONDS) {
		log.warn(
			'HomeKit: pollInterval %d is below the minimum; using %d seconds',
			pollInterval,
			MIN_POLL_INTERVAL_SECONDS,
		);
		pollInterval = MIN_POLL_INTERVAL_SECONDS;
	}

	return {
		pairingId,
		address,
		port,
		pairingData: {
			AccessoryPairingID: pairingId,
			AccessoryLTPK: accessoryLtpk,
			iOSDevicePairingID: devicePairingId,
			iOSDeviceLTSK: deviceLtsk,
			iOSDeviceLTPK: deviceLtpk,
		},
		pollIntervalMs: pollInterval * 1000,
	};
}

export class HomeKitTelevisionPlatform {
	private readonly log: HomeKitLogger;
	private readonly settings: HomeKitTelevisionConfig | null;
	private readonly connection: HomeKitConnection | null = null;
	private pollTimer: NodeJS.Timeout | null = null;
	private stopped = false;

	// The host hands over its homebridge Logging; any four-level logger will do
	constructor(
		log: HomeKitLogger,
		private readonly config: PlatformConfig,
		private readonly api: EntityHostApi,
		clientFactory: HapClientFactory = createHttpClient,
	) {
		this.log = toHomeKitLogger(log);
		this.settings = parsePlatformConfig(this.config, this.log);

		if (this.settings) {
			this.connection = new HomeKitConnection(
				this.settings.pairingId,
				clientFactory(this.settings),
				this.log,
			);
		}

		this.log.info('%s initialized', this.config.name ?? PLATFORM_NAME);

		this.api.on('didFinishLaunching', () => {
			this.log.debug('%s didFinishLaunching', PLATFORM_NAME);
			void this.start();
		});
		this.api.on('shutdown', () => {
			void this.stop();
		});
	}

	/**
	 * Load the accessory database, add television entities, then keep values
	 * fresh through events and polling. Failures are logged, never thrown.
	 */
	public async start(): Promise<void> {
		const connection = this.connection;
		const settings = this.settings;
		if (!connection || !settings) {
			return;
		}

		try {
			await connection.loadAccessories();
		} catch (err) {
			this.log.error(
				'HomeKit: could not load accessories from %s (%s:%d): %s',
				settings.pairingId,
				settings.address,
				settings.port,
				describeError(err),
			);
			return;
		}

		// shutdown may have arrived while we were still starting
		if (this.stopped) {
			return;
		}

		registerTelevisionServices(
			connection,
			entities => this.api.addEntities(entities),
			this.log,
		);

		try {
			await connection.subscribe();
		} catch (err) {
			this.log.warn(
				'HomeKit: event subscription on %s failed; relying on polling: %s',
				settings.pairingId,
				describeError(err),
			);
		}

		// stop() ran while the subscription was in flight and found nothing to undo
		if (this.stopped) {
			await this.closeSubscriptions(connection);
			return;
		}
		this.startPolling(connection, settings.pollIntervalMs);
	}

	public async stop(): Promise<void> {
		this.stopped = true;
		if (this.pollTimer) {
			clearInterval(this.pollTimer);
			this.pollTimer = null;
		}

		if (!this.connection) {
			return;
		}
		await this.closeSubscriptions(this.connection);
	}

	private async closeSubscriptions(connection: HomeKitConnection): Promise<void> {
		try {
			await connection.unsubscribe();
		} catch (err) {
			this.log.warn(
				'HomeKit: unsubscribe on %s failed: %s',
				connection.pairingId,
				describeError(err),
			);
		}
	}

	private startPolling(connection: HomeKitConnection, intervalMs: number): void {
		if (this.pollTimer) {
			clearInterval(this.pollTimer);
		}

		this.pollTimer = setInterval(() => {
			void connection.poll();
		}, intervalMs);
	}
}
