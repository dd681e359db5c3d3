// src/homekit/television.ts
import {
	DEVICE_CLASS_TV,
	MediaPlayerFeature,
	MediaPlayerState,
	type AddEntitiesCallback,
	type MediaPlayerEntity,
} from '../host/media-player.js';
import {
	CharacteristicsTypes,
	CurrentMediaStateValues,
	RemoteKeyValues,
	ServicesTypes,
	TargetMediaStateValues,
	clampEnumToChar,
} from './characteristics.js';
import type { HomeKitConnection } from './connection.js';
import type { HomeKitService } from './entity-map.js';
import { SourceNotFoundError } from './errors.js';
import { HomeKitEntity, type HomeKitEntityInfo } from './homekit-entity.js';
import type { HomeKitLogger } from './logger.js';

const HK_TO_HOST_STATE = new Map<number, MediaPlayerState>([
	[CurrentMediaStateValues.PLAYING, MediaPlayerState.PLAYING],
	[CurrentMediaStateValues.PAUSED, MediaPlayerState.PAUSED],
	[CurrentMediaStateValues.STOPPED, MediaPlayerState.IDLE],
]);

/**
 * What a television service lets us do, fixed at setup time.
 */
export interface TelevisionCapabilities {
	readonly features: number;
	readonly targetMediaStates: ReadonlySet<number>;
	readonly remoteKeys: ReadonlySet<number>;
}

const NO_CAPABILITIES: TelevisionCapabilities = Object.freeze({
	features: 0,
	targetMediaStates: new Set<number>(),
	remoteKeys: new Set<number>(),
});

export function negotiateTelevisionCapabilities(service: HomeKitService): TelevisionCapabilities {
	let features = 0;
	let targetMediaStates = new Set<number>();
	let remoteKeys = new Set<number>();

	if (service.has(CharacteristicsTypes.ACTIVE_IDENTIFIER)) {
		features |= MediaPlayerFeature.SELECT_SOURCE;
	}

	const targetMediaState = service.get(CharacteristicsTypes.TARGET_MEDIA_STATE);
	if (targetMediaState) {
		targetMediaStates = clampEnumToChar(TargetMediaStateValues, targetMediaState);

		if (targetMediaStates.has(TargetMediaStateValues.PAUSE)) {
			features |= MediaPlayerFeature.PAUSE;
		}
		if (targetMediaStates.has(TargetMediaStateValues.PLAY)) {
			features |= MediaPlayerFeature.PLAY;
		}
		if (targetMediaStates.has(TargetMediaStateValues.STOP)) {
			features |= MediaPlayerFeature.STOP;
		}
	}

	const remoteKey = service.get(CharacteristicsTypes.REMOTE_KEY);
	if (remoteKey) {
		remoteKeys = clampEnumToChar(RemoteKeyValues, remoteKey);

		// One toggle key drives both directions
		if (remoteKeys.has(RemoteKeyValues.PLAY_PAUSE)) {
			features |= MediaPlayerFeature.PAUSE | MediaPlayerFeature.PLAY;
		}
	}

	return Object.freeze({ features, targetMediaStates, remoteKeys });
}

/**
 * Media-player entity for a HomeKit television service.
 */
export class HomeKitTelevision extends HomeKitEntity implements MediaPlayerEntity {
	public readonly deviceClass = DEVICE_CLASS_TV;
	private negotiated: TelevisionCapabilities = NO_CAPABILITIES;

	constructor(connection: HomeKitConnection, info: HomeKitEntityInfo, log: HomeKitLogger) {
		super(connection, info, log);
		this.setup();
	}

	public getCharacteristicTypes(): string[] {
		return [
			CharacteristicsTypes.ACTIVE,
			CharacteristicsTypes.CURRENT_MEDIA_STATE,
			CharacteristicsTypes.TARGET_MEDIA_STATE,
			CharacteristicsTypes.REMOTE_KEY,
			CharacteristicsTypes.ACTIVE_IDENTIFIER,
			// On the linked input source services
			CharacteristicsTypes.CONFIGURED_NAME,
			CharacteristicsTypes.IDENTIFIER,
		];
	}

	protected setupCharacteristics(service: HomeKitService): void {
		this.negotiated = negotiateTelevisionCapabilities(service);

		this.log.debug(
			'HomeKit: %s features=%d targetMediaStates=%o remoteKeys=%o',
			this.uniqueId,
			this.negotiated.features,
			[...this.negotiated.targetMediaStates],
			[...this.negotiated.remoteKeys],
		);
	}

	public get capabilities(): TelevisionCapabilities {
		return this.negotiated;
	}

	public get supportedFeatures(): number {
		return this.negotiated.features;
	}

	public get state(): MediaPlayerState {
		const service = this.service;
		if (!service || !service.value(CharacteristicsTypes.ACTIVE)) {
			return MediaPlayerState.PROBLEM;
		}

		const homekitState = service.value(CharacteristicsTypes.CURRENT_MEDIA_STATE);
		if (homekitState !== undefined) {
			const mapped = typeof homekitState === 'number' ? HK_TO_HOST_STATE.get(homekitState) : undefined;
			return mapped ?? MediaPlayerState.OK;
		}

		return MediaPlayerState.OK;
	}

	/**
	 * Configured names of the input sources linked to this television, in
	 * the order the accessory lists them.
	 */
	public get sourceList(): string[] {
		const tv = this.service;
		const accessory = this.accessory;
		if (!tv || !accessory) {
			return [];
		}

		return accessory.services
			.filter({ serviceType: ServicesTypes.INPUT_SOURCE, parentService: tv })
			.map(input => String(input.value(CharacteristicsTypes.CONFIGURED_NAME) ?? ''));
	}

	public get source(): string | undefined {
		const tv = this.service;
		const activeIdentifier = tv?.value(CharacteristicsTypes.ACTIVE_IDENTIFIER);
		if (!tv || !activeIdentifier) {
			return undefined;
		}

		const input = this.accessory?.services.first({
			serviceType: ServicesTypes.INPUT_SOURCE,
			parentService: tv,
			characteristics: { [CharacteristicsTypes.IDENTIFIER]: activeIdentifier },
		});

		if (!input) {
			// Sub-service enumeration can lag behind the active identifier
			this.log.debug(
				'HomeKit: %s active identifier %s matches no input source',
				this.uniqueId,
				String(activeIdentifier),
			);
			return undefined;
		}

		const name = input.value(CharacteristicsTypes.CONFIGURED_NAME);
		return name === undefined ? undefined : String(name);
	}

	public async mediaPlay(): Promise<void> {
		if (this.state === MediaPlayerState.PLAYING) {
			this.log.debug('HomeKit: cannot play %s while already playing', this.uniqueId);
			return;
		}

		if (this.negotiated.targetMediaStates.has(TargetMediaStateValues.PLAY)) {
			await this.putCharacteristics({
				[CharacteristicsTypes.TARGET_MEDIA_STATE]: TargetMediaStateValues.PLAY,
			});
		} else if (this.negotiated.remoteKeys.has(RemoteKeyValues.PLAY_PAUSE)) {
			await this.putCharacteristics({
				[CharacteristicsTypes.REMOTE_KEY]: RemoteKeyValues.PLAY_PAUSE,
			});
		} else {
			this.log.debug('HomeKit: %s has no way to play; ignoring', this.uniqueId);
		}
	}

	public async mediaPause(): Promise<void> {
		if (this.state === MediaPlayerState.PAUSED) {
			this.log.debug('HomeKit: cannot pause %s while already paused', this.uniqueId);
			return;
		}

		if (this.negotiated.targetMediaStates.has(TargetMediaStateValues.PAUSE)) {
			await this.putCharacteristics({
				[CharacteristicsTypes.TARGET_MEDIA_STATE]: TargetMediaStateValues.PAUSE,
			});
		} else if (this.negotiated.remoteKeys.has(RemoteKeyValues.PLAY_PAUSE)) {
			await this.putCharacteristics({
				[CharacteristicsTypes.REMOTE_KEY]: RemoteKeyValues.PLAY_PAUSE,
			});
		} else {
			this.log.debug('HomeKit: %s has no way to pause; ignoring', this.uniqueId);
		}
	}

	public async mediaStop(): Promise<void> {
		if (this.state === MediaPlayerState.IDLE) {
			this.log.debug('HomeKit: cannot stop %s when already idle', this.uniqueId);
			return;
		}

		if (this.negotiated.targetMediaStates.has(TargetMediaStateValues.STOP)) {
			await this.putCharacteristics({
				[CharacteristicsTypes.TARGET_MEDIA_STATE]: TargetMediaStateValues.STOP,
			});
		} else {
			this.log.debug('HomeKit: %s has no way to stop; ignoring', this.uniqueId);
		}
	}

	public async selectSource(source: string): Promise<void> {
		const tv = this.service;
		const input = tv
			? this.accessory?.services.first({
				serviceType: ServicesTypes.INPUT_SOURCE,
				parentService: tv,
				characteristics: { [CharacteristicsTypes.CONFIGURED_NAME]: source },
			})
			: undefined;

		if (!input) {
			throw new SourceNotFoundError(source);
		}

		const identifier = input.value(CharacteristicsTypes.IDENTIFIER);
		if (identifier === undefined) {
			throw new Error(`HomeKit: source ${source} has no identifier`);
		}

		await this.putCharacteristics({ [CharacteristicsTypes.ACTIVE_IDENTIFIER]: identifier });
	}
}

/**
 * Registration callback: one HomeKitTelevision per television service.
 */
export function registerTelevisionServices(
	connection: HomeKitConnection,
	addEntities: AddEntitiesCallback,
	log: HomeKitLogger,
): void {
	connection.addListener((aid, service) => {
		if (service.type !== ServicesTypes.TELEVISION) {
			return false;
		}

		log.info(
			'HomeKit: adding television %d.%d from %s',
			aid,
			service.iid,
			connection.pairingId,
		);
		addEntities([new HomeKitTelevision(connection, { aid, iid: service.iid }, log)]);
		return true;
	});
}
