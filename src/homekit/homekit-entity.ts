// src/homekit/homekit-entity.ts
import type { CharacteristicValue } from 'homebridge';

import type { DeviceInfo } from '../host/media-player.js';
import { CharacteristicsTypes, ServicesTypes } from './characteristics.js';
import type { CharacteristicWrite, HomeKitConnection } from './connection.js';
import type { HomeKitAccessory, HomeKitService } from './entity-map.js';
import type { HomeKitLogger } from './logger.js';

export interface HomeKitEntityInfo {
	aid: number;
	iid: number;
}

function stringValue(value: CharacteristicValue | undefined): string | undefined {
	if (typeof value === 'string' && value.trim().length > 0) {
		return value.trim();
	}
	return undefined;
}

/**
 * Shared part of every entity backed by one service of a paired accessory.
 *
 * The entity only remembers (aid, iid); the service itself is looked up in
 * the connection's current entity map on every read.
 */
export abstract class HomeKitEntity {
	public readonly aid: number;
	public readonly iid: number;

	constructor(
		protected readonly connection: HomeKitConnection,
		info: HomeKitEntityInfo,
		protected readonly log: HomeKitLogger,
	) {
		this.aid = info.aid;
		this.iid = info.iid;

		this.connection.onDefinitionsChanged(() => this.setup());
	}

	/**
	 * Characteristic kinds this entity reads. Kinds found on the entity's
	 * service or on services linked to it are polled and subscribed.
	 */
	public abstract getCharacteristicTypes(): string[];

	/**
	 * Derive capabilities from the service's characteristic metadata.
	 */
	protected abstract setupCharacteristics(service: HomeKitService): void;

	public get uniqueId(): string {
		return `homekit-${this.connection.pairingId}-${this.aid}-${this.iid}`;
	}

	public get name(): string {
		const info = this.accessoryInformation;
		return stringValue(info?.value(CharacteristicsTypes.NAME)) ?? `HomeKit ${this.aid}`;
	}

	public get available(): boolean {
		return this.connection.available && this.service !== undefined;
	}

	public get deviceInfo(): DeviceInfo {
		const info = this.accessoryInformation;
		return {
			manufacturer: stringValue(info?.value(CharacteristicsTypes.MANUFACTURER)),
			model: stringValue(info?.value(CharacteristicsTypes.MODEL)),
			serialNumber: stringValue(info?.value(CharacteristicsTypes.SERIAL_NUMBER)),
			firmwareRevision: stringValue(info?.value(CharacteristicsTypes.FIRMWARE_REVISION)),
		};
	}

	protected get accessory(): HomeKitAccessory | undefined {
		return this.connection.entities?.aid(this.aid);
	}

	protected get service(): HomeKitService | undefined {
		return this.connection.service(this.aid, this.iid);
	}

	private get accessoryInformation(): HomeKitService | undefined {
		return this.accessory?.services.first({ serviceType: ServicesTypes.ACCESSORY_INFORMATION });
	}

	/**
	 * Re-read the service: declare the characteristics to watch and rebuild
	 * capabilities. Runs again after every accessory database reload.
	 */
	public setup(): void {
		const accessory = this.accessory;
		const service = this.service;
		if (!accessory || !service) {
			this.log.warn('HomeKit: service %d.%d is gone; entity %s left as is', this.aid, this.iid, this.uniqueId);
			return;
		}

		const interesting = new Set(this.getCharacteristicTypes());
		const iids: number[] = [];
		const services = [service, ...accessory.services.filter({ parentService: service })];
		for (const candidate of services) {
			for (const char of candidate.characteristics) {
				if (interesting.has(char.type)) {
					iids.push(char.iid);
				}
			}
		}
		this.connection.watchCharacteristics(this.aid, iids);

		this.setupCharacteristics(service);
	}

	public onUpdate(listener: () => void): () => void {
		return this.connection.onUpdate(aids => {
			if (aids.has(this.aid)) {
				listener();
			}
		});
	}

	/**
	 * Write characteristics of this entity's service, keyed by kind.
	 */
	protected async putCharacteristics(values: Readonly<Record<string, CharacteristicValue>>): Promise<void> {
		const service = this.service;
		if (!service) {
			throw new Error(`HomeKit: service ${this.aid}.${this.iid} is no longer available`);
		}

		const writes: CharacteristicWrite[] = [];
		for (const [type, value] of Object.entries(values)) {
			const char = service.get(type);
			if (!char) {
				this.log.warn('HomeKit: %s has no characteristic %s; not writing it', this.uniqueId, type);
				continue;
			}
			writes.push({ iid: char.iid, value });
		}

		await this.connection.putCharacteristics(this.aid, writes);
	}
}
