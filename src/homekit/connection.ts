// src/homekit/connection.ts
// One paired accessory (or bridge) and its accessory database.
//
// The HAP transport itself (pair-verify, encrypted HTTP, event stream) is
// hap-controller's HttpClient; this class keeps the entity map current,
// hands services to registration listeners and turns writes into requests.
import type { CharacteristicValue } from 'homebridge';
import hapNodeJs from 'hap-nodejs';

import {
	EntityMap,
	toCharacteristicValue,
	type CharacteristicUpdate,
	type HomeKitService,
} from './entity-map.js';
import { createConsoleLogger, describeError, type HomeKitLogger } from './logger.js';

const { HapStatusError } = hapNodeJs;

/**
 * The part of hap-controller's HttpClient the connection drives.
 * Characteristic ids are "<aid>.<iid>" strings.
 */
export interface HapClient {
	getAccessories(): Promise<unknown>;
	getCharacteristics(characteristics: string[]): Promise<unknown>;
	setCharacteristics(characteristics: Record<string, CharacteristicValue>): Promise<unknown>;
	subscribeCharacteristics(characteristics: string[]): Promise<unknown>;
	unsubscribeCharacteristics(characteristics: string[]): Promise<unknown>;
	on(event: 'event' | 'event-disconnect', listener: (payload: unknown) => void): unknown;
}

/**
 * Offered every service of the accessory database once. Returning true
 * claims the service; it is not offered again.
 */
export type ServiceListener = (aid: number, service: HomeKitService) => boolean;

export interface CharacteristicWrite {
	iid: number;
	value: CharacteristicValue;
}

type UpdateListener = (aids: ReadonlySet<number>) => void;

interface CharacteristicStatus {
	aid: number;
	iid: number;
	status: number;
}

function characteristicId(aid: number, iid: number): string {
	return `${aid}.${iid}`;
}

function responseEntries(response: unknown): Record<string, unknown>[] {
	if (typeof response !== 'object' || response === null || !('characteristics' in response)) {
		return [];
	}
	const list = response.characteristics;
	if (!Array.isArray(list)) {
		return [];
	}
	return list.filter(
		(entry): entry is Record<string, unknown> => typeof entry === 'object' && entry !== null,
	);
}

function parseStatuses(response: unknown): CharacteristicStatus[] {
	const statuses: CharacteristicStatus[] = [];
	for (const entry of responseEntries(response)) {
		if (
			typeof entry.aid === 'number' &&
			typeof entry.iid === 'number' &&
			typeof entry.status === 'number'
		) {
			statuses.push({ aid: entry.aid, iid: entry.iid, status: entry.status });
		}
	}
	return statuses;
}

function parseValues(response: unknown): CharacteristicUpdate[] {
	const updates: CharacteristicUpdate[] = [];
	for (const entry of responseEntries(response)) {
		if (typeof entry.aid !== 'number' || typeof entry.iid !== 'number' || !('value' in entry)) {
			continue;
		}
		if (typeof entry.status === 'number' && entry.status !== 0) {
			continue;
		}
		updates.push({ aid: entry.aid, iid: entry.iid, value: toCharacteristicValue(entry.value) });
	}
	return updates;
}

export class HomeKitConnection {
	private readonly log: HomeKitLogger;
	private entityMap: EntityMap | null = null;
	private isAvailable = false;

	private readonly serviceListeners: ServiceListener[] = [];
	private readonly claimedServices = new Set<string>();
	private readonly updateListeners = new Set<UpdateListener>();
	private readonly definitionListeners = new Set<() => void>();

	// "<aid>.<iid>" of every characteristic some entity declared interest in
	private readonly watched = new Set<string>();
	private readonly subscribed = new Set<string>();
	private eventsBound = false;
	private eventsWanted = false;

	constructor(
		public readonly pairingId: string,
		private readonly client: HapClient,
		logger?: HomeKitLogger,
	) {
		this.log = logger ?? createConsoleLogger('connection');
	}

	public get available(): boolean {
		return this.isAvailable;
	}

	public get entities(): EntityMap | null {
		return this.entityMap;
	}

	public service(aid: number, iid: number): HomeKitService | undefined {
		return this.entityMap?.aid(aid)?.services.iid(iid);
	}

	/**
	 * Fetch the accessory database, replace the entity map and offer any
	 * service not yet claimed to the registered listeners.
	 */
	public async loadAccessories(): Promise<void> {
		const raw = await this.client.getAccessories();
		const entityMap = EntityMap.parse(raw);

		this.entityMap = entityMap;
		this.isAvailable = true;

		this.log.info(
			'HomeKit: accessory database loaded for %s; accessory count=%d',
			this.pairingId,
			entityMap.accessories.length,
		);

		for (const listener of [...this.definitionListeners]) {
			listener();
		}

		for (const listener of this.serviceListeners) {
			this.dispatchServices(listener);
		}
	}

	public addListener(listener: ServiceListener): void {
		this.serviceListeners.push(listener);
		this.dispatchServices(listener);
	}

	/**
	 * Called after every accessory database (re)load.
	 */
	public onDefinitionsChanged(listener: () => void): () => void {
		this.definitionListeners.add(listener);
		return () => {
			this.definitionListeners.delete(listener);
		};
	}

	/**
	 * Called with the aids whose characteristics changed. Availability
	 * changes report every known aid.
	 */
	public onUpdate(listener: UpdateListener): () => void {
		this.updateListeners.add(listener);
		return () => {
			this.updateListeners.delete(listener);
		};
	}

	public watchCharacteristics(aid: number, iids: Iterable<number>): void {
		for (const iid of iids) {
			this.watched.add(characteristicId(aid, iid));
		}
	}

	/**
	 * Write characteristics of one accessory in a single request.
	 *
	 * A non-zero per-characteristic status rejects with a HapStatusError; a
	 * failing request rejects with whatever the client threw. Accepted values
	 * are applied to the entity map straight away.
	 */
	public async putCharacteristics(aid: number, writes: readonly CharacteristicWrite[]): Promise<void> {
		if (!writes.length) {
			return;
		}

		const payload: Record<string, CharacteristicValue> = {};
		for (const write of writes) {
			payload[characteristicId(aid, write.iid)] = write.value;
		}

		this.log.debug('HomeKit: put characteristics %o on %s', payload, this.pairingId);

		const response = await this.client.setCharacteristics(payload);

		const failure = parseStatuses(response).find(entry => entry.status !== 0);
		if (failure) {
			this.log.warn(
				'HomeKit: write of %s rejected by %s with status %d',
				characteristicId(failure.aid, failure.iid),
				this.pairingId,
				failure.status,
			);
			throw new HapStatusError(failure.status);
		}

		if (this.entityMap) {
			this.notifyUpdates(
				this.entityMap.process(writes.map(write => ({ aid, iid: write.iid, value: write.value }))),
			);
		}
	}

	/**
	 * Read every watched, readable characteristic. Never throws: a failed
	 * poll marks the connection unavailable until the next good one.
	 */
	public async poll(): Promise<void> {
		const entityMap = this.entityMap;
		if (!entityMap) {
			return;
		}

		const ids = this.watchedIds(entityMap, 'pr');
		if (!ids.length) {
			return;
		}

		let response: unknown;
		try {
			response = await this.client.getCharacteristics(ids);
		} catch (err) {
			this.log.warn('HomeKit: poll of %s failed: %s', this.pairingId, describeError(err));
			this.setAvailable(false);
			return;
		}

		this.setAvailable(true);
		this.notifyUpdates(entityMap.process(parseValues(response)));
	}

	/**
	 * Subscribe to events of watched characteristics that support them.
	 */
	public async subscribe(): Promise<void> {
		const entityMap = this.entityMap;
		if (!entityMap) {
			return;
		}

		this.eventsWanted = true;
		if (!this.eventsBound) {
			this.client.on('event', event => this.handleEvent(event));
			this.client.on('event-disconnect', () => this.handleEventDisconnect());
			this.eventsBound = true;
		}

		const ids = this.watchedIds(entityMap, 'ev').filter(id => !this.subscribed.has(id));
		if (!ids.length) {
			return;
		}

		await this.client.subscribeCharacteristics(ids);
		for (const id of ids) {
			this.subscribed.add(id);
		}

		this.log.debug('HomeKit: subscribed to %d characteristics on %s', ids.length, this.pairingId);
	}

	public async unsubscribe(): Promise<void> {
		this.eventsWanted = false;
		const ids = [...this.subscribed];
		if (!ids.length) {
			return;
		}

		this.subscribed.clear();
		await this.client.unsubscribeCharacteristics(ids);
	}

	private handleEvent(event: unknown): void {
		if (!this.entityMap) {
			return;
		}
		this.notifyUpdates(this.entityMap.process(parseValues(event)));
	}

	// The accessory closed the event connection; its subscriptions are gone
	private handleEventDisconnect(): void {
		this.subscribed.clear();
		if (!this.eventsWanted) {
			return;
		}

		this.log.warn('HomeKit: event connection to %s dropped; subscribing again', this.pairingId);
		void this.resubscribe();
	}

	private async resubscribe(): Promise<void> {
		try {
			await this.subscribe();
		} catch (err) {
			this.log.warn('HomeKit: resubscribe on %s failed: %s', this.pairingId, describeError(err));
		}
	}

	private dispatchServices(listener: ServiceListener): void {
		if (!this.entityMap) {
			return;
		}

		for (const accessory of this.entityMap.accessories) {
			for (const service of accessory.services) {
				const key = characteristicId(accessory.aid, service.iid);
				if (this.claimedServices.has(key)) {
					continue;
				}
				if (listener(accessory.aid, service)) {
					this.claimedServices.add(key);
				}
			}
		}
	}

	private watchedIds(entityMap: EntityMap, perm: string): string[] {
		const ids: string[] = [];
		for (const accessory of entityMap.accessories) {
			for (const char of accessory.characteristics()) {
				const id = characteristicId(char.aid, char.iid);
				if (this.watched.has(id) && char.perms.includes(perm)) {
					ids.push(id);
				}
			}
		}
		return ids;
	}

	private setAvailable(available: boolean): void {
		if (this.isAvailable === available) {
			return;
		}
		this.isAvailable = available;

		this.log.info('HomeKit: %s is now %s', this.pairingId, available ? 'available' : 'unavailable');

		const aids = new Set(this.entityMap?.accessories.map(accessory => accessory.aid) ?? []);
		this.emit(aids);
	}

	private notifyUpdates(applied: readonly CharacteristicUpdate[]): void {
		if (!applied.length) {
			return;
		}
		this.emit(new Set(applied.map(update => update.aid)));
	}

	private emit(aids: ReadonlySet<number>): void {
		for (const listener of [...this.updateListeners]) {
			try {
				listener(aids);
			} catch (err) {
				this.log.warn('HomeKit: update listener on %s failed: %s', this.pairingId, describeError(err));
			}
		}
	}
}
