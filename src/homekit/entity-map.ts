// src/homekit/entity-map.ts
// In-memory model of an accessory database as returned by GET /accessories.
import type { CharacteristicValue } from 'homebridge';

import { normalizeUuid, type EnumConstraints } from './characteristics.js';

export interface HomeKitCharacteristic extends EnumConstraints {
	readonly aid: number;
	readonly iid: number;
	/** Long-form, upper-case UUID */
	readonly type: string;
	readonly perms: readonly string[];
	readonly format?: string;
	value: CharacteristicValue | null;
}

export interface CharacteristicUpdate {
	aid: number;
	iid: number;
	value: CharacteristicValue | null;
}

export interface ServiceFilter {
	serviceType?: string;
	parentService?: HomeKitService;
	/** Every listed characteristic must be present and hold exactly this value */
	characteristics?: Readonly<Record<string, CharacteristicValue>>;
}

export class HomeKitService {
	private readonly byType = new Map<string, HomeKitCharacteristic>();

	constructor(
		public readonly aid: number,
		public readonly iid: number,
		public readonly type: string,
		public readonly linked: readonly number[],
		public readonly characteristics: readonly HomeKitCharacteristic[],
	) {
		for (const char of characteristics) {
			if (!this.byType.has(char.type)) {
				this.byType.set(char.type, char);
			}
		}
	}

	public get(type: string): HomeKitCharacteristic | undefined {
		return this.byType.get(type);
	}

	public has(type: string): boolean {
		return this.byType.has(type);
	}

	/**
	 * Current value of the characteristic, or undefined when the service does
	 * not carry it or the accessory has not reported a value.
	 */
	public value(type: string): CharacteristicValue | undefined {
		return this.byType.get(type)?.value ?? undefined;
	}

	public isLinkedTo(parent: HomeKitService): boolean {
		return parent.aid === this.aid && parent.linked.includes(this.iid);
	}
}

export class HomeKitServices implements Iterable<HomeKitService> {
	constructor(private readonly services: readonly HomeKitService[]) {}

	public [Symbol.iterator](): Iterator<HomeKitService> {
		return this.services[Symbol.iterator]();
	}

	public iid(iid: number): HomeKitService | undefined {
		return this.services.find(service => service.iid === iid);
	}

	/**
	 * Services matching every given criterion, in the accessory's order.
	 */
	public filter(filter: ServiceFilter = {}): HomeKitService[] {
		return this.services.filter(service => matches(service, filter));
	}

	public first(filter: ServiceFilter = {}): HomeKitService | undefined {
		return this.services.find(service => matches(service, filter));
	}
}

function matches(service: HomeKitService, filter: ServiceFilter): boolean {
	if (filter.serviceType && service.type !== filter.serviceType) {
		return false;
	}

	if (filter.parentService && !service.isLinkedTo(filter.parentService)) {
		return false;
	}

	for (const [type, expected] of Object.entries(filter.characteristics ?? {})) {
		if (service.get(type)?.value !== expected) {
			return false;
		}
	}

	return true;
}

export class HomeKitAccessory {
	public readonly services: HomeKitServices;
	private readonly byIid = new Map<number, HomeKitCharacteristic>();

	constructor(
		public readonly aid: number,
		services: readonly HomeKitService[],
	) {
		this.services = new HomeKitServices(services);
		for (const service of services) {
			for (const char of service.characteristics) {
				this.byIid.set(char.iid, char);
			}
		}
	}

	public characteristic(iid: number): HomeKitCharacteristic | undefined {
		return this.byIid.get(iid);
	}

	public characteristics(): HomeKitCharacteristic[] {
		return [...this.byIid.values()];
	}
}

export class EntityMap {
	private readonly byAid = new Map<number, HomeKitAccessory>();

	constructor(accessories: readonly HomeKitAccessory[]) {
		for (const accessory of accessories) {
			this.byAid.set(accessory.aid, accessory);
		}
	}

	public get accessories(): HomeKitAccessory[] {
		return [...this.byAid.values()];
	}

	public aid(aid: number): HomeKitAccessory | undefined {
		return this.byAid.get(aid);
	}

	public characteristic(aid: number, iid: number): HomeKitCharacteristic | undefined {
		return this.byAid.get(aid)?.characteristic(iid);
	}

	/**
	 * Apply new values. Returns the updates that hit a known characteristic.
	 */
	public process(updates: readonly CharacteristicUpdate[]): CharacteristicUpdate[] {
		const applied: CharacteristicUpdate[] = [];
		for (const update of updates) {
			const char = this.characteristic(update.aid, update.iid);
			if (!char) {
				continue;
			}
			char.value = update.value;
			applied.push(update);
		}
		return applied;
	}

	/**
	 * Build from the `/accessories` payload (either `{ accessories: [...] }`
	 * or the bare array). Entries without usable ids or types are skipped.
	 */
	public static parse(raw: unknown): EntityMap {
		const list = isRecord(raw) ? raw.accessories : raw;
		if (!Array.isArray(list)) {
			throw new Error('HomeKit: accessory database is not a list');
		}

		const accessories: HomeKitAccessory[] = [];
		for (const entry of list) {
			const accessory = parseAccessory(entry);
			if (accessory) {
				accessories.push(accessory);
			}
		}
		return new EntityMap(accessories);
	}
}

// ----- parsing -----

type Primitive = string | number | boolean;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPrimitive(value: unknown): value is Primitive {
	return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function toInteger(value: unknown): number | undefined {
	if (typeof value === 'number' && Number.isInteger(value)) {
		return value;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value.trim());
		return Number.isInteger(parsed) ? parsed : undefined;
	}
	return undefined;
}

function toNumber(value: unknown): number | undefined {
	return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toNumberList(value: unknown): number[] | undefined {
	if (!Array.isArray(value)) {
		return undefined;
	}
	return value.filter((v): v is number => typeof v === 'number');
}

export function toCharacteristicValue(value: unknown): CharacteristicValue | null {
	if (isPrimitive(value)) {
		return value;
	}
	if (Array.isArray(value) && value.every(isPrimitive)) {
		return value;
	}
	return null;
}

function parseCharacteristic(aid: number, raw: unknown): HomeKitCharacteristic | undefined {
	if (!isRecord(raw)) {
		return undefined;
	}

	const iid = toInteger(raw.iid);
	if (iid === undefined || typeof raw.type !== 'string') {
		return undefined;
	}

	const range = toNumberList(raw['valid-values-range']);

	return {
		aid,
		iid,
		type: normalizeUuid(raw.type),
		perms: Array.isArray(raw.perms)
			? raw.perms.filter((p): p is string => typeof p === 'string')
			: [],
		format: typeof raw.format === 'string' ? raw.format : undefined,
		minValue: toNumber(raw.minValue),
		maxValue: toNumber(raw.maxValue),
		validValues: toNumberList(raw['valid-values']),
		validValuesRange: range && range.length === 2 ? [range[0], range[1]] : undefined,
		value: toCharacteristicValue(raw.value),
	};
}

function parseService(aid: number, raw: unknown): HomeKitService | undefined {
	if (!isRecord(raw)) {
		return undefined;
	}

	const iid = toInteger(raw.iid);
	if (iid === undefined || typeof raw.type !== 'string') {
		return undefined;
	}

	const characteristics: HomeKitCharacteristic[] = [];
	for (const entry of Array.isArray(raw.characteristics) ? raw.characteristics : []) {
		const char = parseCharacteristic(aid, entry);
		if (char) {
			characteristics.push(char);
		}
	}

	return new HomeKitService(
		aid,
		iid,
		normalizeUuid(raw.type),
		toNumberList(raw.linked) ?? [],
		characteristics,
	);
}

function parseAccessory(raw: unknown): HomeKitAccessory | undefined {
	if (!isRecord(raw)) {
		return undefined;
	}

	const aid = toInteger(raw.aid);
	if (aid === undefined) {
		return undefined;
	}

	const services: HomeKitService[] = [];
	for (const entry of Array.isArray(raw.services) ? raw.services : []) {
		const service = parseService(aid, entry);
		if (service) {
			services.push(service);
		}
	}

	return new HomeKitAccessory(aid, services);
}
