// src/homekit/characteristics.ts
// Characteristic/service kinds and enum value sets used by the adapters.
//
// UUIDs and enum values come from hap-nodejs so they stay in step with the
// HAP definitions; everything is compared in long, upper-case form.
import hapNodeJs from 'hap-nodejs';

const { Characteristic, Service, uuid } = hapNodeJs;

export const CharacteristicsTypes = {
	ACTIVE: Characteristic.Active.UUID,
	ACTIVE_IDENTIFIER: Characteristic.ActiveIdentifier.UUID,
	CONFIGURED_NAME: Characteristic.ConfiguredName.UUID,
	CURRENT_MEDIA_STATE: Characteristic.CurrentMediaState.UUID,
	FIRMWARE_REVISION: Characteristic.FirmwareRevision.UUID,
	IDENTIFIER: Characteristic.Identifier.UUID,
	MANUFACTURER: Characteristic.Manufacturer.UUID,
	MODEL: Characteristic.Model.UUID,
	NAME: Characteristic.Name.UUID,
	REMOTE_KEY: Characteristic.RemoteKey.UUID,
	SERIAL_NUMBER: Characteristic.SerialNumber.UUID,
	TARGET_MEDIA_STATE: Characteristic.TargetMediaState.UUID,
} as const;

export const ServicesTypes = {
	ACCESSORY_INFORMATION: Service.AccessoryInformation.UUID,
	INPUT_SOURCE: Service.InputSource.UUID,
	TELEVISION: Service.Television.UUID,
} as const;

export const TargetMediaStateValues = {
	PLAY: Characteristic.TargetMediaState.PLAY,
	PAUSE: Characteristic.TargetMediaState.PAUSE,
	STOP: Characteristic.TargetMediaState.STOP,
} as const;

export const CurrentMediaStateValues = {
	PLAYING: Characteristic.CurrentMediaState.PLAY,
	PAUSED: Characteristic.CurrentMediaState.PAUSE,
	STOPPED: Characteristic.CurrentMediaState.STOP,
	LOADING: Characteristic.CurrentMediaState.LOADING,
	INTERRUPTED: Characteristic.CurrentMediaState.INTERRUPTED,
} as const;

export const RemoteKeyValues = {
	REWIND: Characteristic.RemoteKey.REWIND,
	FAST_FORWARD: Characteristic.RemoteKey.FAST_FORWARD,
	NEXT_TRACK: Characteristic.RemoteKey.NEXT_TRACK,
	PREVIOUS_TRACK: Characteristic.RemoteKey.PREVIOUS_TRACK,
	ARROW_UP: Characteristic.RemoteKey.ARROW_UP,
	ARROW_DOWN: Characteristic.RemoteKey.ARROW_DOWN,
	ARROW_LEFT: Characteristic.RemoteKey.ARROW_LEFT,
	ARROW_RIGHT: Characteristic.RemoteKey.ARROW_RIGHT,
	SELECT: Characteristic.RemoteKey.SELECT,
	BACK: Characteristic.RemoteKey.BACK,
	EXIT: Characteristic.RemoteKey.EXIT,
	PLAY_PAUSE: Characteristic.RemoteKey.PLAY_PAUSE,
	INFORMATION: Characteristic.RemoteKey.INFORMATION,
} as const;

const SHORT_UUID_REGEX = /^[0-9a-f]{1,8}$/i;

/**
 * Accessories may report types in short ("B0") or long form; bring both to
 * the long, upper-case form hap-nodejs uses. Anything else is upper-cased
 * and left alone (vendor-specific types).
 */
export function normalizeUuid(type: string): string {
	const trimmed = type.trim();
	if (uuid.isValid(trimmed) || SHORT_UUID_REGEX.test(trimmed)) {
		return uuid.toLongForm(trimmed).toUpperCase();
	}
	return trimmed.toUpperCase();
}

/**
 * Value metadata a characteristic may advertise.
 */
export interface EnumConstraints {
	minValue?: number;
	maxValue?: number;
	validValues?: number[];
	validValuesRange?: [number, number];
}

/**
 * Intersect a known enum with what the characteristic advertises.
 *
 * Every bound given (valid-values-range, minValue, maxValue) narrows the set
 * first. An explicit `valid-values` list (even an empty
 * one) is then intersected with what is left.
 */
export function clampEnumToChar(
	values: Readonly<Record<string, number>>,
	char: EnumConstraints,
): Set<number> {
	let supported = [...new Set(Object.values(values))];

	const lower = [char.validValuesRange?.[0], char.minValue];
	const upper = [char.validValuesRange?.[1], char.maxValue];

	for (const min of lower) {
		if (typeof min === 'number') {
			supported = supported.filter(v => v >= min);
		}
	}
	for (const max of upper) {
		if (typeof max === 'number') {
			supported = supported.filter(v => v <= max);
		}
	}

	const advertised = char.validValues;
	if (advertised) {
		supported = supported.filter(v => advertised.includes(v));
	}

	return new Set(supported);
}
