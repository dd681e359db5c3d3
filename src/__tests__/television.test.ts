import { describe, it, expect, vi } from 'vitest';

import { HomeKitConnection } from '../homekit/connection.js';
import { SourceNotFoundError } from '../homekit/errors.js';
import { HomeKitTelevision, registerTelevisionServices } from '../homekit/television.js';
import { MediaPlayerFeature, MediaPlayerState, type MediaPlayerEntity } from '../host/media-player.js';
import {
	IID,
	TV_IID,
	accessoryDatabase,
	televisionAccessory,
	type TelevisionOptions,
} from './helpers/accessories.js';
import { FakeHapClient, PAIRING_ID, createLogger } from './helpers/fakes.js';

const ALL_FEATURES =
	MediaPlayerFeature.PAUSE |
	MediaPlayerFeature.PLAY |
	MediaPlayerFeature.STOP |
	MediaPlayerFeature.SELECT_SOURCE;

async function createTelevision(options: TelevisionOptions = {}) {
	const client = new FakeHapClient(accessoryDatabase(televisionAccessory(options)));
	const log = createLogger();
	const connection = new HomeKitConnection(PAIRING_ID, client, log);
	await connection.loadAccessories();

	const tv = new HomeKitTelevision(connection, { aid: 1, iid: TV_IID }, log);
	return { client, log, connection, tv };
}

describe('HomeKitTelevision', () => {
	describe('identity', () => {
		it('is named and identified from the accessory', async () => {
			const { tv } = await createTelevision();

			expect(tv.uniqueId).toBe('homekit-AA:BB:CC:DD:EE:FF-1-8');
			expect(tv.name).toBe('Living Room TV');
			expect(tv.deviceClass).toBe('tv');
			expect(tv.available).toBe(true);
			expect(tv.deviceInfo).toEqual({
				manufacturer: 'Acme',
				model: 'TV-1',
				serialNumber: 'SN-0001',
				firmwareRevision: '1.0.0',
			});
		});
	});

	describe('supportedFeatures', () => {
		it('offers everything when target media state and active identifier are present', async () => {
			const { tv } = await createTelevision();

			expect(tv.supportedFeatures).toBe(ALL_FEATURES);
			expect(tv.capabilities.targetMediaStates).toEqual(new Set([0, 1, 2]));
		});

		it('follows the advertised target media states', async () => {
			const { tv } = await createTelevision({
				targetMediaState: { 'valid-values': [0, 1] },
				remoteKey: { 'valid-values': [4] },
			});

			expect(tv.supportedFeatures).toBe(
				MediaPlayerFeature.PAUSE | MediaPlayerFeature.PLAY | MediaPlayerFeature.SELECT_SOURCE,
			);
		});

		it('offers play and pause through the play/pause remote key', async () => {
			const { tv } = await createTelevision({ omit: ['137'], remoteKey: { 'valid-values': [11] } });

			expect(tv.supportedFeatures).toBe(
				MediaPlayerFeature.PAUSE | MediaPlayerFeature.PLAY | MediaPlayerFeature.SELECT_SOURCE,
			);
		});

		it('offers only source selection when no playback control is usable', async () => {
			const { tv } = await createTelevision({ omit: ['137'], remoteKey: { 'valid-values': [4, 5] } });

			expect(tv.supportedFeatures).toBe(MediaPlayerFeature.SELECT_SOURCE);
		});

		it('leaves out source selection without an active identifier', async () => {
			const { tv } = await createTelevision({ omit: ['E7'] });

			expect(tv.supportedFeatures).toBe(
				MediaPlayerFeature.PAUSE | MediaPlayerFeature.PLAY | MediaPlayerFeature.STOP,
			);
		});

		it('is worked out again when the accessory database is reloaded', async () => {
			const { client, connection, tv } = await createTelevision();

			client.accessories = accessoryDatabase(
				televisionAccessory({ omit: ['137'], remoteKey: { 'valid-values': [4] } }),
			);
			await connection.loadAccessories();

			expect(tv.supportedFeatures).toBe(MediaPlayerFeature.SELECT_SOURCE);
		});
	});

	describe('state', () => {
		it.each([
			{ currentMediaState: 0, expected: MediaPlayerState.PLAYING },
			{ currentMediaState: 1, expected: MediaPlayerState.PAUSED },
			{ currentMediaState: 2, expected: MediaPlayerState.IDLE },
			{ currentMediaState: 4, expected: MediaPlayerState.OK },
		])('maps current media state $currentMediaState to $expected', async ({ currentMediaState, expected }) => {
			const { tv } = await createTelevision({ currentMediaState });

			expect(tv.state).toBe(expected);
		});

		it('is a problem while the television is inactive', async () => {
			const { tv } = await createTelevision({ active: 0, currentMediaState: 0 });

			expect(tv.state).toBe(MediaPlayerState.PROBLEM);
		});

		it('is ok without a current media state', async () => {
			const { tv } = await createTelevision({ omit: ['E0'] });

			expect(tv.state).toBe(MediaPlayerState.OK);
		});
	});

	describe('sources', () => {
		it('lists the linked input sources in accessory order', async () => {
			const { tv } = await createTelevision();

			expect(tv.sourceList).toEqual(['TV Tuner', 'HDMI 1']);
		});

		it('reports the input matching the active identifier', async () => {
			const { tv } = await createTelevision({ activeIdentifier: 3 });

			expect(tv.source).toBe('HDMI 1');
		});

		it('reports no source when the active identifier is zero', async () => {
			const { tv } = await createTelevision({ activeIdentifier: 0 });

			expect(tv.source).toBeUndefined();
		});

		it('reports no source when no input carries the active identifier', async () => {
			const { tv, log } = await createTelevision({ activeIdentifier: 9 });

			expect(tv.source).toBeUndefined();
			expect(log.debug).toHaveBeenCalledWith(
				'HomeKit: %s active identifier %s matches no input source',
				'homekit-AA:BB:CC:DD:EE:FF-1-8',
				'9',
			);
		});

		it('follows the input list of a reloaded accessory database', async () => {
			const { client, connection, tv } = await createTelevision();

			client.accessories = accessoryDatabase(
				televisionAccessory({
					activeIdentifier: 5,
					inputs: [
						{ iid: 20, name: 'TV Tuner', identifier: 1 },
						{ iid: 40, name: 'Streaming Box', identifier: 5 },
					],
				}),
			);
			await connection.loadAccessories();

			expect(tv.sourceList).toEqual(['TV Tuner', 'Streaming Box']);
			expect(tv.source).toBe('Streaming Box');
		});

		it('selects a source by writing its identifier', async () => {
			const { client, tv } = await createTelevision();

			await tv.selectSource('HDMI 1');

			expect(client.setCharacteristics).toHaveBeenCalledWith({ '1.13': 3 });
			expect(tv.source).toBe('HDMI 1');
		});

		it('rejects a source name no input carries', async () => {
			const { client, tv } = await createTelevision();

			const selection = tv.selectSource('Streaming');

			await expect(selection).rejects.toBeInstanceOf(SourceNotFoundError);
			await expect(selection).rejects.toThrow('Could not find source Streaming');
			expect(client.setCharacteristics).not.toHaveBeenCalled();
		});
	});

	describe('playback', () => {
		it('plays through the target media state', async () => {
			const { client, tv } = await createTelevision({ currentMediaState: 1 });

			await tv.mediaPlay();

			expect(client.setCharacteristics).toHaveBeenCalledWith({ '1.11': 0 });
		});

		it('pauses through the target media state', async () => {
			const { client, tv } = await createTelevision({ currentMediaState: 0 });

			await tv.mediaPause();

			expect(client.setCharacteristics).toHaveBeenCalledWith({ '1.11': 1 });
		});

		it('stops through the target media state', async () => {
			const { client, tv } = await createTelevision({ currentMediaState: 0 });

			await tv.mediaStop();

			expect(client.setCharacteristics).toHaveBeenCalledWith({ '1.11': 2 });
		});

		it('does not play while already playing', async () => {
			const { client, log, tv } = await createTelevision({ currentMediaState: 0 });

			await tv.mediaPlay();

			expect(client.setCharacteristics).not.toHaveBeenCalled();
			expect(log.debug).toHaveBeenCalledWith(
				'HomeKit: cannot play %s while already playing',
				'homekit-AA:BB:CC:DD:EE:FF-1-8',
			);
		});

		it('does not pause while already paused', async () => {
			const { client, tv } = await createTelevision({ currentMediaState: 1 });

			await tv.mediaPause();

			expect(client.setCharacteristics).not.toHaveBeenCalled();
		});

		it('does not stop while already idle', async () => {
			const { client, tv } = await createTelevision({ currentMediaState: 2 });

			await tv.mediaStop();

			expect(client.setCharacteristics).not.toHaveBeenCalled();
		});

		it('plays from idle when only play and pause are advertised', async () => {
			const options: TelevisionOptions = {
				targetMediaState: { 'valid-values': [0, 1] },
				remoteKey: { 'valid-values': [] },
			};

			const idle = await createTelevision({ ...options, currentMediaState: 2 });
			expect(idle.tv.supportedFeatures & MediaPlayerFeature.STOP).toBe(0);
			await idle.tv.mediaPlay();
			expect(idle.client.setCharacteristics).toHaveBeenCalledWith({ '1.11': 0 });

			const paused = await createTelevision({ ...options, currentMediaState: 1 });
			await paused.tv.mediaPause();
			expect(paused.client.setCharacteristics).not.toHaveBeenCalled();
		});

		it('falls back to the play/pause remote key', async () => {
			const paused = await createTelevision({
				currentMediaState: 1,
				omit: ['137'],
				remoteKey: { 'valid-values': [11] },
			});
			await paused.tv.mediaPlay();
			expect(paused.client.setCharacteristics).toHaveBeenCalledWith({ '1.12': 11 });

			const playing = await createTelevision({
				currentMediaState: 0,
				omit: ['137'],
				remoteKey: { 'valid-values': [11] },
			});
			await playing.tv.mediaPause();
			expect(playing.client.setCharacteristics).toHaveBeenCalledWith({ '1.12': 11 });
		});

		it('prefers the target media state over the remote key', async () => {
			const { client, tv } = await createTelevision({ currentMediaState: 1 });

			await tv.mediaPlay();

			expect(client.setCharacteristics).toHaveBeenCalledTimes(1);
			expect(client.setCharacteristics).toHaveBeenCalledWith({ '1.11': 0 });
		});

		it('ignores stop when only the remote key is available', async () => {
			const { client, log, tv } = await createTelevision({
				currentMediaState: 0,
				omit: ['137'],
				remoteKey: { 'valid-values': [11] },
			});

			await tv.mediaStop();

			expect(client.setCharacteristics).not.toHaveBeenCalled();
			expect(log.debug).toHaveBeenCalledWith(
				'HomeKit: %s has no way to stop; ignoring',
				'homekit-AA:BB:CC:DD:EE:FF-1-8',
			);
		});

		it('ignores play when nothing can drive playback', async () => {
			const { client, tv } = await createTelevision({
				currentMediaState: 1,
				omit: ['137'],
				remoteKey: { 'valid-values': [4, 5] },
			});

			await tv.mediaPlay();

			expect(client.setCharacteristics).not.toHaveBeenCalled();
		});

		it('passes write failures to the caller', async () => {
			const { client, tv } = await createTelevision({ currentMediaState: 0 });
			client.setCharacteristics.mockRejectedValueOnce(new Error('connection reset'));

			await expect(tv.mediaPause()).rejects.toThrow('connection reset');
		});
	});

	describe('updates', () => {
		it('polls the characteristics of the television and its inputs', async () => {
			const { client, connection } = await createTelevision();

			await connection.poll();

			expect(client.getCharacteristics).toHaveBeenCalledWith([
				'1.9',
				'1.10',
				'1.11',
				'1.13',
				'1.14',
				'1.21',
				'1.22',
				'1.31',
				'1.32',
			]);
		});

		it('tells listeners when its characteristics change', async () => {
			const { client, connection, tv } = await createTelevision();
			const listener = vi.fn();
			tv.onUpdate(listener);
			await connection.subscribe();

			client.emitEvent({ characteristics: [{ aid: 1, iid: IID.CURRENT_MEDIA_STATE, value: 1 }] });

			expect(listener).toHaveBeenCalledTimes(1);
			expect(tv.state).toBe(MediaPlayerState.PAUSED);
		});

		it('becomes unavailable when a poll fails', async () => {
			const { client, connection, tv } = await createTelevision();
			client.getCharacteristics.mockRejectedValueOnce(new Error('timeout'));

			await connection.poll();

			expect(tv.available).toBe(false);
		});
	});
});

describe('registerTelevisionServices', () => {
	it('adds one entity per television service', async () => {
		const client = new FakeHapClient(accessoryDatabase(televisionAccessory()));
		const log = createLogger();
		const connection = new HomeKitConnection(PAIRING_ID, client, log);
		await connection.loadAccessories();

		const added: MediaPlayerEntity[] = [];
		registerTelevisionServices(connection, entities => added.push(...entities), log);
		await connection.loadAccessories();

		expect(added).toHaveLength(1);
		expect(added[0]).toBeInstanceOf(HomeKitTelevision);
		expect(added[0]?.uniqueId).toBe('homekit-AA:BB:CC:DD:EE:FF-1-8');
		expect(log.info).toHaveBeenCalledWith('HomeKit: adding television %d.%d from %s', 1, TV_IID, PAIRING_ID);
	});
});
