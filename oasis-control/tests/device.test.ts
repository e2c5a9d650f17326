import assert from 'node:assert/strict';
import { test } from 'node:test';
import { loadCatalog } from '../src/catalog.js';
import { OasisDevice } from '../src/device/device.js';
import { NoTransportError, ValidationError } from '../src/errors.js';
import { TrackInfo, TrackMetadataSource } from '../src/types/device.js';
import { RecordingTransport } from './fakes/transport.js';

const catalog = loadCatalog();
const STATUS_18 = '4;0;150;10,20,30;1;42;0;0;0;120;#ff0000;0;0;200;1;0;1;0';

function createDevice(metadata: TrackMetadataSource | null = null) {
  const transport = new RecordingTransport();
  const device = new OasisDevice({ catalog, serialNumber: 'OASIS-1', model: 'Oasis Mini', transport, metadata });
  return { device, transport };
}

test('applyStatusString populates the device from a snapshot', () => {
  const { device } = createDevice();
  assert.equal(device.applyStatusString(STATUS_18), true);

  assert.equal(device.status, 'playing');
  assert.equal(device.isPlaying, true);
  assert.equal(device.ballSpeed, 150);
  assert.deepEqual(device.playlist, [10, 20, 30]);
  assert.equal(device.playlistIndex, 1);
  assert.equal(device.currentTrackId, 20);
  assert.equal(device.progress, 42);
  assert.equal(device.brightness, 120);
  assert.equal(device.color, '#ff0000');
  assert.equal(device.repeatPlaylist, false);
  assert.equal(device.brightnessOn, 120);
  assert.ok(device.lastUpdated instanceof Date);
});

test('applyStatusString leaves state untouched on malformed input', () => {
  const { device } = createDevice();
  assert.equal(device.applyStatusString('1;2;3'), false);
  assert.equal(device.ballSpeed, 100);
});

test('applying the same update twice notifies listeners once', () => {
  const { device } = createDevice();
  let calls = 0;
  device.addUpdateListener(() => {
    calls += 1;
  });

  assert.equal(device.applyFieldMap({ ballSpeed: 300, playlist: [1, 2] }), true);
  assert.equal(device.applyFieldMap({ ballSpeed: 300, playlist: [1, 2] }), false);
  assert.equal(calls, 1);
});

test('applyFieldMap skips unknown keys and values of the wrong type', () => {
  const { device } = createDevice();
  const changed = device.applyFieldMap({ notAField: 1, ballSpeed: 'fast', playlist: [1, 'x'], busy: true });
  assert.equal(changed, true);
  assert.equal(device.ballSpeed, 100);
  assert.deepEqual(device.playlist, []);
  assert.equal(device.busy, true);
});

test('applyFieldMap keeps the playlist index within the playlist', () => {
  const { device } = createDevice();
  device.applyFieldMap({ playlist: [5, 6, 7], playlistIndex: 2 });
  device.applyFieldMap({ playlist: [5] });
  assert.equal(device.playlistIndex, 1);
  assert.equal(device.currentTrackId, 5);

  device.applyFieldMap({ playlist: [] });
  assert.equal(device.playlistIndex, 0);
  assert.equal(device.currentTrackId, null);
});

test('a throwing listener does not stop the others and unsubscribe is idempotent', () => {
  const { device } = createDevice();
  let calls = 0;
  device.addUpdateListener(() => {
    throw new Error('listener failure');
  });
  const unsubscribe = device.addUpdateListener(() => {
    calls += 1;
  });

  device.applyFieldMap({ progress: 10 });
  unsubscribe();
  unsubscribe();
  device.applyFieldMap({ progress: 11 });
  assert.equal(calls, 1);
});

test('brightness reads 0 while sleeping and keeps the stored value', () => {
  const { device } = createDevice();
  device.applyFieldMap({ brightness: 80, statusCode: 6 });
  assert.equal(device.isSleeping, true);
  assert.equal(device.brightness, 0);
  assert.equal(device.rawBrightness, 80);
  assert.equal(device.brightnessOn, 80);

  device.applyFieldMap({ brightness: 0 });
  assert.equal(device.brightnessOn, 80);
});

test('errorMessage resolves the error code only in the error state', () => {
  const { device } = createDevice();
  device.applyFieldMap({ error: 2 });
  assert.equal(device.errorMessage, null);

  device.applyFieldMap({ statusCode: 9 });
  assert.equal(device.status, 'error');
  assert.equal(device.errorMessage, 'Error while starting the Wifi');

  device.applyFieldMap({ statusCode: 42 });
  assert.equal(device.status, 'Unknown (42)');
});

test('isInitialized needs serial, MAC and software version', () => {
  const { device } = createDevice();
  assert.equal(device.isInitialized, false);
  device.applyFieldMap({ macAddress: 'aa:bb:cc:dd:ee:ff' });
  assert.equal(device.isInitialized, false);
  device.applyFieldMap({ softwareVersion: '2.4.1' });
  assert.equal(device.isInitialized, true);
});

test('name defaults to model and serial', () => {
  const { device } = createDevice();
  assert.equal(device.name, 'Oasis Mini OASIS-1');
  assert.equal(new OasisDevice({ catalog, name: 'Living room' }).name, 'Living room');
});

test('setLed rejects an unknown effect without sending anything', async () => {
  const { device, transport } = createDevice();
  await assert.rejects(device.setLed({ ledEffect: '99' }), ValidationError);
  assert.deepEqual(transport.commands, []);
});

test('setLed validates speed and brightness ranges', async () => {
  const { device, transport } = createDevice();
  await assert.rejects(device.setLed({ ledSpeed: 91 }), ValidationError);
  await assert.rejects(device.setLed({ brightness: 201 }), ValidationError);
  assert.deepEqual(transport.commands, []);
});

test('setLed fills omitted values from the current state', async () => {
  const { device, transport } = createDevice();
  await device.setLed({ brightness: 50 });
  device.applyStatusString(STATUS_18);
  await device.setLed({ ledEffect: '3' });

  assert.deepEqual(transport.commands, [
    { type: 'led', effect: '0', color: '#ffffff', speed: 0, brightness: 50 },
    { type: 'led', effect: '3', color: '#ff0000', speed: 0, brightness: 120 },
  ]);
});

test('setBallSpeed enforces 100..400', async () => {
  const { device, transport } = createDevice();
  await assert.rejects(device.setBallSpeed(99), ValidationError);
  await assert.rejects(device.setBallSpeed(401), ValidationError);
  await device.setBallSpeed(400);
  assert.deepEqual(transport.commands, [{ type: 'ballSpeed', speed: 400 }]);
});

test('commands without a transport raise NoTransportError', async () => {
  const device = new OasisDevice({ catalog, serialNumber: 'OASIS-2' });
  await assert.rejects(device.play(), NoTransportError);
});

test('setPlaylist restarts playback only when the device was playing', async () => {
  const playing = createDevice();
  playing.device.applyStatusString(STATUS_18);
  await playing.device.setPlaylist([7, 8]);
  assert.deepEqual(playing.transport.commands, [
    { type: 'stop' },
    { type: 'setJobList', tracks: [7, 8] },
    { type: 'play' },
  ]);
  assert.deepEqual(playing.device.playlist, [7, 8]);

  const stopped = createDevice();
  await stopped.device.setPlaylist(9);
  assert.deepEqual(stopped.transport.commands, [{ type: 'stop' }, { type: 'setJobList', tracks: [9] }]);

  const cleared = createDevice();
  await cleared.device.setPlaylist([], { startPlaying: true });
  assert.deepEqual(cleared.transport.commands, [{ type: 'stop' }, { type: 'setJobList', tracks: [] }]);
});

test('setAutoplay maps booleans onto wait-after options', async () => {
  const { device, transport } = createDevice();
  await device.setAutoplay(true);
  await device.setAutoplay(false);
  await device.setAutoplay(4);
  assert.deepEqual(transport.commands, [
    { type: 'autoplay', option: '0' },
    { type: 'autoplay', option: '1' },
    { type: 'autoplay', option: '4' },
  ]);
});

test('track commands validate indices and accept single ids', async () => {
  const { device, transport } = createDevice();
  await assert.rejects(device.changeTrack(-1), ValidationError);
  await device.changeTrack(2);
  await device.moveTrack(0, 1);
  await device.addTrackToPlaylist(12);
  await device.upgrade();
  assert.deepEqual(transport.commands, [
    { type: 'changeTrack', index: 2 },
    { type: 'moveJob', from: 0, to: 1 },
    { type: 'addJobList', tracks: [12] },
    { type: 'upgrade', beta: false },
  ]);
});

test('getMacAddress asks the transport once and stores the result', async () => {
  const { device, transport } = createDevice();
  transport.macAddress = 'aa:bb:cc:dd:ee:ff';
  assert.equal(await device.getMacAddress(), 'aa:bb:cc:dd:ee:ff');
  transport.macAddress = null;
  assert.equal(await device.getMacAddress(), 'aa:bb:cc:dd:ee:ff');
});

test('a playlist change resolves the current track metadata', async () => {
  const lookups: number[] = [];
  const metadata: TrackMetadataSource = {
    async getTrackInfo(trackId: number): Promise<TrackInfo | null> {
      lookups.push(trackId);
      return { id: trackId, name: 'Spiral', image: 'spiral.png' };
    },
  };
  const { device } = createDevice(metadata);
  let calls = 0;
  device.addUpdateListener(() => {
    calls += 1;
  });

  device.applyStatusString(STATUS_18);
  await device.pendingTrackRefresh;

  assert.deepEqual(lookups, [20]);
  assert.equal(calls, 2);
  assert.equal(device.trackName, 'Spiral');
  assert.equal(device.trackImageUrl, 'https://app.grounded.so/uploads/spiral.png');
  assert.deepEqual(device.playlistDetails.get(10), { id: 10, name: 'Unknown Title (#10)' });
  assert.deepEqual(device.playlistDetails.get(20), { id: 20, name: 'Spiral', image: 'spiral.png' });

  device.applyFieldMap({ playlistIndex: 1, progress: 50 });
  assert.deepEqual(lookups, [20]);
});

test('a newer track lookup supersedes one still in flight', async () => {
  const resolvers = new Map<number, (track: TrackInfo) => void>();
  const metadata: TrackMetadataSource = {
    getTrackInfo: (trackId: number) =>
      new Promise<TrackInfo | null>((resolve) => {
        resolvers.set(trackId, resolve);
      }),
  };
  const { device } = createDevice(metadata);

  device.applyFieldMap({ playlist: [10, 20] });
  const first = device.pendingTrackRefresh;
  device.applyFieldMap({ playlistIndex: 1 });
  const second = device.pendingTrackRefresh;
  assert.deepEqual([...resolvers.keys()], [10, 20]);

  let calls = 0;
  device.addUpdateListener(() => {
    calls += 1;
  });

  resolvers.get(20)?.({ id: 20, name: 'Wave' });
  await second;
  assert.equal(device.trackName, 'Wave');
  assert.equal(calls, 1);

  resolvers.get(10)?.({ id: 10, name: 'Spiral' });
  await first;
  assert.equal(device.track?.id, 20);
  assert.equal(device.trackName, 'Wave');
  assert.equal(calls, 1);
});

test('metadata failures are swallowed', async () => {
  const metadata: TrackMetadataSource = {
    async getTrackInfo(): Promise<TrackInfo | null> {
      throw new Error('cloud unavailable');
    },
  };
  const { device } = createDevice(metadata);
  device.applyFieldMap({ playlist: [3] });
  await device.pendingTrackRefresh;
  assert.equal(device.track, null);
  assert.equal(device.trackName, null);
});
