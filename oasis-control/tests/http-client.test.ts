import assert from 'node:assert/strict';
import { test } from 'node:test';
import { isAxiosError } from 'axios';
import { loadCatalog } from '../src/catalog.js';
import { OasisDevice } from '../src/device/device.js';
import { OasisHttpClient } from '../src/services/http-client.js';
import { delay } from '../src/utils/async.js';
import { createStubHttp, StubHandler } from './fakes/http.js';

const catalog = loadCatalog();
const STATUS_18 = '4;0;150;10,20,30;1;42;0;0;0;120;#ff0000;0;0;200;1;0;1;0';

function setup(handler: StubHandler) {
  const { http, requests } = createStubHttp(handler);
  const client = new OasisHttpClient({ host: '192.168.1.50', http });
  const device = new OasisDevice({ catalog, name: 'table', transport: client });
  return { client, device, requests };
}

test('getStatus requests GETSTATUS and applies the snapshot', async () => {
  const { device, requests } = setup(() => ({ contentType: 'text/plain', body: STATUS_18 }));
  await device.refreshStatus();

  assert.equal(requests.length, 1);
  assert.equal(requests[0].url, 'http://192.168.1.50/');
  assert.equal(requests[0].method, 'get');
  assert.deepEqual(requests[0].params, { GETSTATUS: '' });
  assert.equal(device.ballSpeed, 150);
  assert.deepEqual(device.playlist, [10, 20, 30]);
});

test('sendCommand decodes the body by content type', async () => {
  const bodies: Record<string, { contentType: string; body: string }> = {
    JSON: { contentType: 'application/json; charset=utf-8', body: '{"ok":true}' },
    TEXT: { contentType: 'text/plain', body: 'done' },
    HTML: { contentType: 'text/html', body: '<p>hi</p>' },
  };
  const { client } = setup((request) => {
    const key = Object.keys(request.params)[0];
    return bodies[key];
  });

  assert.deepEqual(await client.sendCommand({ JSON: '' }), { ok: true });
  assert.equal(await client.sendCommand({ TEXT: '' }), 'done');
  assert.equal(await client.sendCommand({ HTML: '' }), null);
});

test('a 204 response decodes to null', async () => {
  const { client } = setup(() => ({ status: 204, contentType: 'text/plain', body: '' }));
  assert.equal(await client.sendCommand({ CMDPLAY: '' }), null);
});

test('non-2xx responses reject with the axios error', async () => {
  const { device } = setup(() => ({ status: 500, contentType: 'text/plain', body: 'boom' }));
  await assert.rejects(device.play(), (error: unknown) => isAxiosError(error) && error.response?.status === 500);
});

test('getMacAddress trims the reply and returns null on failure', async () => {
  let fail = false;
  const { client, device } = setup(() =>
    fail ? { status: 503 } : { contentType: 'text/plain', body: ' aa:bb:cc:dd:ee:ff\n' }
  );
  assert.equal(await client.getMacAddress(device), 'aa:bb:cc:dd:ee:ff');
  fail = true;
  assert.equal(await client.getMacAddress(device), null);
});

test('setPlaylist sends stop and the job list, then updates the playlist locally', async () => {
  const { device, requests } = setup(() => ({ contentType: 'text/plain', body: 'OK' }));
  await device.setPlaylist([4, 5]);

  assert.deepEqual(
    requests.map((request) => request.params),
    [{ CMDSTOP: '' }, { WRIJOBLIST: '4,5' }]
  );
  assert.deepEqual(device.playlist, [4, 5]);
});

test('commands are sent one at a time', async () => {
  const events: string[] = [];
  const { device } = setup(async (request) => {
    const key = Object.keys(request.params)[0];
    events.push(`start ${key}`);
    await delay(key === 'CMDPLAY' ? 20 : 0);
    events.push(`end ${key}`);
    return { contentType: 'text/plain', body: 'OK' };
  });

  await Promise.all([device.play(), device.pause()]);
  assert.deepEqual(events, ['start CMDPLAY', 'end CMDPLAY', 'start CMDPAUSE', 'end CMDPAUSE']);
});

test('close leaves a shared axios instance usable', async () => {
  const { client } = setup(() => ({ contentType: 'text/plain', body: 'OK' }));
  await client.close();
  assert.equal(await client.sendCommand({ CMDPLAY: '' }), 'OK');
});
