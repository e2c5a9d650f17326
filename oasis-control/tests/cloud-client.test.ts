import assert from 'node:assert/strict';
import { test } from 'node:test';
import { UnauthenticatedError } from '../src/errors.js';
import { getTrackIdsFromPlaylist, OasisCloudClient } from '../src/services/cloud-client.js';
import { createStubHttp, StubHandler, StubResponse } from './fakes/http.js';

const BASE_URL = 'https://app.grounded.so';

const json = (body: unknown, status = 200): StubResponse => ({
  status,
  contentType: 'application/json',
  body: JSON.stringify(body),
});

function setup(handler: StubHandler, accessToken: string | null = 'test-token') {
  let now = 0;
  const { http, requests } = createStubHttp(handler);
  const cloud = new OasisCloudClient({ http, accessToken, baseUrl: BASE_URL, now: () => now });
  return {
    cloud,
    requests,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

test('authenticated calls without a token fail before any request', async () => {
  const { cloud, requests } = setup(() => json([]), null);
  await assert.rejects(cloud.getDevices(), UnauthenticatedError);
  assert.equal(requests.length, 0);
});

test('login stores the access token used by later requests', async () => {
  const { cloud, requests } = setup((request) =>
    request.url === 'api/auth/login'
      ? json({ access_token: 'test-token-2' })
      : json([{ serial_number: 'SER1', name: 'Desk', model: { name: 'Oasis Mini' } }, { serial_number: 'SER2' }])
  );

  await cloud.login('owner@example.com', 'test-secret');
  assert.equal(cloud.accessToken, 'test-token-2');
  assert.equal(requests[0].method, 'post');
  assert.equal(requests[0].data, '{"email":"owner@example.com","password":"test-secret"}');

  const devices = await cloud.getDevices();
  assert.equal(requests[1].url, 'api/user/devices');
  assert.equal(requests[1].baseURL, BASE_URL);
  assert.equal(requests[1].headers.get('Authorization'), 'Bearer test-token-2');
  assert.deepEqual(
    devices.map((entry) => [entry.serial_number, entry.name, entry.model]),
    [
      ['SER1', 'Desk', 'Oasis Mini'],
      ['SER2', undefined, null],
    ]
  );
});

test('HTTP 401 raises UnauthenticatedError', async () => {
  const { cloud } = setup(() => json({ message: 'Unauthenticated.' }, 401));
  await assert.rejects(cloud.getUser(), UnauthenticatedError);
});

test('an HTML login page from the API host raises UnauthenticatedError', async () => {
  const { cloud } = setup(() => ({ contentType: 'text/html', body: '<body class="login-page"></body>' }));
  await assert.rejects(cloud.getDevices(), UnauthenticatedError);
});

test('other HTML responses decode to nothing', async () => {
  const { cloud } = setup(() => ({ contentType: 'text/html', body: '<p>maintenance</p>' }));
  assert.deepEqual(await cloud.getDevices(), []);
});

test('getPlaylists caches each scope for five minutes', async () => {
  const playlist = { id: 1, name: 'Favourites', patterns: [{ id: 10 }, { id: 11, name: 'Spiral' }] };
  const { cloud, requests, advance } = setup(() => json([playlist]));

  const all = await cloud.getPlaylists();
  await cloud.getPlaylists();
  await cloud.getPlaylists(true);
  assert.equal(requests.length, 2);
  assert.deepEqual(
    requests.map((request) => request.params),
    [{ my_playlists: 'false' }, { my_playlists: 'true' }]
  );
  assert.deepEqual(getTrackIdsFromPlaylist(all[0]), [10, 11]);

  advance(5 * 60 * 1000);
  await cloud.getPlaylists();
  assert.equal(requests.length, 3);
});

test('getTrackInfo turns a 404 into a cached placeholder', async () => {
  const { cloud, requests } = setup(() => json({ message: 'Not found' }, 404));
  assert.deepEqual(await cloud.getTrackInfo(77), { id: 77, name: 'Unknown Title (#77)' });
  assert.deepEqual(await cloud.getTrackInfo(77), { id: 77, name: 'Unknown Title (#77)' });
  assert.equal(requests.length, 1);
  assert.equal(requests[0].url, 'api/track/77');
});

test('getTrackInfo returns null on other failures', async () => {
  const { cloud } = setup(() => json({ message: 'Server error' }, 500));
  assert.equal(await cloud.getTrackInfo(5), null);
});

test('getTracks follows next_page_url', async () => {
  const { cloud, requests } = setup((request) =>
    request.url === 'api/track'
      ? json({ data: [{ id: 1, name: 'One' }], next_page_url: `${BASE_URL}/api/track?page=2` })
      : json({ data: [{ id: 2, name: 'Two' }], next_page_url: null })
  );

  const tracks = await cloud.getTracks([1, 2]);
  assert.deepEqual(
    tracks.map((track) => track.id),
    [1, 2]
  );
  assert.deepEqual(requests[0].params, { ids: [1, 2] });
  assert.equal(requests[1].url, `${BASE_URL}/api/track?page=2`);
});

test('getLatestSoftwareDetails is fetched once', async () => {
  const { cloud, requests } = setup(() => json({ version: '2.5.0', beta: false }));
  const details = await cloud.getLatestSoftwareDetails();
  await cloud.getLatestSoftwareDetails();
  assert.equal(details.version, '2.5.0');
  assert.equal(details.beta, false);
  assert.equal(requests.length, 1);
});

test('logout clears the token', async () => {
  const { cloud } = setup(() => json({}));
  await cloud.logout();
  assert.equal(cloud.accessToken, null);
  await assert.rejects(cloud.getDevices(), UnauthenticatedError);
});
