import { ParseError, UnknownTopicError } from '../errors.js';
import { FieldMap } from '../types/device.js';

/**
 * Wire layout of the semicolon-delimited full status snapshot.
 *
 * Current firmware sends 18 fields (indices 0..17) with an optional 19th
 * carrying the software version. Older firmware sent 17 fields without the
 * trailing auto-clean flag; that layout is rejected as a parse error.
 *
 *   0 status code      5 progress        10 color            15 repeat
 *   1 error            6 led effect      11 busy             16 autoplay
 *   2 ball speed       7 led color id    12 download pct     17 auto-clean
 *   3 playlist csv     8 led speed       13 brightness max   18 software version
 *   4 playlist index   9 brightness      14 wifi connected
 */
export const MIN_STATUS_FIELDS = 18;

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError };

export type TopicParseResult =
  | { kind: 'update'; fields: FieldMap }
  | { kind: 'unknown'; error: UnknownTopicError }
  | { kind: 'invalid'; error: ParseError };

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Best-effort integer parse; malformed input yields 0.
 */
export function parseInteger(value: string | undefined): number {
  if (value === undefined) return 0;
  const trimmed = value.trim();
  return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
}

function parseStrictInteger(value: string, field: string): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ParseError(`Invalid integer for ${field}: ${JSON.stringify(value)}`, value);
  }
  return Number.parseInt(trimmed, 10);
}

export function parseBit(value: string | undefined): boolean {
  return value === '1';
}

function parseTopicBool(value: string): boolean {
  return value === '1' || value === 'true' || value === 'True';
}

/**
 * Track ids from a CSV job list. Empty, non-numeric and zero tokens are skipped.
 */
export function parsePlaylist(csv: string): number[] {
  const playlist: number[] = [];
  for (const token of csv.split(',')) {
    const trackId = parseInteger(token);
    if (trackId) playlist.push(trackId);
  }
  return playlist;
}

function parseColor(value: string): string | null {
  return value.includes('#') ? value : null;
}

export function parseFullStatus(raw: string): ParseResult<FieldMap> {
  if (!raw) {
    return { ok: false, error: new ParseError('Empty status payload', raw) };
  }

  const values = raw.split(';');
  if (values.length < MIN_STATUS_FIELDS) {
    return {
      ok: false,
      error: new ParseError(
        `Unexpected status format: expected at least ${MIN_STATUS_FIELDS} fields, got ${values.length}`,
        raw
      ),
    };
  }

  const playlist = parsePlaylist(values[3]);
  const status: FieldMap = {
    statusCode: parseInteger(values[0]),
    error: parseInteger(values[1]),
    ballSpeed: parseInteger(values[2]),
    playlist,
    playlistIndex: Math.max(0, Math.min(parseInteger(values[4]), playlist.length)),
    progress: parseInteger(values[5]),
    ledEffect: values[6],
    ledColorId: values[7],
    ledSpeed: parseInteger(values[8]),
    brightness: parseInteger(values[9]),
    color: parseColor(values[10]),
    busy: parseBit(values[11]),
    downloadProgress: parseInteger(values[12]),
    brightnessMax: parseInteger(values[13]),
    wifiConnected: parseBit(values[14]),
    repeatPlaylist: parseBit(values[15]),
    autoplay: parseInteger(values[16]),
    autoClean: parseBit(values[17]),
  };

  if (values.length > MIN_STATUS_FIELDS) {
    status.softwareVersion = values[18];
  }

  return { ok: true, value: status };
}

type TopicParser = (payload: string) => FieldMap;

const TOPIC_PARSERS: Readonly<Record<string, TopicParser>> = {
  OASIS_STATUS: (p) => ({ statusCode: parseStrictInteger(p, 'statusCode') }),
  OASIS_ERROR: (p) => ({ error: parseStrictInteger(p, 'error') }),
  // firmware spelling
  OASIS_SPEEED: (p) => ({ ballSpeed: parseStrictInteger(p, 'ballSpeed') }),
  JOBLIST: (p) => ({ playlist: parsePlaylist(p) }),
  CURRENTJOB: (p) => ({ playlistIndex: parseStrictInteger(p, 'playlistIndex') }),
  CURRENTLINE: (p) => ({ progress: parseStrictInteger(p, 'progress') }),
  LED_EFFECT: (p) => ({ ledEffect: p }),
  LED_EFFECT_COLOR: (p) => ({ ledColorId: p }),
  LED_SPEED: (p) => ({ ledSpeed: parseStrictInteger(p, 'ledSpeed') }),
  LED_BRIGHTNESS: (p) => ({ brightness: parseStrictInteger(p, 'brightness') }),
  LED_MAX: (p) => ({ brightnessMax: parseStrictInteger(p, 'brightnessMax') }),
  LED_EFFECT_PARAM: (p) => ({ color: p.startsWith('#') ? p : null }),
  SYSTEM_BUSY: (p) => ({ busy: parseTopicBool(p) }),
  DOWNLOAD_PROGRESS: (p) => ({ downloadProgress: parseStrictInteger(p, 'downloadProgress') }),
  REPEAT_JOB: (p) => ({ repeatPlaylist: parseTopicBool(p) }),
  WAIT_AFTER_JOB: (p) => ({ autoplay: parseInteger(p) }),
  AUTO_CLEAN: (p) => ({ autoClean: parseTopicBool(p) }),
  SOFTWARE_VER: (p) => ({ softwareVersion: p }),
  MAC_ADDRESS: (p) => ({ macAddress: p }),
  WIFI_SSID: (p) => ({ wifiSsid: p }),
  WIFI_IP: (p) => ({ wifiIp: p }),
  WIFI_PDNS: (p) => ({ wifiPdns: p }),
  WIFI_SDNS: (p) => ({ wifiSdns: p }),
  WIFI_GATE: (p) => ({ wifiGate: p }),
  WIFI_SUB: (p) => ({ wifiSub: p }),
  WIFI_STATUS: (p) => ({ wifiConnected: parseBit(p) }),
  SCHEDULE: (p) => ({ schedule: p }),
  ENVIRONMENT: (p) => ({ environment: p }),
};

export const FULL_STATUS_TOPIC = 'FULLSTATUS';

export function isKnownTopic(suffix: string): boolean {
  return suffix === FULL_STATUS_TOPIC || Object.prototype.hasOwnProperty.call(TOPIC_PARSERS, suffix);
}

/**
 * Decodes one `<serial>/STATUS/<suffix>` message into a field update.
 */
export function parseTopicValue(suffix: string, payload: string): TopicParseResult {
  if (suffix === FULL_STATUS_TOPIC) {
    const result = parseFullStatus(payload);
    return result.ok
      ? { kind: 'update', fields: result.value }
      : { kind: 'invalid', error: result.error };
  }

  if (!isKnownTopic(suffix)) {
    return { kind: 'unknown', error: new UnknownTopicError(suffix, payload) };
  }

  try {
    return { kind: 'update', fields: TOPIC_PARSERS[suffix](payload) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { kind: 'invalid', error };
    }
    throw error;
  }
}
