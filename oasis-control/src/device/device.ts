import { Catalog } from '../catalog.js';
import { parseFullStatus } from '../codec/status-codec.js';
import {
  BALL_SPEED_MAX,
  BALL_SPEED_MIN,
  BRIGHTNESS_DEFAULT,
  BRIGHTNESS_MAX_DEFAULT,
  DEFAULT_COLOR,
  IMAGE_URL_BASE,
  LED_SPEED_MAX,
  LED_SPEED_MIN,
  STATUS,
  STATUS_LABELS,
  unknownTrackName,
} from '../constants.js';
import { NoTransportError, UnknownFieldError, ValidationError } from '../errors.js';
import type { OasisTransport } from '../services/transport.js';
import {
  DeviceState,
  FieldMap,
  FieldName,
  TrackInfo,
  TrackMetadataSource,
} from '../types/device.js';
import { errorMessage, getLogger } from '../utils/logger.js';

const log = getLogger('device');

type Coerce<T> = (value: unknown) => T | undefined;

const asInteger: Coerce<number> = (value) =>
  typeof value === 'number' && Number.isInteger(value) ? value : undefined;
const asBoolean: Coerce<boolean> = (value) => (typeof value === 'boolean' ? value : undefined);
const asString: Coerce<string> = (value) => (typeof value === 'string' ? value : undefined);
const asNullableString: Coerce<string | null> = (value) =>
  value === null || typeof value === 'string' ? value : undefined;
const asTrackList: Coerce<number[]> = (value) => {
  if (!Array.isArray(value)) return undefined;
  const items: unknown[] = value;
  return items.every((item): item is number => typeof item === 'number' && Number.isInteger(item))
    ? [...items]
    : undefined;
};

/**
 * The closed set of fields a wire update may touch, each with the check
 * its value must pass before it is assigned.
 */
const FIELD_CODECS: { readonly [K in FieldName]: Coerce<DeviceState[K]> } = {
  statusCode: asInteger,
  error: asInteger,
  ballSpeed: asInteger,
  playlist: asTrackList,
  playlistIndex: asInteger,
  progress: asInteger,
  ledEffect: asString,
  ledColorId: asString,
  ledSpeed: asInteger,
  brightness: asInteger,
  brightnessMax: asInteger,
  color: asNullableString,
  busy: asBoolean,
  downloadProgress: asInteger,
  wifiConnected: asBoolean,
  repeatPlaylist: asBoolean,
  autoplay: asInteger,
  autoClean: asBoolean,
  softwareVersion: asNullableString,
  macAddress: asNullableString,
  wifiSsid: asNullableString,
  wifiIp: asNullableString,
  wifiPdns: asNullableString,
  wifiSdns: asNullableString,
  wifiGate: asNullableString,
  wifiSub: asNullableString,
  schedule: asNullableString,
  environment: asNullableString,
};

function isFieldName(key: string): key is FieldName {
  return Object.prototype.hasOwnProperty.call(FIELD_CODECS, key);
}

function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

function initialState(): DeviceState {
  return {
    statusCode: 0,
    error: 0,
    ballSpeed: BALL_SPEED_MIN,
    playlist: [],
    playlistIndex: 0,
    progress: 0,
    ledEffect: '0',
    ledColorId: '0',
    ledSpeed: 0,
    brightness: 0,
    brightnessMax: BRIGHTNESS_MAX_DEFAULT,
    color: null,
    busy: false,
    downloadProgress: 0,
    wifiConnected: false,
    repeatPlaylist: false,
    autoplay: 0,
    autoClean: false,
    softwareVersion: null,
    macAddress: null,
    wifiSsid: null,
    wifiIp: null,
    wifiPdns: null,
    wifiSdns: null,
    wifiGate: null,
    wifiSub: null,
    schedule: null,
    environment: null,
  };
}

export type UpdateListener = () => void;

export interface OasisDeviceOptions {
  catalog: Catalog;
  serialNumber?: string | null;
  model?: string | null;
  name?: string | null;
  ssid?: string | null;
  ipAddress?: string | null;
  metadata?: TrackMetadataSource | null;
  transport?: OasisTransport | null;
}

export interface LedOptions {
  ledEffect?: string;
  color?: string;
  ledSpeed?: number;
  brightness?: number;
}

export interface SetPlaylistOptions {
  /** Defaults to whether the device was playing before the change. */
  startPlaying?: boolean;
}

/**
 * Oasis device model and behaviour.
 *
 * Transport-agnostic: every command goes through the attached
 * `OasisTransport`, and every transport feeds state back in through
 * `applyFieldMap`.
 */
export class OasisDevice {
  static readonly manufacturer = 'Kinetic Oasis';

  readonly serialNumber: string | null;
  readonly model: string | null;
  readonly name: string;
  ssid: string | null;
  ipAddress: string | null;

  /** Last non-zero brightness, used to restore the light after sleep. */
  brightnessOn: number = BRIGHTNESS_DEFAULT;
  lastUpdated: Date | null = null;

  private readonly state: DeviceState = initialState();
  private readonly catalog: Catalog;
  private readonly metadata: TrackMetadataSource | null;
  private transportRef: OasisTransport | null;
  private listeners: UpdateListener[] = [];

  private cachedTrack: TrackInfo | null = null;
  private trackRefresh: AbortController | null = null;
  private trackRefreshTask: Promise<void> | null = null;

  constructor(options: OasisDeviceOptions) {
    this.catalog = options.catalog;
    this.serialNumber = options.serialNumber ?? null;
    this.model = options.model ?? null;
    this.name = options.name || `${this.model} ${this.serialNumber}`;
    this.ssid = options.ssid ?? null;
    this.ipAddress = options.ipAddress ?? null;
    this.metadata = options.metadata ?? null;
    this.transportRef = options.transport ?? null;
  }

  // ============ State ============

  get statusCode(): number {
    return this.state.statusCode;
  }

  get error(): number {
    return this.state.error;
  }

  get ballSpeed(): number {
    return this.state.ballSpeed;
  }

  get playlist(): readonly number[] {
    return this.state.playlist;
  }

  get playlistIndex(): number {
    return this.state.playlistIndex;
  }

  get progress(): number {
    return this.state.progress;
  }

  get ledEffect(): string {
    return this.state.ledEffect;
  }

  get ledColorId(): string {
    return this.state.ledColorId;
  }

  get ledSpeed(): number {
    return this.state.ledSpeed;
  }

  /**
   * Brightness as observed: 0 while sleeping, the stored value otherwise.
   */
  get brightness(): number {
    return this.isSleeping ? 0 : this.state.brightness;
  }

  /** Stored brightness, kept through sleep so playback resumes at the same level. */
  get rawBrightness(): number {
    return this.state.brightness;
  }

  get brightnessMax(): number {
    return this.state.brightnessMax;
  }

  get color(): string | null {
    return this.state.color;
  }

  get busy(): boolean {
    return this.state.busy;
  }

  get downloadProgress(): number {
    return this.state.downloadProgress;
  }

  get wifiConnected(): boolean {
    return this.state.wifiConnected;
  }

  get repeatPlaylist(): boolean {
    return this.state.repeatPlaylist;
  }

  get autoplay(): number {
    return this.state.autoplay;
  }

  get autoClean(): boolean {
    return this.state.autoClean;
  }

  get softwareVersion(): string | null {
    return this.state.softwareVersion;
  }

  get macAddress(): string | null {
    return this.state.macAddress;
  }

  get wifiSsid(): string | null {
    return this.state.wifiSsid;
  }

  get wifiIp(): string | null {
    return this.state.wifiIp;
  }

  get wifiPdns(): string | null {
    return this.state.wifiPdns;
  }

  get wifiSdns(): string | null {
    return this.state.wifiSdns;
  }

  get wifiGate(): string | null {
    return this.state.wifiGate;
  }

  get wifiSub(): string | null {
    return this.state.wifiSub;
  }

  get schedule(): string | null {
    return this.state.schedule;
  }

  get environment(): string | null {
    return this.state.environment;
  }

  // ============ Derived ============

  get isInitialized(): boolean {
    return Boolean(this.serialNumber && this.state.macAddress && this.state.softwareVersion);
  }

  get isSleeping(): boolean {
    return this.state.statusCode === STATUS.SLEEPING;
  }

  get isPlaying(): boolean {
    return this.state.statusCode === STATUS.PLAYING;
  }

  /**
   * Current track: the playlist entry at `playlistIndex`, or the first entry
   * once the index has run past the end.
   */
  get currentTrackId(): number | null {
    const { playlist, playlistIndex } = this.state;
    if (playlist.length === 0) return null;
    return playlistIndex >= playlist.length ? playlist[0] : playlist[playlistIndex];
  }

  get status(): string {
    const code = this.state.statusCode;
    return STATUS_LABELS.get(code) ?? `Unknown (${code})`;
  }

  /** Only set while the device reports the error status. */
  get errorMessage(): string | null {
    if (this.state.statusCode !== STATUS.ERROR) return null;
    return this.catalog.errorMessages.get(this.state.error) ?? `Unknown (${this.state.error})`;
  }

  get track(): TrackInfo | null {
    const trackId = this.currentTrackId;
    if (trackId === null || this.cachedTrack?.id !== trackId) return null;
    return this.cachedTrack;
  }

  get trackName(): string | null {
    const track = this.track;
    if (!track) return null;
    return track.name ?? unknownTrackName(track.id);
  }

  get trackImageUrl(): string | null {
    const image = this.track?.image;
    return image ? `${IMAGE_URL_BASE}${image}` : null;
  }

  get playlistDetails(): Map<number, TrackInfo> {
    const current = this.track;
    const details = new Map<number, TrackInfo>();
    for (const trackId of this.state.playlist) {
      details.set(
        trackId,
        current && current.id === trackId ? current : { id: trackId, name: unknownTrackName(trackId) }
      );
    }
    return details;
  }

  /** Resolves once the in-flight track metadata refresh, if any, has finished. */
  get pendingTrackRefresh(): Promise<void> | null {
    return this.trackRefreshTask;
  }

  toJSON(): DeviceState & { serialNumber: string | null } {
    return { serialNumber: this.serialNumber, ...this.state, playlist: [...this.state.playlist] };
  }

  // ============ Updates ============

  /**
   * Applies a decoded update. Unknown keys and values of the wrong type are
   * logged and skipped. Returns whether anything changed.
   */
  applyFieldMap(updates: FieldMap | Readonly<Record<string, unknown>>): boolean {
    let changed = false;
    let trackChanged = false;

    for (const [key, value] of Object.entries(updates)) {
      if (value === undefined) continue;
      if (!isFieldName(key)) {
        log.warn(new UnknownFieldError(key, value).message, { serialNumber: this.serialNumber });
        continue;
      }
      if (this.applyCoerced(key, value)) {
        changed = true;
        if (key === 'playlist' || key === 'playlistIndex') trackChanged = true;
      }
    }

    if (this.clampPlaylistIndex()) {
      changed = true;
      trackChanged = true;
    }

    if (trackChanged) {
      this.scheduleTrackRefresh();
    }

    if (changed) {
      this.notifyListeners();
    }

    this.lastUpdated = new Date();
    return changed;
  }

  /**
   * Parses a full status snapshot and applies it. Malformed input is logged
   * and leaves the state untouched.
   */
  applyStatusString(raw: string): boolean {
    const result = parseFullStatus(raw);
    if (!result.ok) {
      log.warn(result.error.message, { serialNumber: this.serialNumber, raw });
      return false;
    }
    return this.applyFieldMap(result.value);
  }

  private applyCoerced<K extends FieldName>(name: K, raw: unknown): boolean {
    const value = FIELD_CODECS[name](raw);
    if (value === undefined) {
      log.warn(`Invalid value for ${name}: ${JSON.stringify(raw)}`, { serialNumber: this.serialNumber });
      return false;
    }
    return this.applyField(name, value);
  }

  private applyField<K extends FieldName>(name: K, value: DeviceState[K]): boolean {
    const previous = this.state[name];
    if (sameValue(previous, value)) return false;

    log.debug(`${this.serialNumber} ${name} changed: '${String(previous)}' -> '${String(value)}'`);
    this.state[name] = value;
    if (name === 'brightness' && this.state.brightness) {
      this.brightnessOn = this.state.brightness;
    }
    return true;
  }

  private clampPlaylistIndex(): boolean {
    const { playlist, playlistIndex } = this.state;
    const clamped = Math.max(0, Math.min(playlistIndex, playlist.length));
    if (clamped === playlistIndex) return false;
    this.state.playlistIndex = clamped;
    return true;
  }

  /**
   * Registers a zero-argument callback run after every state change.
   * The returned function unsubscribes it; calling it twice is harmless.
   */
  addUpdateListener(listener: UpdateListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((registered) => registered !== listener);
    };
  }

  private notifyListeners(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (error) {
        log.error('Error in update listener', { serialNumber: this.serialNumber, error: errorMessage(error) });
      }
    }
  }

  // ============ Track metadata ============

  private scheduleTrackRefresh(): void {
    if (!this.metadata) return;

    this.trackRefresh?.abort();
    const controller = new AbortController();
    this.trackRefresh = controller;
    this.trackRefreshTask = this.refreshCurrentTrack(this.metadata, controller.signal);
  }

  private async refreshCurrentTrack(metadata: TrackMetadataSource, signal: AbortSignal): Promise<void> {
    const trackId = this.currentTrackId;
    if (trackId === null) {
      this.cachedTrack = null;
      return;
    }
    if (this.cachedTrack?.id === trackId) return;

    let track: TrackInfo | null;
    try {
      track = await metadata.getTrackInfo(trackId);
    } catch (error) {
      if (!signal.aborted) {
        log.error(`Error fetching track info for ${trackId}`, { error: errorMessage(error) });
      }
      return;
    }

    if (signal.aborted || !track) return;

    this.cachedTrack = track;
    this.notifyListeners();
  }

  // ============ Transport ============

  get transport(): OasisTransport | null {
    return this.transportRef;
  }

  attachTransport(transport: OasisTransport): void {
    this.transportRef = transport;
  }

  private requireTransport(): OasisTransport {
    if (!this.transportRef) {
      throw new NoTransportError(this.serialNumber);
    }
    return this.transportRef;
  }

  // ============ Commands ============

  async refreshStatus(): Promise<void> {
    await this.requireTransport().getStatus(this);
  }

  /**
   * The MAC address, asking the transport when it is not known yet.
   */
  async getMacAddress(): Promise<string | null> {
    if (this.state.macAddress) return this.state.macAddress;

    const mac = await this.requireTransport().getMacAddress(this);
    if (mac) {
      this.applyFieldMap({ macAddress: mac });
    }
    return mac;
  }

  async setAutoClean(autoClean: boolean): Promise<void> {
    await this.requireTransport().sendAutoCleanCommand(this, autoClean);
  }

  async setBallSpeed(speed: number): Promise<void> {
    if (!Number.isInteger(speed) || speed < BALL_SPEED_MIN || speed > BALL_SPEED_MAX) {
      throw new ValidationError(
        `Invalid speed specified: ${speed} (expected ${BALL_SPEED_MIN}-${BALL_SPEED_MAX})`,
        'ballSpeed'
      );
    }
    await this.requireTransport().sendBallSpeedCommand(this, speed);
  }

  /**
   * Sets the LED effect, color, speed and brightness. Omitted values keep
   * the device's current setting.
   */
  async setLed(options: LedOptions = {}): Promise<void> {
    const ledEffect = options.ledEffect ?? this.state.ledEffect;
    const color = options.color ?? this.state.color ?? DEFAULT_COLOR;
    const ledSpeed = options.ledSpeed ?? this.state.ledSpeed;
    const brightness = options.brightness ?? this.brightness;

    if (!this.catalog.ledEffects.has(ledEffect)) {
      throw new ValidationError(`Invalid led effect specified: ${ledEffect}`, 'ledEffect');
    }
    if (!Number.isInteger(ledSpeed) || ledSpeed < LED_SPEED_MIN || ledSpeed > LED_SPEED_MAX) {
      throw new ValidationError(
        `Invalid led speed specified: ${ledSpeed} (expected ${LED_SPEED_MIN}-${LED_SPEED_MAX})`,
        'ledSpeed'
      );
    }
    if (!Number.isInteger(brightness) || brightness < 0 || brightness > this.state.brightnessMax) {
      throw new ValidationError(
        `Invalid brightness specified: ${brightness} (expected 0-${this.state.brightnessMax})`,
        'brightness'
      );
    }

    await this.requireTransport().sendLedCommand(this, ledEffect, color, ledSpeed, brightness);
  }

  async sleep(): Promise<void> {
    await this.requireTransport().sendSleepCommand(this);
  }

  async moveTrack(fromIndex: number, toIndex: number): Promise<void> {
    assertIndex(fromIndex, 'fromIndex');
    assertIndex(toIndex, 'toIndex');
    await this.requireTransport().sendMoveJobCommand(this, fromIndex, toIndex);
  }

  async changeTrack(index: number): Promise<void> {
    assertIndex(index, 'index');
    await this.requireTransport().sendChangeTrackCommand(this, index);
  }

  async addTrackToPlaylist(track: number | Iterable<number>): Promise<void> {
    const tracks = typeof track === 'number' ? [track] : [...track];
    await this.requireTransport().sendAddJobListCommand(this, tracks);
  }

  /**
   * Replaces the playlist. The firmware needs playback stopped first;
   * playback restarts only for a non-empty list, and only if the device was
   * playing or `startPlaying` asks for it.
   */
  async setPlaylist(playlist: number | Iterable<number>, options: SetPlaylistOptions = {}): Promise<void> {
    const tracks = typeof playlist === 'number' ? [playlist] : [...playlist];
    const startPlaying = options.startPlaying ?? this.isPlaying;

    const transport = this.requireTransport();
    await transport.sendStopCommand(this);
    await transport.sendSetPlaylistCommand(this, tracks);
    if (startPlaying && tracks.length > 0) {
      await transport.sendPlayCommand(this);
    }
  }

  async clearPlaylist(): Promise<void> {
    await this.setPlaylist([]);
  }

  async setRepeatPlaylist(repeat: boolean): Promise<void> {
    await this.requireTransport().sendSetRepeatPlaylistCommand(this, repeat);
  }

  /**
   * Sets the wait-after option. `true` means play immediately ("0"),
   * `false` disables autoplay ("1").
   */
  async setAutoplay(option: boolean | number | string): Promise<void> {
    const value = typeof option === 'boolean' ? (option ? '0' : '1') : String(option);
    await this.requireTransport().sendSetAutoplayCommand(this, value);
  }

  async upgrade(beta = false): Promise<void> {
    await this.requireTransport().sendUpgradeCommand(this, beta);
  }

  async play(): Promise<void> {
    await this.requireTransport().sendPlayCommand(this);
  }

  async pause(): Promise<void> {
    await this.requireTransport().sendPauseCommand(this);
  }

  async stop(): Promise<void> {
    await this.requireTransport().sendStopCommand(this);
  }

  async reboot(): Promise<void> {
    await this.requireTransport().sendRebootCommand(this);
  }
}

function assertIndex(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`Invalid ${field} specified: ${value}`, field);
  }
}
