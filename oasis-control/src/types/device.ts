/**
 * Mutable status fields of a device, as reported over either transport.
 */
export interface DeviceState {
  statusCode: number;
  error: number;
  ballSpeed: number;
  playlist: number[];
  playlistIndex: number;
  progress: number;
  ledEffect: string;
  ledColorId: string;
  ledSpeed: number;
  brightness: number;
  brightnessMax: number;
  color: string | null;
  busy: boolean;
  downloadProgress: number;
  wifiConnected: boolean;
  repeatPlaylist: boolean;
  autoplay: number;
  autoClean: boolean;
  softwareVersion: string | null;
  macAddress: string | null;
  wifiSsid: string | null;
  wifiIp: string | null;
  wifiPdns: string | null;
  wifiSdns: string | null;
  wifiGate: string | null;
  wifiSub: string | null;
  schedule: string | null;
  environment: string | null;
}

export type FieldName = keyof DeviceState;

/** A partial update decoded from the wire. */
export type FieldMap = Partial<DeviceState>;

export interface TrackInfo {
  id: number;
  name?: string;
  image?: string | null;
  reduced_svg_content_new?: number | null;
  [key: string]: unknown;
}

export interface PlaylistInfo {
  id: number;
  name: string;
  patterns: TrackInfo[];
  [key: string]: unknown;
}

export interface SoftwareDetails {
  version: string;
  [key: string]: unknown;
}

export interface CloudDevice {
  serial_number: string;
  name?: string | null;
  model?: string | null;
  [key: string]: unknown;
}

/**
 * Lookup used by a device to resolve the metadata of its current track.
 */
export interface TrackMetadataSource {
  getTrackInfo(trackId: number): Promise<TrackInfo | null>;
}
