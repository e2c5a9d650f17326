export const STATUS = {
  BOOTING: 0,
  STOPPED: 2,
  CENTERING: 3,
  PLAYING: 4,
  PAUSED: 5,
  SLEEPING: 6,
  ERROR: 9,
  UPDATING: 11,
  DOWNLOADING: 13,
  BUSY: 14,
  LIVE: 15,
} as const;

export type StatusName = keyof typeof STATUS;
export type StatusCode = (typeof STATUS)[StatusName];

export const STATUS_LABELS: ReadonlyMap<number, string> = new Map<number, string>([
  [STATUS.BOOTING, 'booting'],
  [STATUS.STOPPED, 'stopped'],
  [STATUS.CENTERING, 'centering'],
  [STATUS.PLAYING, 'playing'],
  [STATUS.PAUSED, 'paused'],
  [STATUS.SLEEPING, 'sleeping'],
  [STATUS.ERROR, 'error'],
  [STATUS.UPDATING, 'updating'],
  [STATUS.DOWNLOADING, 'downloading'],
  [STATUS.BUSY, 'busy'],
  [STATUS.LIVE, 'live'],
]);

export const BALL_SPEED_MIN = 100;
export const BALL_SPEED_MAX = 400;
export const LED_SPEED_MIN = -90;
export const LED_SPEED_MAX = 90;
export const BRIGHTNESS_DEFAULT = 100;
export const BRIGHTNESS_MAX_DEFAULT = 200;
export const DEFAULT_COLOR = '#ffffff';

export const IMAGE_URL_BASE = 'https://app.grounded.so/uploads/';

export function unknownTrackName(trackId: number): string {
  return `Unknown Title (#${trackId})`;
}
