import chalk from 'chalk';
import { Catalog, CloudDevice, OasisDevice } from 'oasis-control';

const row = (label: string, value: string): string => `${chalk.gray(`${label}:`.padEnd(13))} ${value}`;

const onOff = (value: boolean): string => (value ? 'on' : 'off');

export function formatTrack(device: OasisDevice): string {
  const trackId = device.currentTrackId;
  if (trackId === null) return '(none)';

  const position = `${Math.min(device.playlistIndex, device.playlist.length - 1) + 1}/${device.playlist.length}`;
  const name = device.trackName;
  return name ? `${position} #${trackId} ${name}` : `${position} #${trackId}`;
}

/**
 * Multi-line summary of the device state.
 */
export function formatStatus(device: OasisDevice, catalog: Catalog): string[] {
  const status = device.errorMessage ? chalk.red(`${device.status} (${device.errorMessage})`) : chalk.cyan(device.status);
  const effect = catalog.ledEffects.get(device.ledEffect) ?? device.ledEffect;
  const autoplay =
    catalog.autoplayOptions.find((option) => option.value === String(device.autoplay))?.label ?? String(device.autoplay);

  return [
    chalk.bold(device.name),
    row('Status', status),
    row('Ball speed', String(device.ballSpeed)),
    row('Playlist', device.playlist.length ? device.playlist.join(', ') : '(empty)'),
    row('Track', formatTrack(device)),
    row('Progress', String(device.progress)),
    row('LED', `${effect} ${device.color ?? '-'} speed ${device.ledSpeed}`),
    row('Brightness', `${device.brightness}/${device.brightnessMax}`),
    row('Repeat', onOff(device.repeatPlaylist)),
    row('Autoplay', autoplay),
    row('Auto-clean', onOff(device.autoClean)),
    row('Software', device.softwareVersion ?? '-'),
    row('MAC', device.macAddress ?? '-'),
  ];
}

/** One-line form used while watching for updates. */
export function formatUpdate(device: OasisDevice): string {
  return `${chalk.gray(new Date().toISOString())} ${device.status} track ${formatTrack(device)} progress ${device.progress}`;
}

export function formatCloudDevice(device: CloudDevice): string {
  return `${chalk.bold(device.serial_number)}  ${device.name ?? '-'}  ${chalk.gray(device.model ?? '-')}`;
}
