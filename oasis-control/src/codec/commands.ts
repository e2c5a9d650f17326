/**
 * Outbound commands. Each one encodes to a single key/value pair: the HTTP
 * transport sends it as a query parameter, the MQTT transport publishes
 * `KEY=value` (or the bare key when the value is empty).
 */
export type OasisCommand =
  | { type: 'ballSpeed'; speed: number }
  | { type: 'led'; effect: string; color: string; speed: number; brightness: number }
  | { type: 'sleep' }
  | { type: 'moveJob'; from: number; to: number }
  | { type: 'changeTrack'; index: number }
  | { type: 'addJobList'; tracks: readonly number[] }
  | { type: 'setJobList'; tracks: readonly number[] }
  | { type: 'repeatPlaylist'; repeat: boolean }
  | { type: 'autoplay'; option: string }
  | { type: 'autoClean'; enabled: boolean }
  | { type: 'upgrade'; beta: boolean }
  | { type: 'play' }
  | { type: 'pause' }
  | { type: 'stop' }
  | { type: 'reboot' }
  | { type: 'getStatus' }
  | { type: 'getAll' }
  | { type: 'getMac' };

export interface EncodedCommand {
  key: string;
  value: string;
}

const flag = (value: boolean): string => (value ? '1' : '0');
const csv = (tracks: readonly number[]): string => tracks.join(',');

export function encodeCommand(command: OasisCommand): EncodedCommand {
  switch (command.type) {
    case 'ballSpeed':
      return { key: 'WRIOASISSPEED', value: String(command.speed) };
    case 'led':
      return {
        key: 'WRILED',
        value: `${command.effect};0;${command.color};${command.speed};${command.brightness}`,
      };
    case 'sleep':
      return { key: 'CMDSLEEP', value: '' };
    case 'moveJob':
      return { key: 'MOVEJOB', value: `${command.from};${command.to}` };
    case 'changeTrack':
      return { key: 'CMDCHANGETRACK', value: String(command.index) };
    case 'addJobList':
      return { key: 'ADDJOBLIST', value: csv(command.tracks) };
    case 'setJobList':
      return { key: 'WRIJOBLIST', value: csv(command.tracks) };
    case 'repeatPlaylist':
      return { key: 'WRIREPEATJOB', value: flag(command.repeat) };
    case 'autoplay':
      return { key: 'WRIWAITAFTER', value: command.option };
    case 'autoClean':
      return { key: 'WRIAUTOCLEAN', value: flag(command.enabled) };
    case 'upgrade':
      return { key: 'CMDUPGRADE', value: flag(command.beta) };
    case 'play':
      return { key: 'CMDPLAY', value: '' };
    case 'pause':
      return { key: 'CMDPAUSE', value: '' };
    case 'stop':
      return { key: 'CMDSTOP', value: '' };
    case 'reboot':
      return { key: 'CMDBOOT', value: '' };
    case 'getStatus':
      return { key: 'GETSTATUS', value: '' };
    case 'getAll':
      return { key: 'GETALL', value: '' };
    case 'getMac':
      return { key: 'GETMAC', value: '' };
  }
}

export function toQueryParams(command: EncodedCommand): Record<string, string> {
  return { [command.key]: command.value };
}

export function toMessagePayload(command: EncodedCommand): string {
  return command.value === '' ? command.key : `${command.key}=${command.value}`;
}

/**
 * Commands that bring a sleeping device back up.
 */
export function isWakeCommand(command: OasisCommand): boolean {
  if (command.type === 'play') return true;
  if (command.type === 'led') return command.brightness > 0;
  return false;
}
