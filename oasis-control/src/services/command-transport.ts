import type { OasisDevice } from '../device/device.js';
import { OasisCommand } from '../codec/commands.js';
import { OasisTransport } from './transport.js';

/**
 * Maps every `send*Command` of the transport contract onto one `dispatch`
 * call, so concrete transports only decide how a command reaches the wire.
 */
export abstract class CommandTransport implements OasisTransport {
  protected abstract dispatch(device: OasisDevice, command: OasisCommand): Promise<void>;

  abstract getStatus(device: OasisDevice): Promise<void>;
  abstract getMacAddress(device: OasisDevice): Promise<string | null>;
  abstract close(): Promise<void>;

  async getAll(device: OasisDevice): Promise<void> {
    await this.dispatch(device, { type: 'getAll' });
  }

  async sendAutoCleanCommand(device: OasisDevice, autoClean: boolean): Promise<void> {
    await this.dispatch(device, { type: 'autoClean', enabled: autoClean });
  }

  async sendBallSpeedCommand(device: OasisDevice, speed: number): Promise<void> {
    await this.dispatch(device, { type: 'ballSpeed', speed });
  }

  async sendLedCommand(
    device: OasisDevice,
    ledEffect: string,
    color: string,
    ledSpeed: number,
    brightness: number
  ): Promise<void> {
    await this.dispatch(device, { type: 'led', effect: ledEffect, color, speed: ledSpeed, brightness });
  }

  async sendSleepCommand(device: OasisDevice): Promise<void> {
    await this.dispatch(device, { type: 'sleep' });
  }

  async sendMoveJobCommand(device: OasisDevice, fromIndex: number, toIndex: number): Promise<void> {
    await this.dispatch(device, { type: 'moveJob', from: fromIndex, to: toIndex });
  }

  async sendChangeTrackCommand(device: OasisDevice, index: number): Promise<void> {
    await this.dispatch(device, { type: 'changeTrack', index });
  }

  async sendAddJobListCommand(device: OasisDevice, tracks: readonly number[]): Promise<void> {
    await this.dispatch(device, { type: 'addJobList', tracks });
  }

  async sendSetPlaylistCommand(device: OasisDevice, playlist: readonly number[]): Promise<void> {
    await this.dispatch(device, { type: 'setJobList', tracks: playlist });
    // optimistic local update; the device confirms with its next JOBLIST
    device.applyFieldMap({ playlist: [...playlist] });
  }

  async sendSetRepeatPlaylistCommand(device: OasisDevice, repeat: boolean): Promise<void> {
    await this.dispatch(device, { type: 'repeatPlaylist', repeat });
  }

  async sendSetAutoplayCommand(device: OasisDevice, option: string): Promise<void> {
    await this.dispatch(device, { type: 'autoplay', option });
  }

  async sendUpgradeCommand(device: OasisDevice, beta: boolean): Promise<void> {
    await this.dispatch(device, { type: 'upgrade', beta });
  }

  async sendPlayCommand(device: OasisDevice): Promise<void> {
    await this.dispatch(device, { type: 'play' });
  }

  async sendPauseCommand(device: OasisDevice): Promise<void> {
    await this.dispatch(device, { type: 'pause' });
  }

  async sendStopCommand(device: OasisDevice): Promise<void> {
    await this.dispatch(device, { type: 'stop' });
  }

  async sendRebootCommand(device: OasisDevice): Promise<void> {
    await this.dispatch(device, { type: 'reboot' });
  }
}
