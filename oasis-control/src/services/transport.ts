import type { OasisDevice } from '../device/device.js';

/**
 * Transport contract every device client implements (MQTT, local HTTP).
 *
 * Commands issued by different callers may arrive in any order; a transport
 * serializes them internally.
 */
export interface OasisTransport {
  /** Requests a status refresh; the result lands in the device through its update path. */
  getStatus(device: OasisDevice): Promise<void>;
  /** Requests the full state snapshot plus schedule. */
  getAll(device: OasisDevice): Promise<void>;
  getMacAddress(device: OasisDevice): Promise<string | null>;

  sendAutoCleanCommand(device: OasisDevice, autoClean: boolean): Promise<void>;
  sendBallSpeedCommand(device: OasisDevice, speed: number): Promise<void>;
  sendLedCommand(
    device: OasisDevice,
    ledEffect: string,
    color: string,
    ledSpeed: number,
    brightness: number
  ): Promise<void>;
  sendSleepCommand(device: OasisDevice): Promise<void>;
  sendMoveJobCommand(device: OasisDevice, fromIndex: number, toIndex: number): Promise<void>;
  sendChangeTrackCommand(device: OasisDevice, index: number): Promise<void>;
  sendAddJobListCommand(device: OasisDevice, tracks: readonly number[]): Promise<void>;
  sendSetPlaylistCommand(device: OasisDevice, playlist: readonly number[]): Promise<void>;
  sendSetRepeatPlaylistCommand(device: OasisDevice, repeat: boolean): Promise<void>;
  sendSetAutoplayCommand(device: OasisDevice, option: string): Promise<void>;
  sendUpgradeCommand(device: OasisDevice, beta: boolean): Promise<void>;
  sendPlayCommand(device: OasisDevice): Promise<void>;
  sendPauseCommand(device: OasisDevice): Promise<void>;
  sendStopCommand(device: OasisDevice): Promise<void>;
  sendRebootCommand(device: OasisDevice): Promise<void>;

  /** Releases resources the transport owns. */
  close(): Promise<void>;
}
