import { Catalog } from '../catalog.js';
import { OasisDevice } from '../device/device.js';
import { CloudDevice, TrackMetadataSource } from '../types/device.js';
import { getLogger } from '../utils/logger.js';
import { OasisMqttClient } from './mqtt-client.js';

const log = getLogger('device-registry');

export interface DeviceRegistryDeps {
  catalog: Catalog;
  mqtt: OasisMqttClient;
  metadata?: TrackMetadataSource | null;
}

/**
 * Builds a device for every entry of the cloud listing and registers it with
 * the MQTT client. Entries without a serial number are skipped.
 */
export function createDevicesFromCloud(listing: readonly CloudDevice[], deps: DeviceRegistryDeps): OasisDevice[] {
  const devices: OasisDevice[] = [];

  for (const entry of listing) {
    if (!entry.serial_number) {
      log.warn('Skipping cloud device without serial number');
      continue;
    }

    const device = new OasisDevice({
      catalog: deps.catalog,
      serialNumber: entry.serial_number,
      model: entry.model ?? null,
      name: entry.name ?? null,
      metadata: deps.metadata ?? null,
    });
    deps.mqtt.registerDevice(device);
    devices.push(device);
  }

  log.info(`Registered ${devices.length} cloud device(s)`);
  return devices;
}
