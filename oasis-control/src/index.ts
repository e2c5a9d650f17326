export { loadCatalog, DEFAULT_DATA_DIR } from './catalog.js';
export type { Catalog } from './catalog.js';
export { default as config, loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export * from './constants.js';
export * from './errors.js';
export {
  MIN_STATUS_FIELDS,
  FULL_STATUS_TOPIC,
  isKnownTopic,
  parseBit,
  parseFullStatus,
  parseInteger,
  parsePlaylist,
  parseTopicValue,
} from './codec/status-codec.js';
export type { ParseResult, TopicParseResult } from './codec/status-codec.js';
export { encodeCommand, isWakeCommand, toMessagePayload, toQueryParams } from './codec/commands.js';
export type { EncodedCommand, OasisCommand } from './codec/commands.js';
export { OasisDevice } from './device/device.js';
export type { LedOptions, OasisDeviceOptions, SetPlaylistOptions, UpdateListener } from './device/device.js';
export type { OasisTransport } from './services/transport.js';
export { CommandTransport } from './services/command-transport.js';
export { OasisHttpClient } from './services/http-client.js';
export type { OasisHttpClientOptions } from './services/http-client.js';
export { OasisMqttClient, connectMqtt, commandTopic, statusTopic } from './services/mqtt-client.js';
export type {
  BrokerConnection,
  BrokerConnector,
  BrokerOptions,
  ConnectionState,
  OasisMqttClientEvents,
  OasisMqttClientOptions,
} from './services/mqtt-client.js';
export { MetadataCache } from './services/metadata-cache.js';
export type { MetadataCacheOptions } from './services/metadata-cache.js';
export { OasisCloudClient, getTrackIdsFromPlaylist } from './services/cloud-client.js';
export type { OasisCloudClientOptions } from './services/cloud-client.js';
export { createDevicesFromCloud } from './services/device-registry.js';
export type { DeviceRegistryDeps } from './services/device-registry.js';
export type {
  CloudDevice,
  DeviceState,
  FieldMap,
  FieldName,
  PlaylistInfo,
  SoftwareDetails,
  TrackInfo,
  TrackMetadataSource,
} from './types/device.js';
export { default as logger, getLogger } from './utils/logger.js';
