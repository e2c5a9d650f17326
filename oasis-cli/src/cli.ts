import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  Catalog,
  loadCatalog,
  OasisCloudClient,
  OasisDevice,
  OasisHttpClient,
  OasisMqttClient,
  ValidationError,
} from 'oasis-control';
import { config } from './config.js';
import { formatCloudDevice, formatStatus, formatUpdate } from './format.js';

export interface CliDeps {
  catalog: Catalog;
  print: (line: string) => void;
  createHttpClient: (host: string) => OasisHttpClient;
  createMqttClient: () => OasisMqttClient;
  createCloudClient: (accessToken?: string) => OasisCloudClient;
  /** Resolves when the user asks a long-running command to end. */
  untilInterrupted: () => Promise<void>;
}

export function defaultDeps(): CliDeps {
  return {
    catalog: loadCatalog(),
    print: (line) => console.log(line),
    createHttpClient: (host) => new OasisHttpClient({ host }),
    createMqttClient: () => new OasisMqttClient(),
    createCloudClient: (accessToken) =>
      new OasisCloudClient({ accessToken: accessToken ?? config.cloud.accessToken }),
    untilInterrupted: () => new Promise((resolve) => process.once('SIGINT', () => resolve())),
  };
}

type Action = (device: OasisDevice, args: string[]) => Promise<void>;

function integerArg(value: string | undefined, name: string): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isInteger(parsed)) {
    throw new ValidationError(`Invalid ${name}: ${value ?? '(missing)'}`, name);
  }
  return parsed;
}

function switchArg(value: string | undefined, name: string): boolean {
  if (value === 'on') return true;
  if (value === 'off') return false;
  throw new ValidationError(`Invalid ${name}: expected on or off`, name);
}

const ACTIONS = new Map<string, Action>([
  ['play', (device) => device.play()],
  ['pause', (device) => device.pause()],
  ['stop', (device) => device.stop()],
  ['sleep', (device) => device.sleep()],
  ['reboot', (device) => device.reboot()],
  ['speed', (device, [speed]) => device.setBallSpeed(integerArg(speed, 'speed'))],
  ['track', (device, [index]) => device.changeTrack(integerArg(index, 'index'))],
  ['playlist', (device, ids) => device.setPlaylist(ids.map((id) => integerArg(id, 'track id')))],
  ['repeat', (device, [value]) => device.setRepeatPlaylist(switchArg(value, 'repeat'))],
]);

function parseIntegerOption(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

interface Target {
  host?: string;
  serial?: string;
}

interface Session {
  device: OasisDevice;
  close: () => Promise<void>;
}

/**
 * Connects to a device over HTTP (`host`) or MQTT (`serial`) and loads its
 * current state.
 */
async function openSession(deps: CliDeps, target: Target, timeout: number): Promise<Session> {
  if (target.host) {
    const client = deps.createHttpClient(target.host);
    const device = new OasisDevice({
      catalog: deps.catalog,
      name: target.host,
      ipAddress: target.host,
      transport: client,
    });
    try {
      await device.refreshStatus();
    } catch (error) {
      await client.close();
      throw error;
    }
    return { device, close: () => client.close() };
  }

  if (target.serial) {
    const mqtt = deps.createMqttClient();
    const cloud = deps.createCloudClient();
    const device = new OasisDevice({
      catalog: deps.catalog,
      serialNumber: target.serial,
      name: target.serial,
      metadata: cloud.accessToken ? cloud : null,
    });
    mqtt.registerDevice(device);
    mqtt.start();

    if (!(await mqtt.waitUntilReady(device, timeout))) {
      await mqtt.stop();
      throw new Error(`Device ${target.serial} did not become ready within ${timeout} ms`);
    }
    return {
      device,
      close: async () => {
        await mqtt.stop();
        await cloud.close();
      },
    };
  }

  throw new ValidationError('Either --host or --serial is required');
}

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('oasis')
    .description('Control Oasis kinetic sand tables over the local HTTP API or the cloud MQTT broker')
    .version('1.0.0');

  program
    .command('status')
    .description('Show the status of a device on the local network')
    .requiredOption('--host <host>', 'Device IP address or host name')
    .action(async (options: { host: string }) => {
      const session = await openSession(deps, { host: options.host }, 0);
      try {
        for (const line of formatStatus(session.device, deps.catalog)) deps.print(line);
      } finally {
        await session.close();
      }
    });

  program
    .command('watch')
    .description('Follow state updates of a device until interrupted')
    .requiredOption('--serial <serial>', 'Device serial number')
    .option('--timeout <ms>', 'Readiness timeout in milliseconds', parseIntegerOption, config.watch.readyTimeout)
    .action(async (options: { serial: string; timeout: number }) => {
      const session = await openSession(deps, { serial: options.serial }, options.timeout);
      try {
        for (const line of formatStatus(session.device, deps.catalog)) deps.print(line);
        const unsubscribe = session.device.addUpdateListener(() => deps.print(formatUpdate(session.device)));
        deps.print(chalk.gray('Watching for updates, press Ctrl-C to stop'));
        await deps.untilInterrupted();
        unsubscribe();
      } finally {
        await session.close();
      }
    });

  program
    .command('send')
    .description('Send a command to a device')
    .argument('<action>', `One of: ${[...ACTIONS.keys()].join(', ')}`)
    .argument('[args...]', 'Action arguments')
    .option('--host <host>', 'Device IP address or host name (local HTTP)')
    .option('--serial <serial>', 'Device serial number (MQTT)')
    .option('--timeout <ms>', 'Readiness timeout in milliseconds', parseIntegerOption, config.watch.readyTimeout)
    .action(async (action: string, args: string[], options: Target & { timeout: number }) => {
      const run = ACTIONS.get(action);
      if (!run) {
        throw new ValidationError(`Unknown action: ${action}`, 'action');
      }

      const session = await openSession(deps, options, options.timeout);
      try {
        await run(session.device, args);
        deps.print(chalk.green(`✓ ${action} sent to ${session.device.name}`));
      } finally {
        await session.close();
      }
    });

  program
    .command('devices')
    .description('List the devices linked to a cloud account')
    .option('--token <token>', 'Cloud access token (defaults to OASIS_ACCESS_TOKEN)')
    .action(async (options: { token?: string }) => {
      const cloud = deps.createCloudClient(options.token);
      try {
        const devices = await cloud.getDevices();
        if (devices.length === 0) {
          deps.print(chalk.yellow('No devices found'));
          return;
        }
        for (const device of devices) deps.print(formatCloudDevice(device));
      } finally {
        await cloud.close();
      }
    });

  return program;
}
