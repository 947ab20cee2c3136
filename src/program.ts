import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import * as fs from 'fs/promises';
import {
  AUTH_TYPES,
  type AuthType,
  DEFAULT_AUTH_TYPE,
  ERROR_CORRECTION_LEVELS,
  type ErrorCorrectionLevel,
  OUTPUT_FORMATS,
  type OutputFormat,
  type WifiConfig
} from './interfaces/wifi.interface';
import { WifiQrService } from './services/wifi-qr.service';
import { ConfigError, ConfigManager } from './utils/config.util';
import {
  colorize,
  formatError,
  formatSectionHeader,
  formatStatusLine,
  supportsColor
} from './utils/display.util';
import { stripLineEnding } from './utils/stdin.util';
import { buildWifiRecord } from './utils/validation.util';

export const VERSION = '0.1.0';

export interface OutputStream {
  write(chunk: string | Uint8Array): unknown;
  isTTY?: boolean;
}

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
  isStdinTTY: boolean;
  readStdin(): Promise<string>;
  configManager: ConfigManager;
}

interface CredentialOptions {
  authenticationType?: AuthType;
  password?: string;
  hidden?: boolean;
}

interface GenerateOptions extends CredentialOptions {
  format: OutputFormat;
  errorLevel: ErrorCorrectionLevel;
  output?: string;
  config?: string;
  printRecord?: boolean;
}

/**
 * Parse an authentication type the way users tend to type it.
 * WPA2 and WPA3 share the WPA token; "open" and "none" mean nopass.
 */
export function parseAuthType(value: string): AuthType {
  switch (value.toLowerCase()) {
    case 'wep':
      return 'WEP';
    case 'wpa':
    case 'wpa2':
    case 'wpa3':
      return 'WPA';
    case 'nopass':
    case 'open':
    case 'none':
      return 'nopass';
  }
  throw new InvalidArgumentError(`Allowed choices are ${AUTH_TYPES.join(', ')}.`);
}

function parseErrorLevel(value: string): ErrorCorrectionLevel {
  const level = ERROR_CORRECTION_LEVELS.find(l => l === value.toUpperCase());
  if (!level) {
    throw new InvalidArgumentError(`Allowed choices are ${ERROR_CORRECTION_LEVELS.join(', ')}.`);
  }
  return level;
}

function addCredentialOptions(command: Command): Command {
  return command
    .option('-t, --authentication-type <type>', `Wi-Fi authentication type: ${AUTH_TYPES.join(', ')} (default: ${DEFAULT_AUTH_TYPE})`, parseAuthType)
    .option('-p, --password <password>', "Wi-Fi password (ignored if authentication-type is 'nopass')")
    .option('-H, --hidden', 'Option to specify when SSID is hidden')
    .option('--no-hidden', 'Mark the SSID as broadcast (overrides a saved profile)');
}

/**
 * Merge command line values over an optional saved profile.
 * Reads the SSID from stdin when it is neither given nor saved.
 */
async function resolveConfig(
  io: CliIO,
  ssidArg: string | undefined,
  options: CredentialOptions,
  base: WifiConfig | null = null
): Promise<WifiConfig> {
  let ssid = ssidArg ?? base?.ssid;
  if (ssid === undefined && !io.isStdinTTY) {
    ssid = stripLineEnding(await io.readStdin());
  }

  const authType = options.authenticationType ?? base?.password.authType ?? DEFAULT_AUTH_TYPE;
  const password = authType === 'nopass' ? undefined : options.password ?? base?.password.value;

  return {
    ssid: ssid ?? '',
    password: { value: password, authType },
    hidden: options.hidden ?? base?.hidden ?? false,
  };
}

function writeText(stream: OutputStream, text: string): void {
  stream.write(text.endsWith('\n') ? text : text + '\n');
}

async function loadProfile(io: CliIO, name: string): Promise<WifiConfig> {
  const config = await io.configManager.loadConfig(name);
  if (!config) {
    throw new ConfigError(`No saved profile named "${name}"`);
  }
  return config;
}

export function createProgram(io: CliIO, service = new WifiQrService()): Command {
  const color = supportsColor(io.stdout);
  const program = new Command();

  program
    .name('wifiqr')
    .description('A CLI Wi-Fi QR Code Generator')
    .version(VERSION)
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => { io.stdout.write(str); },
      writeErr: (str) => { io.stderr.write(str); },
    })
    .addHelpText('after', [
      '',
      'Examples:',
      '  wifiqr SSID -p PASSWORD',
      '  wifiqr SSID -p PASSWORD -f png -o qr.png',
      '  echo SSID | wifiqr -p PASSWORD',
      '',
      'QR Code is a registered trademark of DENSO WAVE INCORPORATED in Japan and in other countries.',
    ].join('\n'));

  addCredentialOptions(program)
    .argument('[ssid]', 'SSID of the Wi-Fi network (or via stdin)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('ascii'))
    .addOption(new Option('-e, --error-level <level>', 'Error correction level: L, M, Q or H').argParser(parseErrorLevel).default('M'))
    .option('-o, --output <file>', 'Write the QR code to a file instead of stdout')
    .option('-c, --config <name>', 'Start from a saved network profile')
    .option('--print-record', 'Print the encoded WIFI: record instead of a QR code')
    .action(async (ssid: string | undefined, _options: unknown, command: Command) => {
      const options = command.opts<GenerateOptions>();
      const base = options.config ? await loadProfile(io, options.config) : null;
      const config = await resolveConfig(io, ssid, options, base);

      const result = buildWifiRecord(config);
      if (!result.ok) {
        throw result.error;
      }
      if (options.printRecord) {
        writeText(io.stdout, result.record);
        return;
      }

      const rendered = await service.render(result.record, {
        format: options.format,
        errorCorrectionLevel: options.errorLevel,
      });
      if (options.output) {
        await fs.writeFile(options.output, rendered);
        writeText(io.stdout, `QR code written to ${options.output}`);
      } else if (typeof rendered === 'string') {
        writeText(io.stdout, rendered);
      } else {
        io.stdout.write(rendered);
      }
    });

  const configCommand = program
    .command('config')
    .description('Manage saved network profiles');

  addCredentialOptions(configCommand.command('save'))
    .description('Validate and save a network profile')
    .argument('<name>', 'Profile name')
    .argument('[ssid]', 'SSID of the Wi-Fi network (or via stdin)')
    .action(async (name: string, ssid: string | undefined, _options: unknown, command: Command) => {
      const config = await resolveConfig(io, ssid, command.opts<CredentialOptions>());
      const result = buildWifiRecord(config);
      if (!result.ok) {
        throw result.error;
      }
      await io.configManager.saveConfig(name, config);
      writeText(io.stdout, `Profile "${name}" saved`);
    });

  configCommand
    .command('list')
    .description('List saved network profiles')
    .action(async () => {
      const { configs, skipped } = await io.configManager.listConfigs();
      writeText(io.stdout, formatSectionHeader('SAVED NETWORKS', color));

      for (const { id, reason } of skipped) {
        writeText(io.stderr, `Skipping profile "${id}": ${reason}`);
      }

      if (configs.length === 0) {
        writeText(io.stdout, 'No saved profiles found.');
        return;
      }

      configs.forEach(({ id, config }, index) => {
        writeText(io.stdout, `${index + 1}. ${colorize(id, 'bold', color)}: "${config.ssid}" (${config.password.authType})`);
        if (config.hidden) {
          writeText(io.stdout, '   ' + formatStatusLine('Hidden', 'yes', 'hidden', 'yellow', color));
        }
      });
    });

  configCommand
    .command('show')
    .description('Print the WIFI: record of a saved profile')
    .argument('<name>', 'Profile name')
    .action(async (name: string) => {
      const result = buildWifiRecord(await loadProfile(io, name));
      if (!result.ok) {
        throw result.error;
      }
      writeText(io.stdout, result.record);
    });

  configCommand
    .command('remove')
    .alias('rm')
    .description('Delete a saved profile')
    .argument('<name>', 'Profile name')
    .action(async (name: string) => {
      if (!(await io.configManager.deleteConfig(name))) {
        throw new ConfigError(`No saved profile named "${name}"`);
      }
      writeText(io.stdout, `Profile "${name}" removed`);
    });

  return program;
}

/**
 * Run the CLI against the given arguments (without the node and script paths)
 * @returns Process exit code
 */
export async function runCli(argv: string[], io: CliIO, service?: WifiQrService): Promise<number> {
  const program = createProgram(io, service);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    // Commander already printed usage errors, help and version
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    writeText(io.stderr, formatError(message, supportsColor(io.stderr)));
    return 1;
  }
}
