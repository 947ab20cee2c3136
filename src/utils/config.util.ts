import * as path from 'path';
import * as fs from 'fs/promises';
import * as os from 'os';
import { AUTH_TYPES, type AuthType, type WifiConfig } from '../interfaces/wifi.interface';
import { EncryptionUtil, isMissingFile } from './encrypt.util';

// On-disk shape of a saved network profile
export interface SavedNetwork {
  ssid: string;
  authType: AuthType;
  password?: string; // encrypted
  hidden: boolean;
  createdDate: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const PROFILE_NAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export function defaultConfigDir(): string {
  return process.env.WIFIQR_CONFIG_DIR || path.join(os.homedir(), '.wifiqr');
}

function isAuthType(value: unknown): value is AuthType {
  return AUTH_TYPES.some(type => type === value);
}

function parseSavedNetwork(content: string): SavedNetwork | null {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
  if (typeof data !== 'object' || data === null) {
    return null;
  }
  const record: Record<string, unknown> = { ...data };
  if (typeof record.ssid !== 'string' || !isAuthType(record.authType)) {
    return null;
  }
  return {
    ssid: record.ssid,
    authType: record.authType,
    password: typeof record.password === 'string' ? record.password : undefined,
    hidden: record.hidden === true,
    createdDate: typeof record.createdDate === 'string' ? record.createdDate : '',
  };
}

export interface ProfileList {
  configs: Array<{ id: string; config: WifiConfig }>;
  // Profiles that could not be read, with the reason
  skipped: Array<{ id: string; reason: string }>;
}

/**
 * Stores network profiles as one JSON file each under the config directory
 */
export class ConfigManager {
  private readonly configDir: string;
  private readonly encryption: EncryptionUtil;

  constructor(configDir: string = defaultConfigDir()) {
    this.configDir = configDir;
    this.encryption = new EncryptionUtil(path.join(configDir, '.key'));
  }

  async init(): Promise<void> {
    await fs.mkdir(this.configDir, { recursive: true });
  }

  private profilePath(id: string): string {
    if (!PROFILE_NAME.test(id)) {
      throw new ConfigError(`Invalid profile name "${id}". Use letters, digits, ".", "_" or "-".`);
    }
    return path.join(this.configDir, `${id}.json`);
  }

  async saveConfig(id: string, config: WifiConfig): Promise<void> {
    const filePath = this.profilePath(id);
    await this.init();
    const value = config.password.value;
    const saved: SavedNetwork = {
      ssid: config.ssid,
      authType: config.password.authType,
      password: value ? await this.encryption.encrypt(value) : undefined,
      hidden: config.hidden,
      createdDate: new Date().toISOString(),
    };
    await fs.writeFile(filePath, JSON.stringify(saved, null, 2));
  }

  async loadConfig(id: string): Promise<WifiConfig | null> {
    const filePath = this.profilePath(id);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const saved = parseSavedNetwork(content);
    if (!saved) {
      throw new ConfigError(`Profile "${id}" is not a valid network profile`);
    }
    const password = saved.password && EncryptionUtil.isEncrypted(saved.password)
      ? await this.encryption.decrypt(saved.password)
      : saved.password;

    return {
      ssid: saved.ssid,
      password: { value: password, authType: saved.authType },
      hidden: saved.hidden,
    };
  }

  async listConfigs(): Promise<ProfileList> {
    await this.init();
    const files = (await fs.readdir(this.configDir)).sort();
    const result: ProfileList = { configs: [], skipped: [] };

    for (const file of files) {
      if (!file.endsWith('.json')) {
        continue;
      }
      const id = path.basename(file, '.json');
      try {
        const config = await this.loadConfig(id);
        if (config) {
          result.configs.push({ id, config });
        }
      } catch (error) {
        result.skipped.push({ id, reason: error instanceof Error ? error.message : String(error) });
      }
    }

    return result;
  }

  async deleteConfig(id: string): Promise<boolean> {
    const filePath = this.profilePath(id);
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }
}
