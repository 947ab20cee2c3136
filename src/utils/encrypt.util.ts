import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';

/**
 * Encrypts saved passwords with a per-user master key
 */
export class EncryptionUtil {
  private static readonly ALGORITHM = 'aes-256-gcm';
  private static readonly KEY_LENGTH = 32; // 256 bits
  private static readonly IV_LENGTH = 16; // 128 bits
  private static readonly SALT_LENGTH = 64;
  private static readonly ITERATIONS = 100000;
  private static readonly DIGEST = 'sha256';

  private masterKey: Buffer | null = null;

  constructor(private readonly keyFilePath: string) {}

  /**
   * Load the master key, generating it on first use
   */
  private async getMasterKey(): Promise<Buffer> {
    if (this.masterKey) {
      return this.masterKey;
    }
    try {
      this.masterKey = await fs.readFile(this.keyFilePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      const key = crypto.randomBytes(EncryptionUtil.KEY_LENGTH);
      await fs.mkdir(path.dirname(this.keyFilePath), { recursive: true });
      await fs.writeFile(this.keyFilePath, key, { mode: 0o600 });
      this.masterKey = key;
    }
    return this.masterKey;
  }

  private async deriveKey(salt: Buffer): Promise<Buffer> {
    const masterKey = await this.getMasterKey();
    return crypto.pbkdf2Sync(
      masterKey,
      salt,
      EncryptionUtil.ITERATIONS,
      EncryptionUtil.KEY_LENGTH,
      EncryptionUtil.DIGEST
    );
  }

  /**
   * Encrypt a string using the master key
   * @returns Encrypted string in format: iv:salt:tag:ciphertext (all base64 encoded)
   */
  async encrypt(text: string): Promise<string> {
    const salt = crypto.randomBytes(EncryptionUtil.SALT_LENGTH);
    const iv = crypto.randomBytes(EncryptionUtil.IV_LENGTH);
    const key = await this.deriveKey(salt);

    const cipher = crypto.createCipheriv(EncryptionUtil.ALGORITHM, key, iv);
    let ciphertext = cipher.update(text, 'utf8', 'base64');
    ciphertext += cipher.final('base64');
    const tag = cipher.getAuthTag();

    return [
      iv.toString('base64'),
      salt.toString('base64'),
      tag.toString('base64'),
      ciphertext
    ].join(':');
  }

  /**
   * Decrypt a string produced by encrypt()
   * @throws Error if the format is wrong or the key does not match
   */
  async decrypt(encryptedText: string): Promise<string> {
    const parts = encryptedText.split(':');
    if (parts.length !== 4) {
      throw new Error('Invalid encrypted text format');
    }
    const [ivPart, saltPart, tagPart, ciphertext] = parts;

    const key = await this.deriveKey(Buffer.from(saltPart, 'base64'));
    const decipher = crypto.createDecipheriv(EncryptionUtil.ALGORITHM, key, Buffer.from(ivPart, 'base64'));
    decipher.setAuthTag(Buffer.from(tagPart, 'base64'));

    let cleartext = decipher.update(ciphertext, 'base64', 'utf8');
    cleartext += decipher.final('utf8');
    return cleartext;
  }

  /**
   * Checks if a string has the iv:salt:tag:ciphertext shape
   */
  static isEncrypted(text: string): boolean {
    const parts = text.split(':');
    return parts.length === 4 && parts.every(part => /^[A-Za-z0-9+/]*={0,2}$/.test(part)) &&
      parts.slice(0, 3).every(part => part.length > 0);
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
