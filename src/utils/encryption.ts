import * as crypto from 'crypto';

const ALGORITHM = 'aes-256-cbc';

/**
 * Encrypts secrets (the GitHub token) before they reach plugin storage.
 * The key material is hashed to 32 bytes, so any non-empty passphrase works.
 */
export class EncryptionUtil {
  private readonly key: Buffer;

  constructor(secret: string) {
    if (!secret) {
      throw new Error('Encryption secret must not be empty');
    }
    this.key = crypto.createHash('sha256').update(secret).digest();
  }

  encrypt(text: string): string {
    const iv = crypto.randomBytes(16);

    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);
    let encrypted = cipher.update(text, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    // Combine iv and encrypted data
    return iv.toString('hex') + ':' + encrypted;
  }

  decrypt(encryptedData: string): string {
    const parts = encryptedData.split(':');
    if (parts.length !== 2) {
      throw new Error('Invalid encrypted data format');
    }

    const [ivHex, encrypted] = parts;
    const iv = Buffer.from(ivHex, 'hex');

    const decipher = crypto.createDecipheriv(ALGORITHM, this.key, iv);
    let decrypted = decipher.update(encrypted, 'hex', 'utf8');
    decrypted += decipher.final('utf8');

    return decrypted;
  }

  /**
   * GitHub tokens never contain ':' so a 32-hex-char iv prefix identifies our own output
   */
  static isEncrypted(data: string): boolean {
    return /^[0-9a-f]{32}:[0-9a-f]+$/.test(data);
  }
}
