import { EncryptionUtil } from '../../../src/utils/encryption';

describe('EncryptionUtil', () => {
  const encryption = new EncryptionUtil('test-secret');

  it('should decrypt what it encrypted', () => {
    const encrypted = encryption.encrypt('test-token');

    expect(encrypted).not.toContain('test-token');
    expect(encryption.decrypt(encrypted)).toBe('test-token');
  });

  it('should use a fresh iv for every encryption', () => {
    expect(encryption.encrypt('test-token')).not.toBe(encryption.encrypt('test-token'));
  });

  it('should recognise its own output format', () => {
    expect(EncryptionUtil.isEncrypted(encryption.encrypt('test-token'))).toBe(true);
    expect(EncryptionUtil.isEncrypted('test-token')).toBe(false);
  });

  it('should not recover the plaintext with a different secret', () => {
    const encrypted = encryption.encrypt('test-token');

    let recovered: string | undefined;
    try {
      recovered = new EncryptionUtil('other-secret').decrypt(encrypted);
    } catch (error) {
      recovered = undefined; // bad padding is the usual outcome
    }
    expect(recovered).not.toBe('test-token');
  });

  it('should reject malformed input', () => {
    expect(() => encryption.decrypt('no-separator')).toThrow('Invalid encrypted data format');
  });

  it('should require a secret', () => {
    expect(() => new EncryptionUtil('')).toThrow('Encryption secret must not be empty');
  });
});
