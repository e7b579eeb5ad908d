import { FieldEncryptor } from '@/utils/encryption';

const KEY = Buffer.alloc(32, 7).toString('base64');
const OTHER_KEY = Buffer.alloc(32, 9).toString('base64');

describe('FieldEncryptor', () => {
  it('should decrypt what it encrypted', () => {
    const encryptor = new FieldEncryptor(KEY);
    const sealed = encryptor.encrypt('011000015');

    expect(sealed.split(':')).toHaveLength(3);
    expect(encryptor.decrypt(sealed)).toBe('011000015');
  });

  it('should use a fresh IV for every value', () => {
    const encryptor = new FieldEncryptor(KEY);
    expect(encryptor.encrypt('123456789')).not.toBe(encryptor.encrypt('123456789'));
  });

  it('should reject keys that are not 32 bytes', () => {
    expect(() => new FieldEncryptor(Buffer.alloc(16).toString('base64'))).toThrow(
      'Encryption key must be 32 bytes (got 16)'
    );
  });

  it('should fail authentication under a different key', () => {
    const sealed = new FieldEncryptor(KEY).encrypt('123456789');
    expect(() => new FieldEncryptor(OTHER_KEY).decrypt(sealed)).toThrow();
  });

  it('should reject malformed ciphertext', () => {
    expect(() => new FieldEncryptor(KEY).decrypt('not-sealed')).toThrow('Malformed ciphertext');
  });
});
