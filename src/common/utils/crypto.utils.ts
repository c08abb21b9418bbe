import crypto from 'crypto';
import { DecryptionError } from '../../errors/relay.errors';
import type { Credential, EncryptedCredential } from '../types/relay.types';

const ALG = 'aes-256-gcm';
const IV_LEN = 12;
const TAG_LEN = 16;

function deriveKey(secret: string): Buffer {
  return crypto.createHash('sha256').update(secret, 'utf8').digest();
}

function isCredential(value: unknown): value is Credential {
  if (value === null || typeof value !== 'object') return false;
  if (!('email' in value) || !('password' in value)) return false;
  return typeof value.email === 'string' && typeof value.password === 'string';
}

/**
 * Seals SMTP credentials with AES-256-GCM under one process-wide key.
 * Output format: `iv:authTag:ciphertext`, each part hex.
 */
export class CredentialCipher {
  private readonly key: Buffer;

  constructor(secret: string) {
    if (!secret) throw new Error('CredentialCipher requires a non-empty secret');
    this.key = deriveKey(secret);
  }

  encrypt(credential: Credential): EncryptedCredential {
    const iv = crypto.randomBytes(IV_LEN);
    const cipher = crypto.createCipheriv(ALG, this.key, iv, { authTagLength: TAG_LEN });
    const plain = JSON.stringify({ email: credential.email, password: credential.password });
    const enc = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return [iv.toString('hex'), tag.toString('hex'), enc.toString('hex')].join(':');
  }

  decrypt(blob: EncryptedCredential): Credential {
    const parts = blob.split(':');
    if (parts.length !== 3) throw new DecryptionError('invalid format');
    const [ivHex, tagHex, encHex] = parts;
    const iv = Buffer.from(ivHex, 'hex');
    const tag = Buffer.from(tagHex, 'hex');
    const enc = Buffer.from(encHex, 'hex');
    if (iv.length !== IV_LEN || tag.length !== TAG_LEN || enc.length === 0) {
      throw new DecryptionError('invalid format');
    }

    let plain: string;
    try {
      const decipher = crypto.createDecipheriv(ALG, this.key, iv, { authTagLength: TAG_LEN });
      decipher.setAuthTag(tag);
      plain = Buffer.concat([decipher.update(enc), decipher.final()]).toString('utf8');
    } catch {
      throw new DecryptionError('authentication tag mismatch');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(plain);
    } catch {
      throw new DecryptionError('payload is not JSON');
    }
    if (!isCredential(parsed)) throw new DecryptionError('payload is not a credential');
    return { email: parsed.email, password: parsed.password };
  }
}
