/**
 * Shared types for credential handling and mail relay
 */

// SMTP login pair; exists only briefly before encryption or right after decryption
export interface Credential {
  email: string;
  password: string;
}

// Opaque `iv:authTag:ciphertext` string produced by CredentialCipher
export type EncryptedCredential = string;

export interface TokenRecord {
  token: string;
  encryptedCredential: EncryptedCredential;
  issuedAt: number;
  expiresAt: number;
}

export interface SendRequest {
  recipients: string | string[];
  subject: string;
  body: string;
  isHtml?: boolean;
  cc?: string | string[];
  bcc?: string | string[];
  replyTo?: string;
  repeat?: number;
}

export interface DeliveryResult {
  sent: number;
  failed: number;
  requested: number;
  recipients: string[];
  messageIds: string[];
}

export interface AuthResult {
  token: string;
  expiresInHours: number;
  expiresAt: number;
  senderEmail: string;
  message: string;
}
