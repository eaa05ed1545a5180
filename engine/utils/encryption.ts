import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'crypto'

const ALGORITHM = 'aes-256-gcm'
const SALT_LENGTH = 32
const IV_LENGTH = 16
const TAG_LENGTH = 16
const KEY_LENGTH = 32
const ITERATIONS = 100_000

function deriveKey(masterKey: string, salt: Buffer): Buffer {
  return pbkdf2Sync(masterKey, salt, ITERATIONS, KEY_LENGTH, 'sha512')
}

/**
 * Encrypt a secret with AES-256-GCM under a key derived from `masterKey`.
 * Output is base64 of salt + iv + auth tag + ciphertext.
 */
export function encryptSecret(plaintext: string, masterKey: string): string {
  const salt = randomBytes(SALT_LENGTH)
  const iv = randomBytes(IV_LENGTH)
  const cipher = createCipheriv(ALGORITHM, deriveKey(masterKey, salt), iv)
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
  return Buffer.concat([salt, iv, cipher.getAuthTag(), ciphertext]).toString('base64')
}

/** Inverse of encryptSecret; throws when the key is wrong or the data was altered */
export function decryptSecret(sealed: string, masterKey: string): string {
  const data = Buffer.from(sealed, 'base64')
  const ivStart = SALT_LENGTH
  const tagStart = ivStart + IV_LENGTH
  const bodyStart = tagStart + TAG_LENGTH

  const decipher = createDecipheriv(ALGORITHM, deriveKey(masterKey, data.subarray(0, ivStart)), data.subarray(ivStart, tagStart))
  decipher.setAuthTag(data.subarray(tagStart, bodyStart))
  return Buffer.concat([decipher.update(data.subarray(bodyStart)), decipher.final()]).toString('utf8')
}

/** Random 256-bit key, hex */
export function generateMasterKey(): string {
  return randomBytes(32).toString('hex')
}
