import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { VAULT_CONSTANTS } from "../constants";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { AuthenticationError, CryptoError, ValidationError, errorMessage } from "../errors";
import { safeParseJson, toJsonText } from "../utils/json";
import type { EncryptedBlob } from "../types";

const { ALGORITHM, KEY_LENGTH, IV_LENGTH, TAG_LENGTH } = VAULT_CONSTANTS.AES;

export class EncryptionManager {
  generateSalt(): Buffer {
    return randomBytes(VAULT_CONSTANTS.SALT_LEN);
  }

  /**
   * Encrypts `plaintext` under a fresh random nonce. The returned ciphertext
   * carries the GCM tag in its last {@link TAG_LENGTH} bytes.
   */
  encrypt(key: Uint8Array, plaintext: Uint8Array, aad?: Uint8Array): EncryptedBlob {
    this.assertKey(key, "encrypt()");
    try {
      const iv = randomBytes(IV_LENGTH);
      const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
      if (aad) cipher.setAAD(aad);
      const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      const ct = Buffer.concat([body, cipher.getAuthTag()]);
      return { iv: bytesToBase64(iv), ciphertext: bytesToBase64(ct) };
    } catch (e) {
      throw new CryptoError(`Encryption failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  /**
   * Verifies and decrypts a blob. Any tag mismatch, whether from a wrong key
   * or from tampering, raises the same {@link AuthenticationError}.
   */
  decrypt(key: Uint8Array, blob: EncryptedBlob, aad?: Uint8Array): Buffer {
    if (!blob?.iv || !blob?.ciphertext) throw new ValidationError("IV and ciphertext are required");

    const iv = base64ToBytes(blob.iv);
    const ct = base64ToBytes(blob.ciphertext);

    if (iv.byteLength !== IV_LENGTH) {
      throw new ValidationError(`IV must be ${IV_LENGTH} bytes`);
    }
    if (ct.byteLength < TAG_LENGTH) {
      throw new ValidationError(`Ciphertext must be at least ${TAG_LENGTH} bytes`);
    }
    this.assertKey(key, "decrypt()");

    const body = ct.subarray(0, ct.byteLength - TAG_LENGTH);
    const tag = ct.subarray(ct.byteLength - TAG_LENGTH);

    const chunks: Buffer[] = [];
    try {
      const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      if (aad) decipher.setAAD(aad);
      chunks.push(decipher.update(body));
      chunks.push(decipher.final());
      return Buffer.concat(chunks);
    } catch {
      // GCM streams plaintext before the tag is checked; never hand it out
      throw new AuthenticationError();
    } finally {
      for (const c of chunks) c.fill(0);
    }
  }

  encryptJson(key: Uint8Array, value: unknown, aad?: Uint8Array): EncryptedBlob {
    const data = Buffer.from(toJsonText(value), "utf8");
    try {
      return this.encrypt(key, data, aad);
    } finally {
      data.fill(0);
    }
  }

  decryptJson<T = unknown>(key: Uint8Array, blob: EncryptedBlob, aad?: Uint8Array): T {
    const pt = this.decrypt(key, blob, aad);
    try {
      return safeParseJson<T>(pt.toString("utf8"));
    } catch {
      throw new ValidationError("Decrypted data is not valid JSON");
    } finally {
      pt.fill(0);
    }
  }

  private assertKey(key: Uint8Array, where: string): void {
    if (!(key instanceof Uint8Array)) {
      throw new ValidationError(`Invalid key for ${where}; expected a Uint8Array`);
    }
    if (key.byteLength !== KEY_LENGTH) {
      throw new ValidationError(`Invalid key length for ${where}; expected ${KEY_LENGTH} bytes`);
    }
  }
}
