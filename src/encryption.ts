import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { TransformStream } from "node:stream/web";
import { AES_IV_SIZE, AES_KEY_SIZE, AES_TAG_SIZE } from "./constants.js";
import { ArchiveError } from "./errors.js";

const CIPHER = "aes-256-gcm";

export function validateKey(key: Uint8Array): Uint8Array {
  if (key.byteLength !== AES_KEY_SIZE) {
    throw new ArchiveError(
      "INVALID_ARGUMENT",
      `Encryption key must be ${AES_KEY_SIZE} bytes (got ${key.byteLength})`
    );
  }
  return key;
}

/**
 * Seals one frame as `[IV][ciphertext][auth tag]`. A fresh IV is drawn for
 * every frame, so frames stay independently decodable.
 */
export function createSealStream(
  key: Uint8Array
): TransformStream<Uint8Array, Uint8Array> {
  const iv = randomBytes(AES_IV_SIZE);
  const cipher = createCipheriv(CIPHER, validateKey(key), iv, {
    authTagLength: AES_TAG_SIZE,
  });
  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      controller.enqueue(new Uint8Array(iv));
    },
    transform(chunk, controller) {
      const sealed = cipher.update(chunk);
      if (sealed.byteLength > 0) controller.enqueue(new Uint8Array(sealed));
    },
    flush(controller) {
      const tail = cipher.final();
      if (tail.byteLength > 0) controller.enqueue(new Uint8Array(tail));
      controller.enqueue(new Uint8Array(cipher.getAuthTag()));
    },
  });
}

/**
 * Open a sealed frame. Authentication failure means the frame was altered or
 * the key is wrong, and is reported as a checksum mismatch.
 */
export function openFrame(frame: Uint8Array, key: Uint8Array, path?: string): Uint8Array {
  if (frame.byteLength < AES_IV_SIZE + AES_TAG_SIZE) {
    throw new ArchiveError("INVALID_FORMAT", "Encrypted frame is truncated", {
      path,
    });
  }
  const iv = frame.subarray(0, AES_IV_SIZE);
  const tag = frame.subarray(frame.byteLength - AES_TAG_SIZE);
  const ciphertext = frame.subarray(AES_IV_SIZE, frame.byteLength - AES_TAG_SIZE);
  const decipher = createDecipheriv(CIPHER, validateKey(key), iv, {
    authTagLength: AES_TAG_SIZE,
  });
  decipher.setAuthTag(tag);
  try {
    const head = decipher.update(ciphertext);
    const tail = decipher.final();
    return new Uint8Array(Buffer.concat([head, tail]));
  } catch (err) {
    throw new ArchiveError(
      "CHECKSUM_MISMATCH",
      "Frame authentication failed (corrupted data or wrong key)",
      { path, cause: err }
    );
  }
}
