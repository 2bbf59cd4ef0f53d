import { ByteLengthQueuingStrategy, ReadableStream } from "node:stream/web";

/** Frames are fed to codecs in chunks of at most this size */
export const FRAME_CHUNK_SIZE = 64 * 1024;

/**
 * Helper for creating a ReadableStream from a Uint8Array
 * with proper backpressure handling.
 *
 * @param data The input Uint8Array
 */
export function readableFromBytes(
  data: Uint8Array,
  chunkSize: number = FRAME_CHUNK_SIZE
): ReadableStream<Uint8Array> {
  let offset = 0;
  return new ReadableStream<Uint8Array>(
    {
      pull(controller) {
        if (offset >= data.byteLength) {
          controller.close();
          return;
        }
        // desiredSize is only null after close(), and could be <= 0 under
        // some circumstances, so always read at least 1 byte
        const size = Math.min(
          Math.max(controller.desiredSize ?? 1, 1),
          chunkSize,
          data.byteLength - offset
        );
        controller.enqueue(data.subarray(offset, offset + size));
        offset += size;
      },
    },
    new ByteLengthQueuingStrategy({ highWaterMark: chunkSize })
  );
}
