import { pack, unpack } from 'msgpackr';

/**
 * Serializes a JavaScript value to MessagePack binary format.
 * @param data The data to serialize.
 * @returns A Uint8Array containing the serialized data.
 */
export function serialize(data: unknown): Uint8Array {
  return pack(data);
}

/**
 * Deserializes MessagePack binary data. The result is unvalidated;
 * decode it with a schema before use.
 * @param data The binary data to deserialize (Uint8Array or ArrayBuffer).
 */
export function deserialize(data: Uint8Array | ArrayBuffer): unknown {
  // msgpackr unpack accepts Uint8Array, Buffer, ArrayBuffer
  const buffer = data instanceof ArrayBuffer ? new Uint8Array(data) : data;
  return unpack(buffer);
}
