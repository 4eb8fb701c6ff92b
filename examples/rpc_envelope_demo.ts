// Example: build an RPC envelope by writing the body first and prepending
// the header afterwards, then read it back through a borrowed view.
import { ByteCursorBuffer } from "../src/serialization/buffers/byte_cursor_buffer.ts";
import { silentLogger } from "../src/internal/logging/logger.ts";

const HEADER_FIELD_SIZE = 4;

/**
 * A decoded envelope: correlation ID and payload.
 */
export interface RpcEnvelope {
  messageId: number;
  payload: Uint8Array;
}

function uint32(value: number): Uint8Array {
  const bytes = new Uint8Array(HEADER_FIELD_SIZE);
  // Big-endian, like the frame headers on the wire.
  new DataView(bytes.buffer).setUint32(0, value, false);
  return bytes;
}

function readUint32(buffer: ByteCursorBuffer): number {
  const bytes = buffer.consumeBytes(HEADER_FIELD_SIZE);
  return new DataView(bytes.buffer).getUint32(0, false);
}

/**
 * Encodes `[messageId][payload length][payload]`. The header fields land in
 * the reserved slack, so the payload is never moved.
 */
export function encodeEnvelope(
  messageId: number,
  payload: Uint8Array,
): Uint8Array {
  const buffer = new ByteCursorBuffer({ logger: silentLogger });
  buffer.append(payload);
  buffer.prepend(uint32(payload.length));
  buffer.prepend(uint32(messageId));
  return buffer.readableView().slice();
}

/**
 * Decodes an envelope produced by {@link encodeEnvelope}.
 */
export function decodeEnvelope(received: Uint8Array): RpcEnvelope {
  const buffer = ByteCursorBuffer.borrow(received);
  const messageId = readUint32(buffer);
  const length = readUint32(buffer);
  return { messageId, payload: buffer.consumeBytes(length) };
}

const request = encodeEnvelope(7, new TextEncoder().encode("ping"));
const { messageId, payload } = decodeEnvelope(request);
console.log(messageId, new TextDecoder().decode(payload));
