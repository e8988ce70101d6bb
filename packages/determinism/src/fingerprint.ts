import { createHash } from "node:crypto";
import { ObservationShapeError } from "@tracelock/schemas";
import type { Observation } from "@tracelock/schemas";

const MAX_DIM = 0xffffffff;

/**
 * Canonical payload: u32le(ndim), u32le per dimension, u64le(byte length),
 * then the raw element bytes in row-major order.
 */
export function encodeObservation(observation: Observation): Buffer {
  const { shape, data } = observation;
  let elements = 1;
  for (const dim of shape) {
    if (!Number.isInteger(dim) || dim < 0 || dim > MAX_DIM) {
      throw new ObservationShapeError(`Invalid observation dimension ${dim} in shape [${shape.join(", ")}]`);
    }
    elements *= dim;
  }
  if (elements !== data.length) {
    throw new ObservationShapeError(
      `Observation shape [${shape.join(", ")}] describes ${elements} elements but data holds ${data.length}`,
    );
  }

  const header = Buffer.alloc(4 + 4 * shape.length + 8);
  let offset = header.writeUInt32LE(shape.length, 0);
  for (const dim of shape) {
    offset = header.writeUInt32LE(dim, offset);
  }
  header.writeBigUInt64LE(BigInt(data.byteLength), offset);

  return Buffer.concat([header, Buffer.from(data.buffer, data.byteOffset, data.byteLength)]);
}

/** SHA-256 of the canonical encoding, lowercase hex. */
export function fingerprint(observation: Observation): string {
  return createHash("sha256").update(encodeObservation(observation)).digest("hex");
}
