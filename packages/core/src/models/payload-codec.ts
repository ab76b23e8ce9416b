/**
 * Boundary for the opaque spatial-map payload. The engine never looks
 * inside a payload; a codec decides whether one is acceptable.
 */
export interface PayloadCodec {
  validate(payload: Uint8Array): boolean;
  size(payload: Uint8Array): number;
}

/**
 * Accepts any non-empty payload
 */
export class OpaquePayloadCodec implements PayloadCodec {
  validate(payload: Uint8Array): boolean {
    return payload.byteLength > 0;
  }

  size(payload: Uint8Array): number {
    return payload.byteLength;
  }
}
