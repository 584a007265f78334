import { createHmac, timingSafeEqual } from 'crypto';
import type { HmacSha256Port, IncrementalHmac } from '../../../ports/hmac-sha256.port.js';

export class NodeHmacSha256 implements HmacSha256Port {
  hmacSha256(key: Uint8Array, message: Uint8Array): Uint8Array {
    const out = createHmac('sha256', Buffer.from(key)).update(Buffer.from(message)).digest();
    return new Uint8Array(out);
  }

  createIncremental(key: Uint8Array): IncrementalHmac {
    const mac = createHmac('sha256', Buffer.from(key));
    return {
      update: (chunk) => {
        mac.update(Buffer.from(chunk));
      },
      digest: () => new Uint8Array(mac.digest()),
    };
  }

  timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    return timingSafeEqual(Buffer.from(a), Buffer.from(b));
  }
}
