import type { WorkerRng } from './random';

/** Fresh random bytes on every call. */
export const generatePayload = (sizeBytes: number, rng: WorkerRng): Buffer => {
  const payload = Buffer.allocUnsafe(sizeBytes);
  rng.fill(payload);
  return payload;
};
