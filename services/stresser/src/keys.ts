import type { WorkerRng } from './random';

const KEY_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export type KeyPicker = {
  next: () => string;
};

/**
 * Sequential pickers start worker `i` at `i mod K` and step by one, so cursors of
 * different workers overlap rather than partition the key list. Random pickers draw
 * a uniform index on every call.
 */
export const createKeyPicker = (
  keys: readonly string[],
  workerId: number,
  randomize: boolean,
  rng: WorkerRng,
): KeyPicker => {
  const count = keys.length;
  if (count === 0) {
    throw new Error('cannot pick keys from an empty key list');
  }
  if (randomize) {
    return { next: () => keys[rng.nextInt(count)] };
  }
  let index = workerId % count;
  return {
    next: () => {
      const key = keys[index];
      index = (index + 1) % count;
      return key;
    },
  };
};

export const randomString = (length: number, rng: WorkerRng): string => {
  let result = '';
  for (let i = 0; i < length; i += 1) {
    result += KEY_ALPHABET[rng.nextInt(KEY_ALPHABET.length)];
  }
  return result;
};

/** `stresser/<owner>/<monotonic ns>-<suffix>.dat`; `owner` is `worker<N>` or `job<N>`. */
export const generateWriteKey = (owner: string, rng: WorkerRng): string => {
  return `stresser/${owner}/${process.hrtime.bigint()}-${randomString(8, rng)}.dat`;
};
