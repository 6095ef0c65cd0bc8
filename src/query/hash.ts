/** 32-bit string hash (31-multiplier polynomial). `null` hashes to 0. */
export function hashString(value: string | null): number {
  if (value === null) return 0;
  let h = 0;
  for (let i = 0; i < value.length; i++) {
    h = (Math.imul(31, h) + value.charCodeAt(i)) | 0;
  }
  return h;
}

const scratch = new DataView(new ArrayBuffer(8));

/** `0` and `-0` compare equal, so they hash equal. */
export function hashNumber(value: number): number {
  scratch.setFloat64(0, value === 0 ? 0 : value);
  return scratch.getInt32(0) ^ scratch.getInt32(4);
}

export function hashValue(value: string | number | boolean): number {
  if (typeof value === 'string') return hashString(value);
  if (typeof value === 'number') return hashNumber(value);
  return value ? 1231 : 1237;
}

/** Order-sensitive combination of already-computed hashes. */
export function combineHashes(...hashes: number[]): number {
  let result = 1;
  for (const h of hashes) {
    result = (Math.imul(31, result) + h) | 0;
  }
  return result;
}
