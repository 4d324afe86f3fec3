import crypto from 'crypto';

export function sha256Hex(input: string): string {
  return crypto.createHash('sha256').update(input, 'utf8').digest('hex');
}

/** Stable id for a set of members: order of the input does not matter. */
export function stableSetId(prefix: string, members: string[], salt = ''): string {
  const canonical = JSON.stringify({ members: [...members].sort(), salt });
  return `${prefix}-${sha256Hex(canonical).slice(0, 16)}`;
}

export function randomSeed(): number {
  return crypto.randomBytes(4).readUInt32BE(0);
}
