import { createHash } from 'node:crypto'

// Largest value of 15 hex digits (60 bits)
const LONG_SCALE = 0xfffffffffffffff

/**
 * Maps (key, distinctId, salt) to a float in [0, 1).
 *
 * The same inputs always give the same float and outputs are uniformly
 * distributed, so `hash(key, id) <= 0.2` selects about 20% of identities.
 */
export function hash(key: string, distinctId: string, salt = ''): number {
  const digest = createHash('sha1').update(`${key}.${distinctId}${salt}`, 'utf8').digest('hex')
  return parseInt(digest.slice(0, 15), 16) / LONG_SCALE
}
