/**
 * Encoding and Hashing Utilities
 */

/**
 * Generates a deterministic hash-based ID from an input string
 * @param input - The input string to hash
 * @returns Up to 8 base-36 characters
 */
export function generateId(input: string): string {
  let hash = 0;
  for (let i = 0; i < input.length; i++) {
    const char = input.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash = hash & hash; // Convert to 32-bit integer
  }
  return Math.abs(hash).toString(36).slice(0, 8);
}

/**
 * Generates a random ID seeded with the current time
 * @param prefix - Optional prefix mixed into the hash input
 */
export function generateUniqueId(prefix: string = ''): string {
  const timestamp = Date.now().toString();
  const random = Math.random().toString();
  return generateId(`${prefix}_${timestamp}_${random}`);
}
