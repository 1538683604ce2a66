/**
 * Name Utilities
 *
 * Mints frame names that stay unique across one reconstructed graph.
 */

import { NAMING } from '../constants/config';
import { generateUniqueId } from './encoding';

/**
 * Tracks used frame names and mints new ones.
 *
 * Deterministic generators use a counter, so repeated imports of the same
 * file produce the same names; otherwise suffixes are random.
 */
export class FrameNameGenerator {
  private readonly used = new Set<string>();
  private counter = 0;

  constructor(private readonly deterministic: boolean = true) {}

  /**
   * Marks a name as taken
   */
  reserve(name: string): void {
    this.used.add(name);
  }

  has(name: string): boolean {
    return this.used.has(name);
  }

  /**
   * Mints `<geometryName>_<SUFFIX>` for one geometry instance
   */
  mintInstanceName(geometryName: string): string {
    for (;;) {
      const candidate = `${geometryName}_${this.nextSuffix(geometryName)}`;
      if (!this.used.has(candidate)) {
        this.used.add(candidate);
        return candidate;
      }
    }
  }

  /**
   * Mints an all-digit name, used when the preferred base frame is taken
   */
  mintNumericName(): string {
    for (;;) {
      const candidate = this.deterministic
        ? String(this.counter++).padStart(NAMING.NUMERIC_FRAME_LENGTH, '0')
        : String(Math.floor(Math.random() * 1e10));
      if (!this.used.has(candidate)) {
        this.used.add(candidate);
        return candidate;
      }
    }
  }

  private nextSuffix(seed: string): string {
    const length = NAMING.INSTANCE_SUFFIX_LENGTH;
    const raw = this.deterministic
      ? (this.counter++).toString(36)
      : generateUniqueId(seed);
    return raw.padStart(length, '0').slice(-length).toUpperCase();
  }
}
