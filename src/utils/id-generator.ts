/**
 * Unique ID Generator
 * Generates job IDs using short-unique-id
 */

import ShortUniqueId from "short-unique-id";

export class IdGenerator {
  private uid: ShortUniqueId;
  private usedIds = new Set<string>();

  constructor(length = 8) {
    this.uid = new ShortUniqueId({
      length,
      dictionary: "alphanum_lower",
    });
  }

  /**
   * Generate a unique ID, ensuring no collisions
   */
  generate(): string {
    let id: string;
    do {
      id = this.uid.rnd();
    } while (this.usedIds.has(id));

    this.usedIds.add(id);
    return id;
  }

  /**
   * Register an existing ID to prevent collisions
   * Used when job IDs are supplied by the caller
   */
  register(id: string): void {
    this.usedIds.add(id);
  }
}
