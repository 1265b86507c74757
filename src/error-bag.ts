/**
 * Error Bag - Per-field accumulation of rendered validation messages
 *
 * Fields keep the order in which their first error arrived; messages keep
 * the order in which they were added. Nothing is ever removed.
 */

export type GroupedErrors = ReadonlyMap<string, readonly string[]>;

export class ErrorBag {
  private readonly messages = new Map<string, string[]>();

  add(field: string, message: string): void {
    const existing = this.messages.get(field);
    if (existing) {
      existing.push(message);
    } else {
      this.messages.set(field, [message]);
    }
  }

  first(field: string): string | undefined {
    return this.messages.get(field)?.[0];
  }

  isEmpty(): boolean {
    return this.messages.size === 0;
  }

  /**
   * Grouped copy of the bag. A Map, so "2" stays after "zip" if it failed later.
   */
  toMap(): GroupedErrors {
    return new Map([...this.messages].map(([field, list]): [string, string[]] => [field, [...list]]));
  }

  /**
   * Every message, field by field
   */
  all(): string[] {
    const flat: string[] = [];
    for (const list of this.messages.values()) {
      flat.push(...list);
    }
    return flat;
  }
}
