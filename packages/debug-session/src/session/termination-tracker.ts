/**
 * Shrink-only set of terminal event types still expected from the conversation.
 *
 * The set never grows back; {@link TerminationTracker.remove} reports the one
 * removal that empties it.
 * @public
 */
export class TerminationTracker {
  private readonly expected: Set<string>;

  public constructor(expected: Iterable<string>) {
    this.expected = new Set(expected);
  }

  public get isEmpty(): boolean {
    return this.expected.size === 0;
  }

  public get remaining(): string[] {
    return Array.from(this.expected);
  }

  /**
   * Stops expecting `eventType`.
   * @returns `true` only when this call removed the last expected type
   */
  public remove(eventType: string): boolean {
    return this.expected.delete(eventType) && this.expected.size === 0;
  }
}
