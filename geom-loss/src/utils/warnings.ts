/** Most diagnostics a single evaluation keeps; anything past it is only counted. */
export const MAX_WARNINGS = 5000;

/** Diagnostics gathered while evaluating a loss term, returned as `LossEvaluation.warnings`. */
export class WarningCollector {
  private readonly messages: string[] = [];
  private dropped = 0;

  add(message: string): void {
    if (this.messages.length < MAX_WARNINGS) this.messages.push(message);
    else this.dropped++;
  }

  /** Merges another term's warnings under a `[term]` tag. */
  addTagged(tag: string, messages: readonly string[]): void {
    for (const m of messages) this.add(`[${tag}] ${m}`);
  }

  toArray(): string[] {
    if (this.dropped === 0) return this.messages.slice();
    return [...this.messages, `${this.dropped} further warnings dropped`];
  }
}
