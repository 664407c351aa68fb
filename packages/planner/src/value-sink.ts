/**
 * In-memory ValueSink — records credits per recipient.
 */

import type { ValueSink } from "./types.js";

export interface ValueCredit {
  readonly recipient: string;
  readonly value: bigint;
}

export class InMemoryValueSink implements ValueSink {
  private readonly balances = new Map<string, bigint>();
  private readonly history: ValueCredit[] = [];

  credit(recipient: string, value: bigint): void {
    this.balances.set(recipient, (this.balances.get(recipient) ?? 0n) + value);
    this.history.push({ recipient, value });
  }

  balanceOf(recipient: string): bigint {
    return this.balances.get(recipient) ?? 0n;
  }

  credits(): readonly ValueCredit[] {
    return [...this.history];
  }
}
