/**
 * Portfolio total cell.
 *
 * Single writer (the valuator), many readers (the HTTP surface).
 * Each store replaces the whole value in one assignment, so a reader sees
 * either the previous total or the new one.
 */

export class PortfolioTotal {
  private _value = 0;
  private _updatedAt: string | undefined;

  store(value: number, at: Date = new Date()): void {
    this._value = value;
    this._updatedAt = at.toISOString();
  }

  load(): number {
    return this._value;
  }

  /** ISO timestamp of the last store, undefined before the first one. */
  updatedAt(): string | undefined {
    return this._updatedAt;
  }
}

/**
 * Two fraction digits, as served on GET /.
 *
 * toFixed() switches to exponent notation from 1e21 up; numbers that large
 * are whole, so they are written out through BigInt instead.
 */
export function formatTotal(value: number): string {
  if (Number.isFinite(value) && Math.abs(value) >= 1e21) {
    return `${BigInt(value).toString()}.00`;
  }
  return value.toFixed(2);
}
