export interface Clock {
  /** Unix seconds, never decreasing. */
  now(): number;
}

export class SystemClock implements Clock {
  private last = 0;

  now(): number {
    const current = Math.floor(Date.now() / 1000);
    if (current > this.last) this.last = current;
    return this.last;
  }
}
