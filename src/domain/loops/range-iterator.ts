import { err, ok, type Result } from 'neverthrow';
import { invalidLoopArgument, type InvalidRangeError } from './loop-errors.js';

/**
 * Stateful half-open integer range.
 *
 * Lock: `stop` is never yielded. A positive step yields while `current < stop`,
 * a negative step while `current > stop`.
 *
 * Usable standalone (pull with `next()`, or spread / `for...of`) and by the
 * counted-range driver.
 *
 * @example
 * const range = RangeIterator.create(10, 0, -3)._unsafeUnwrap();
 * [...range] // [10, 7, 4, 1]
 */
export class RangeIterator implements IterableIterator<number> {
  private _current: number;
  private _finished = false;

  private constructor(
    readonly start: number,
    readonly stop: number,
    readonly step: number
  ) {
    this._current = start;
  }

  static create(start: number, stop: number, step: number): Result<RangeIterator, InvalidRangeError> {
    if (!Number.isSafeInteger(start)) {
      return err(invalidLoopArgument('start', start, 'a safe integer'));
    }
    if (!Number.isSafeInteger(stop)) {
      return err(invalidLoopArgument('stop', stop, 'a safe integer'));
    }
    if (!Number.isSafeInteger(step) || step === 0) {
      return err(invalidLoopArgument('step', step, 'a non-zero safe integer'));
    }
    return ok(new RangeIterator(start, stop, step));
  }

  get current(): number {
    return this._current;
  }

  get finished(): boolean {
    return this._finished;
  }

  next(): IteratorResult<number, undefined> {
    if (this._finished) return { done: true, value: undefined };

    const crossed = this.step > 0 ? this._current >= this.stop : this._current <= this.stop;
    if (crossed) {
      this._finished = true;
      return { done: true, value: undefined };
    }

    const value = this._current;
    this._current += this.step;
    return { done: false, value };
  }

  /** Restarts the range from `start`. */
  reset(): void {
    this._current = this.start;
    this._finished = false;
  }

  [Symbol.iterator](): RangeIterator {
    return this;
  }
}
