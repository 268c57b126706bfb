// Play queue with shuffle and repeat sequencing
import type { RepeatMode } from '@streamcast/shared';

export interface LoadOptions {
  shuffle?: boolean;
  /** Index in the given list to start from */
  startIndex?: number;
}

export type RandomSource = () => number;

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffled<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Ordered list of items with a cursor.
 *
 * The original order is kept so shuffle can be switched off again; turning
 * shuffle on or off never changes the item that is currently playing.
 */
export class PlayQueue<T> {
  private original: T[] = [];
  private order: T[] = [];
  private index = -1;
  private shuffleOn = false;
  private repeatMode: RepeatMode = 'off';

  constructor(private readonly random: RandomSource = Math.random) {}

  get items(): readonly T[] {
    return this.order;
  }

  get length(): number {
    return this.order.length;
  }

  get position(): number {
    return this.index;
  }

  get shuffle(): boolean {
    return this.shuffleOn;
  }

  get repeat(): RepeatMode {
    return this.repeatMode;
  }

  get current(): T | null {
    return this.index >= 0 && this.index < this.order.length ? this.order[this.index] : null;
  }

  /**
   * Replace the queue and return the first item to play
   */
  load(items: readonly T[], options: LoadOptions = {}): T | null {
    this.original = [...items];
    this.shuffleOn = options.shuffle ?? this.shuffleOn;

    if (this.original.length === 0) {
      this.order = [];
      this.index = -1;
      return null;
    }

    const start = Math.min(Math.max(options.startIndex ?? 0, 0), this.original.length - 1);
    if (this.shuffleOn) {
      const first = this.original[start];
      const rest = this.original.filter((_, i) => i !== start);
      // An explicit start item plays first; otherwise the whole list is shuffled
      this.order = options.startIndex === undefined ? shuffled(this.original, this.random) : [first, ...shuffled(rest, this.random)];
      this.index = 0;
    } else {
      this.order = [...this.original];
      this.index = start;
    }
    return this.current;
  }

  /**
   * Advance the cursor. With repeat off the queue ends after the last item;
   * `all` wraps around and `one` stays on the current item.
   */
  next(): T | null {
    if (this.order.length === 0) {
      return null;
    }
    if (this.repeatMode === 'one') {
      return this.current;
    }
    if (this.index + 1 < this.order.length) {
      this.index++;
      return this.current;
    }
    if (this.repeatMode === 'all') {
      this.index = 0;
      return this.current;
    }
    this.index = this.order.length;
    return null;
  }

  previous(): T | null {
    if (this.order.length === 0) {
      return null;
    }
    if (this.repeatMode === 'one') {
      return this.current;
    }
    if (this.index > 0) {
      this.index = Math.min(this.index, this.order.length) - 1;
      return this.current;
    }
    if (this.repeatMode === 'all') {
      this.index = this.order.length - 1;
      return this.current;
    }
    this.index = 0;
    return this.current;
  }

  setShuffle(on: boolean): void {
    if (on === this.shuffleOn) {
      return;
    }
    this.shuffleOn = on;

    const playing = this.current;
    if (playing === null) {
      this.order = on ? shuffled(this.original, this.random) : [...this.original];
      this.index = -1;
      return;
    }

    if (on) {
      const rest = [...this.order];
      rest.splice(this.index, 1);
      this.order = [playing, ...shuffled(rest, this.random)];
      this.index = 0;
    } else {
      this.order = [...this.original];
      this.index = this.order.indexOf(playing);
    }
  }

  setRepeat(mode: RepeatMode): void {
    this.repeatMode = mode;
  }

  clear(): void {
    this.original = [];
    this.order = [];
    this.index = -1;
  }
}
