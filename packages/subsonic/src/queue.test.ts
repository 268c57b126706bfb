import { PlayQueue, shuffled } from './queue';

const alwaysFirst = () => 0;

describe('shuffled', () => {
  it('should return a new permutation', () => {
    const items = ['a', 'b', 'c', 'd'];

    expect(shuffled(items, alwaysFirst)).toEqual(['b', 'c', 'd', 'a']);
    expect(items).toEqual(['a', 'b', 'c', 'd']);
  });
});

describe('PlayQueue', () => {
  let queue: PlayQueue<string>;

  beforeEach(() => {
    queue = new PlayQueue<string>(alwaysFirst);
  });

  it('should start empty', () => {
    expect(queue.current).toBeNull();
    expect(queue.next()).toBeNull();
    expect(queue.previous()).toBeNull();
    expect(queue.load([])).toBeNull();
  });

  it('should play in order and end with repeat off', () => {
    expect(queue.load(['a', 'b', 'c'])).toBe('a');
    expect(queue.next()).toBe('b');
    expect(queue.next()).toBe('c');
    expect(queue.next()).toBeNull();
    expect(queue.current).toBeNull();
  });

  it('should wrap around with repeat all', () => {
    queue.load(['a', 'b']);
    queue.setRepeat('all');

    expect(queue.next()).toBe('b');
    expect(queue.next()).toBe('a');
    expect(queue.previous()).toBe('b');
  });

  it('should stay on the current item with repeat one', () => {
    queue.load(['a', 'b']);
    queue.setRepeat('one');

    expect(queue.next()).toBe('a');
    expect(queue.previous()).toBe('a');
  });

  it('should step back and stop at the first item', () => {
    queue.load(['a', 'b', 'c'], { startIndex: 2 });

    expect(queue.current).toBe('c');
    expect(queue.previous()).toBe('b');
    expect(queue.previous()).toBe('a');
    expect(queue.previous()).toBe('a');
  });

  it('should step back from the end of the queue to the last item', () => {
    queue.load(['a', 'b']);
    queue.next();
    queue.next();

    expect(queue.previous()).toBe('b');
  });

  it('should shuffle the whole list on load', () => {
    expect(queue.load(['a', 'b', 'c', 'd'], { shuffle: true })).toBe('b');
    expect(queue.items).toEqual(['b', 'c', 'd', 'a']);
  });

  it('should keep an explicit start item first when shuffling', () => {
    expect(queue.load(['a', 'b', 'c', 'd'], { shuffle: true, startIndex: 0 })).toBe('a');
    expect(queue.items).toEqual(['a', 'c', 'd', 'b']);
  });

  it('should keep the current item when toggling shuffle', () => {
    queue.load(['a', 'b', 'c', 'd']);
    queue.next();

    queue.setShuffle(true);
    expect(queue.current).toBe('b');
    expect(queue.items).toEqual(['b', 'c', 'd', 'a']);

    queue.setShuffle(false);
    expect(queue.current).toBe('b');
    expect(queue.items).toEqual(['a', 'b', 'c', 'd']);
    expect(queue.next()).toBe('c');
  });

  it('should clear everything', () => {
    queue.load(['a', 'b']);
    queue.clear();

    expect(queue.length).toBe(0);
    expect(queue.current).toBeNull();
  });
});
