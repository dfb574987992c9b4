import { describe, it, expect, beforeEach } from 'vitest';
import { TaskList } from '../../src/collection/task-list.js';
import { createTodo, createDeadline } from '../../src/tasks/task.js';

let list: TaskList;

beforeEach(() => {
  list = new TaskList([createTodo('read book'), createTodo('return laptop'), createDeadline('pay rent', 'Friday')]);
});

describe('add', () => {
  it('appends to the end and returns the new size', () => {
    expect(list.add(createTodo('water plants'))).toBe(4);
    expect(list.get(3)?.description).toBe('water plants');
  });
});

describe('get', () => {
  it('returns null outside the list', () => {
    expect(list.get(-1)).toBeNull();
    expect(list.get(3)).toBeNull();
    expect(list.get(1.5)).toBeNull();
  });
});

describe('setDone', () => {
  it('flips the flag in place', () => {
    const task = list.setDone(0, true);
    expect(task?.isDone).toBe(true);
    expect(list.get(0)?.isDone).toBe(true);
  });

  it('leaves the list untouched when out of bounds', () => {
    expect(list.setDone(5, true)).toBeNull();
    expect(list.toArray().every(t => !t.isDone)).toBe(true);
  });
});

describe('remove', () => {
  it('compacts the sequence', () => {
    const removed = list.remove(1);
    expect(removed?.description).toBe('return laptop');
    expect(list.size).toBe(2);
    expect(list.toArray().map(t => t.description)).toEqual(['read book', 'pay rent']);
  });

  it('returns null when out of bounds', () => {
    expect(list.remove(3)).toBeNull();
    expect(list.size).toBe(3);
  });
});

describe('find', () => {
  it('matches substrings in original order', () => {
    list.add(createTodo('buy bookmark'));
    expect(list.find('book').map(t => t.description)).toEqual(['read book', 'buy bookmark']);
  });

  it('is case-sensitive', () => {
    expect(list.find('Book')).toEqual([]);
  });
});

describe('toArray', () => {
  it('returns a copy', () => {
    list.toArray().pop();
    expect(list.size).toBe(3);
  });

  it('matches iteration order', () => {
    expect([...list]).toEqual(list.toArray());
  });
});
