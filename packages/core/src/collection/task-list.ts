/**
 * Ordered, mutable task sequence. Indices here are 0-based;
 * callers convert from the 1-based numbers users type.
 */

import type { Task } from '../types/task.js';

export class TaskList implements Iterable<Task> {
  private tasks: Task[];

  constructor(tasks: Iterable<Task> = []) {
    this.tasks = [...tasks];
  }

  get size(): number {
    return this.tasks.length;
  }

  /** Append a task; returns the new size */
  add(task: Task): number {
    this.tasks.push(task);
    return this.tasks.length;
  }

  get(index: number): Task | null {
    if (!this.inBounds(index)) return null;
    return this.tasks[index] ?? null;
  }

  /** Set the completion flag in place. Null when the index is out of bounds. */
  setDone(index: number, done: boolean): Task | null {
    const task = this.get(index);
    if (!task) return null;
    task.isDone = done;
    return task;
  }

  /** Remove and return the task; later tasks shift down by one */
  remove(index: number): Task | null {
    if (!this.inBounds(index)) return null;
    const [removed] = this.tasks.splice(index, 1);
    return removed ?? null;
  }

  /** Case-sensitive substring match on the description, original order kept */
  find(keyword: string): Task[] {
    return this.tasks.filter(t => t.description.includes(keyword));
  }

  toArray(): Task[] {
    return [...this.tasks];
  }

  [Symbol.iterator](): Iterator<Task> {
    return this.tasks[Symbol.iterator]();
  }

  private inBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.tasks.length;
  }
}
