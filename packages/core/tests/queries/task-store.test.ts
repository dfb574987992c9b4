import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, closeDb, type TaskmateDb } from '../../src/db.js';
import { loadTasks, saveTasks } from '../../src/queries/task-store.js';
import { TaskList } from '../../src/collection/task-list.js';
import { createTodo, createDeadline, createEvent } from '../../src/tasks/task.js';

let db: TaskmateDb;

beforeEach(() => {
  db = createTestDb();
});

describe('loadTasks', () => {
  it('returns an empty list for a fresh database', () => {
    expect(loadTasks(db).size).toBe(0);
  });
});

describe('saveTasks', () => {
  it('stores every task type with its fields and order', () => {
    const done = createTodo('read book');
    done.isDone = true;
    const list = new TaskList([
      done,
      createDeadline('return book', 'Sunday'),
      createEvent('project meeting', 'Mon 2pm', '4pm'),
    ]);

    saveTasks(db, list);

    expect(loadTasks(db).toArray()).toEqual([
      { $type: 'todo', description: 'read book', isDone: true },
      { $type: 'deadline', description: 'return book', by: 'Sunday', isDone: false },
      { $type: 'event', description: 'project meeting', from: 'Mon 2pm', to: '4pm', isDone: false },
    ]);
  });

  it('replaces previously stored tasks', () => {
    saveTasks(db, new TaskList([createTodo('a'), createTodo('b')]));
    saveTasks(db, new TaskList([createTodo('c')]));
    expect(loadTasks(db).toArray().map(t => t.description)).toEqual(['c']);
  });

  it('stores an empty list', () => {
    saveTasks(db, new TaskList([createTodo('a')]));
    saveTasks(db, new TaskList());
    expect(loadTasks(db).size).toBe(0);
  });
});

describe('closeDb', () => {
  it('closes the SQLite handle after the list is saved', () => {
    saveTasks(db, new TaskList([createTodo('read book')]));
    closeDb(db);
    expect(db.$client.open).toBe(false);
  });
});
