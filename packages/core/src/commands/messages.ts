export const DIVIDER = '_'.repeat(60);

export const MARKED_DONE = "Nice! I've marked this task as done:";
export const MARKED_NOT_DONE = "OK, I've marked this task as not done yet:";
export const REMOVED = "Noted. I've removed this task:";
export const ADDED = "Got it. I've added this task:";
export const LIST_HEADER = 'Here are the tasks in your list:';
export const FIND_HEADER = 'Here are the matching tasks in your list:';
export const LIST_EMPTY = 'Your list is empty.';
export const FIND_EMPTY = 'No matching tasks found.';
export const FAREWELL = 'Bye. Hope to see you again soon!';
export const OUT_OF_BOUNDS = 'index out of bounds';

export function taskCount(count: number): string {
  return `Now you have ${count} ${count === 1 ? 'task' : 'tasks'} in the list.`;
}

export function greeting(name: string): string[] {
  return [`Hello! I'm ${name}`, 'What can I do for you?'];
}
