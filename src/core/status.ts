import type { Status } from './types';

const NEXT: Record<Status, Status> = {
  todo: 'up_next',
  up_next: 'in_progress',
  in_progress: 'todo',
};

const PREV: Record<Status, Status> = {
  todo: 'in_progress',
  in_progress: 'up_next',
  up_next: 'todo',
};

export const STATUS_TITLES: Record<Status, string> = {
  todo: 'To Do',
  up_next: 'Up Next',
  in_progress: 'In Progress',
};

export function nextStatus(status: Status): Status {
  return NEXT[status];
}

export function prevStatus(status: Status): Status {
  return PREV[status];
}
