/**
 * Minimal view of the event loop handed to collaborators that need to
 * enqueue work but must not drive the loop themselves.
 */

export type Task = () => void;

export interface TaskScheduler {
  /** Enqueue a task. Returns false when the loop no longer accepts work. */
  postTask(task: Task): boolean;
}
