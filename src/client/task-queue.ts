/*
 * Single-consumer task queue standing between the dispatcher and the UI.
 *
 * The dispatcher posts and moves on; it never waits for a task to run.
 * Tasks run one at a time, in post order, on a later tick.
 */

import log from '../utils/logger'

export type Task = () => void;

export class TaskQueue {
  private tasks: Task[] = [];
  private scheduled: boolean = false;

  /*
   * @param auto  schedule a drain on the next tick after each post; turn
   *              off to drain by hand
   */
  constructor(readonly auto: boolean = true) {}

  post(task: Task) {
    this.tasks.push(task);
    if (this.auto && !this.scheduled) {
      this.scheduled = true;
      setImmediate(() => {
        this.scheduled = false;
        this.drain();
      });
    }
  }

  /*
   * run every queued task, including ones posted by tasks along the way.
   * returns the number run
   */
  drain(): number {
    let n = 0;
    while (this.tasks.length > 0) {
      const task = this.tasks.shift();
      if (task === undefined) break;
      ++n;
      try {
        task();
      } catch (err) {
        log.error('ui task failed', err);
      }
    }
    return n;
  }

  get pending(): number {
    return this.tasks.length;
  }
}
