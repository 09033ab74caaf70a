/**
 * AdmissionQueue
 *
 * Priority-ordered holding area for tasks that have not started yet.
 * Entries reference their task record by name only; the StatusRegistry stays
 * the source of truth for the record itself.
 *
 * Ordering:
 * - Lower priority value first (priorities may be negative)
 * - Equal priorities leave in push order, tracked by a monotonic sequence
 *   number rather than a clock
 *
 * Backed by a binary min-heap, so push/pop are O(log n).
 */

interface QueueEntry {
  name: string;
  priority: number;
  sequence: number;
}

function precedes(a: QueueEntry, b: QueueEntry): boolean {
  if (a.priority !== b.priority) {
    return a.priority < b.priority;
  }
  return a.sequence < b.sequence;
}

export class AdmissionQueue {
  private heap: QueueEntry[] = [];

  /** Next sequence number handed to a pushed entry */
  private sequence: number = 0;

  /**
   * Add a task name to the queue.
   */
  push(name: string, priority: number): void {
    this.heap.push({ name, priority, sequence: this.sequence++ });
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Remove and return the name at the head of the queue.
   *
   * @returns The next name, or undefined when the queue is empty
   */
  pop(): string | undefined {
    const head = this.heap[0];
    if (head === undefined) {
      return undefined;
    }
    this.removeAt(0);
    return head.name;
  }

  /**
   * Name that the next pop() would return, without removing it.
   */
  peek(): string | undefined {
    return this.heap[0]?.name;
  }

  /**
   * Withdraw a queued name, e.g. when that task is started out of order.
   *
   * @returns true if the name was queued
   */
  remove(name: string): boolean {
    const index = this.heap.findIndex((entry) => entry.name === name);
    if (index === -1) {
      return false;
    }
    this.removeAt(index);
    return true;
  }

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  private removeAt(index: number): void {
    const last = this.heap.pop();
    if (last === undefined || index === this.heap.length) {
      return;
    }
    this.heap[index] = last;
    this.siftDown(index);
    this.siftUp(index);
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!precedes(this.heap[child], this.heap[parent])) {
        break;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const length = this.heap.length;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < length && precedes(this.heap[left], this.heap[smallest])) {
        smallest = left;
      }
      if (right < length && precedes(this.heap[right], this.heap[smallest])) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const entry = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = entry;
  }
}
