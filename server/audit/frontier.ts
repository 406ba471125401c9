export interface FrontierItem {
  url: string;
  depth: number;
}

/**
 * Breadth-first crawl queue. A URL is remembered as seen the moment it is
 * enqueued or explicitly marked, so each URL is handed out at most once.
 */
export class Frontier {
  private readonly queue: FrontierItem[] = [];
  private head = 0;
  private readonly seen = new Set<string>();

  constructor(private readonly maxDepth: number) {}

  enqueue(item: FrontierItem): boolean {
    if (item.depth > this.maxDepth || this.seen.has(item.url)) {
      return false;
    }
    this.seen.add(item.url);
    this.queue.push(item);
    return true;
  }

  dequeue(): FrontierItem | null {
    if (this.head >= this.queue.length) {
      return null;
    }
    const item = this.queue[this.head];
    this.head++;
    return item ?? null;
  }

  markSeen(url: string): boolean {
    if (this.seen.has(url)) return false;
    this.seen.add(url);
    return true;
  }

  hasSeen(url: string): boolean {
    return this.seen.has(url);
  }

  isEmpty(): boolean {
    return this.head >= this.queue.length;
  }

  get size(): number {
    return this.queue.length - this.head;
  }
}
