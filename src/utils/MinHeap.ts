/** Binary min-heap ordered by a comparator. O(log n) push/pop for search frontiers. */
export class MinHeap<T> {
  private data: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  get length(): number { return this.data.length; }

  push(item: T): void {
    this.data.push(item);
    this.bubbleUp(this.data.length - 1);
  }

  pop(): T | undefined {
    const d = this.data;
    if (d.length === 0) return undefined;
    const min = d[0];
    const last = d.pop();
    if (d.length > 0 && last !== undefined) {
      d[0] = last;
      this.sinkDown(0);
    }
    return min;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  clear(): void {
    this.data.length = 0;
  }

  private bubbleUp(i: number): void {
    const d = this.data;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(d[i], d[parent]) >= 0) break;
      const tmp = d[i]; d[i] = d[parent]; d[parent] = tmp;
      i = parent;
    }
  }

  private sinkDown(i: number): void {
    const d = this.data;
    const n = d.length;
    while (true) {
      let smallest = i;
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      if (left < n && this.compare(d[left], d[smallest]) < 0) smallest = left;
      if (right < n && this.compare(d[right], d[smallest]) < 0) smallest = right;
      if (smallest === i) break;
      const tmp = d[i]; d[i] = d[smallest]; d[smallest] = tmp;
      i = smallest;
    }
  }
}
