type HeapEntry<T> = { priority: bigint; value: T };

/**
 * A max heap bounded to a fixed capacity. Once full, offering a value only
 * succeeds if its priority is lower than the current maximum, which is then
 * evicted. Used to keep the k lowest-distance entries out of a larger set
 * without sorting all of it.
 */
export class BoundedMaxHeap<T> {
  private readonly heap: Array<HeapEntry<T>> = [];
  private readonly valueIds = new Set<string>();
  private readonly capacity: number;
  private readonly getValueId: (value: T) => string;

  /**
   * @param capacity Maximum number of values kept
   * @param getValueId Identity of a value, the same value is never kept twice
   */
  constructor(capacity: number, getValueId: (value: T) => string) {
    this.capacity = Math.max(0, capacity);
    this.getValueId = getValueId;
  }

  get size(): number {
    return this.heap.length;
  }

  isFull(): boolean {
    return this.heap.length >= this.capacity;
  }

  /**
   * The entry with the highest priority, the first to be evicted.
   */
  peek(): HeapEntry<T> | undefined {
    return this.heap[0];
  }

  /**
   * Offer a value to the heap.
   * @returns true if the value is now kept
   */
  offer(priority: bigint, value: T): boolean {
    const valueId = this.getValueId(value);
    if (this.capacity === 0 || this.valueIds.has(valueId)) {
      return false;
    }

    if (!this.isFull()) {
      this.heap.push({ priority, value });
      this.valueIds.add(valueId);
      this.heapifyUp(this.heap.length - 1);
      return true;
    }

    const root = this.heap[0];
    if (priority >= root.priority) {
      return false;
    }

    this.valueIds.delete(this.getValueId(root.value));
    this.heap[0] = { priority, value };
    this.valueIds.add(valueId);
    this.heapifyDown(0);
    return true;
  }

  /**
   * Kept values, lowest priority first.
   */
  sortedValues(): T[] {
    return [...this.heap]
      .sort((a, b) => (a.priority < b.priority ? -1 : a.priority > b.priority ? 1 : 0))
      .map((entry) => entry.value);
  }

  private heapifyUp(startIndex: number): void {
    let currentIndex = startIndex;

    while (currentIndex > 0) {
      const parentIndex = Math.floor((currentIndex - 1) / 2);
      if (this.heap[parentIndex].priority >= this.heap[currentIndex].priority) {
        break;
      }
      this.swap(parentIndex, currentIndex);
      currentIndex = parentIndex;
    }
  }

  private heapifyDown(startIndex: number): void {
    const heapSize = this.heap.length;
    let currentIndex = startIndex;

    while (true) {
      const left = 2 * currentIndex + 1;
      const right = left + 1;
      let largest = currentIndex;

      if (left < heapSize && this.heap[left].priority > this.heap[largest].priority) {
        largest = left;
      }
      if (right < heapSize && this.heap[right].priority > this.heap[largest].priority) {
        largest = right;
      }
      if (largest === currentIndex) {
        return;
      }

      this.swap(currentIndex, largest);
      currentIndex = largest;
    }
  }

  private swap(i: number, j: number): void {
    [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
  }
}
