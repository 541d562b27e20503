/**
 * Min-heap priority queue for A* open sets and substitute-goal selection.
 * Provides O(log n) insert and extract-min operations.
 *
 * Entries with equal priority come out in insertion order, so a search over
 * a fixed grid always expands nodes in the same sequence.
 */
interface HeapEntry<T> {
    item: T;
    priority: number;
    seq: number;
}

export class MinHeap<T> {
    private heap: Array<HeapEntry<T>> = [];
    private itemMap: Map<string, number> = new Map(); // Maps item key to index
    private nextSeq = 0;

    constructor(private keyFn: (item: T) => string) { }

    /**
     * Insert an item with a given priority. Re-inserting a queued item
     * lowers its priority if the new one is smaller and is a no-op otherwise.
     * Time complexity: O(log n)
     */
    insert(item: T, priority: number): void {
        const key = this.keyFn(item);

        if (this.itemMap.has(key)) {
            this.decreaseKey(item, priority);
            return;
        }

        this.heap.push({ item, priority, seq: this.nextSeq++ });
        const index = this.heap.length - 1;
        this.itemMap.set(key, index);
        this.bubbleUp(index);
    }

    /**
     * Extract and return the item with minimum priority.
     * Time complexity: O(log n)
     */
    extractMin(): T | null {
        const last = this.heap.pop();
        if (last === undefined) return null;

        if (this.heap.length === 0) {
            this.itemMap.clear();
            return last.item;
        }

        const min = this.heap[0];
        this.heap[0] = last;

        this.itemMap.delete(this.keyFn(min.item));
        this.itemMap.set(this.keyFn(last.item), 0);

        this.bubbleDown(0);
        return min.item;
    }

    /**
     * Priority of the item at the top of the heap, without removing it.
     */
    peekPriority(): number | null {
        return this.heap.length > 0 ? this.heap[0].priority : null;
    }

    /**
     * Decrease the priority of an existing item.
     * Time complexity: O(log n)
     */
    decreaseKey(item: T, newPriority: number): void {
        const index = this.itemMap.get(this.keyFn(item));

        if (index === undefined) return;

        const entry = this.heap[index];
        if (newPriority >= entry.priority) return; // Only decrease, not increase

        entry.priority = newPriority;
        entry.item = item;
        this.bubbleUp(index);
    }

    has(item: T): boolean {
        return this.itemMap.has(this.keyFn(item));
    }

    isEmpty(): boolean {
        return this.heap.length === 0;
    }

    size(): number {
        return this.heap.length;
    }

    /**
     * Ordering: lower priority first, earlier insertion breaks ties.
     */
    private precedes(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
        if (a.priority !== b.priority) {
            return a.priority < b.priority;
        }
        return a.seq < b.seq;
    }

    private bubbleUp(index: number): void {
        while (index > 0) {
            const parentIndex = Math.floor((index - 1) / 2);

            if (!this.precedes(this.heap[index], this.heap[parentIndex])) {
                break;
            }

            this.swap(index, parentIndex);
            index = parentIndex;
        }
    }

    private bubbleDown(index: number): void {
        while (true) {
            const leftChild = 2 * index + 1;
            const rightChild = 2 * index + 2;
            let smallest = index;

            if (leftChild < this.heap.length &&
                this.precedes(this.heap[leftChild], this.heap[smallest])) {
                smallest = leftChild;
            }

            if (rightChild < this.heap.length &&
                this.precedes(this.heap[rightChild], this.heap[smallest])) {
                smallest = rightChild;
            }

            if (smallest === index) break;

            this.swap(index, smallest);
            index = smallest;
        }
    }

    /**
     * Swap two elements in the heap and update the item map.
     */
    private swap(i: number, j: number): void {
        const temp = this.heap[i];
        this.heap[i] = this.heap[j];
        this.heap[j] = temp;

        this.itemMap.set(this.keyFn(this.heap[i].item), i);
        this.itemMap.set(this.keyFn(this.heap[j].item), j);
    }
}
