import { MinHeap } from '../../../src/engine/spatial/heap.js';

interface Node {
    id: string;
}

const node = (id: string): Node => ({ id });

describe('MinHeap', () => {
    it('extracts in priority order', () => {
        const heap = new MinHeap<Node>(n => n.id);
        heap.insert(node('c'), 3);
        heap.insert(node('a'), 1);
        heap.insert(node('d'), 4);
        heap.insert(node('b'), 2);

        const order: string[] = [];
        let next = heap.extractMin();
        while (next) {
            order.push(next.id);
            next = heap.extractMin();
        }

        expect(order).toEqual(['a', 'b', 'c', 'd']);
    });

    it('breaks ties by insertion order', () => {
        const heap = new MinHeap<Node>(n => n.id);
        for (const id of ['e', 'b', 'd', 'a', 'c']) {
            heap.insert(node(id), 5);
        }

        const order: string[] = [];
        while (!heap.isEmpty()) {
            const next = heap.extractMin();
            if (next) order.push(next.id);
        }

        expect(order).toEqual(['e', 'b', 'd', 'a', 'c']);
    });

    it('returns null when empty', () => {
        const heap = new MinHeap<Node>(n => n.id);

        expect(heap.extractMin()).toBeNull();
        expect(heap.peekPriority()).toBeNull();
    });

    it('lowers the priority of a re-inserted item', () => {
        const heap = new MinHeap<Node>(n => n.id);
        heap.insert(node('a'), 5);
        heap.insert(node('b'), 3);
        heap.insert(node('a'), 1);

        expect(heap.size()).toBe(2);
        expect(heap.peekPriority()).toBe(1);
        expect(heap.extractMin()?.id).toBe('a');
    });

    it('ignores a priority increase', () => {
        const heap = new MinHeap<Node>(n => n.id);
        heap.insert(node('a'), 2);
        heap.insert(node('b'), 3);
        heap.decreaseKey(node('a'), 10);

        expect(heap.extractMin()?.id).toBe('a');
    });

    it('tracks membership by key', () => {
        const heap = new MinHeap<Node>(n => n.id);
        heap.insert(node('a'), 1);

        expect(heap.has(node('a'))).toBe(true);
        heap.extractMin();
        expect(heap.has(node('a'))).toBe(false);
        expect(heap.isEmpty()).toBe(true);
    });
});
