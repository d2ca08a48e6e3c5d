/**
 * @file heap.ts
 * @description Binary min-heap ordered by a comparator. Entries are never re-keyed;
 * callers push a fresh entry and skip stale ones on pop.
 */

export class MinHeap<T> {
    #items: T[] = [];
    readonly #compare: (a: T, b: T) => number;

    constructor(compare: (a: T, b: T) => number) {
        this.#compare = compare;
    }

    get size(): number {
        return this.#items.length;
    }

    push(item: T): void {
        const items = this.#items;
        items.push(item);
        let index = items.length - 1;
        while (index > 0) {
            const parent = (index - 1) >> 1;
            if (this.#compare(items[index], items[parent]) >= 0) {
                break;
            }
            [items[index], items[parent]] = [items[parent], items[index]];
            index = parent;
        }
    }

    /**
     * Removes and returns the smallest entry, or `undefined` when empty.
     */
    pop(): T | undefined {
        const items = this.#items;
        const top = items[0];
        const last = items.pop();
        if (items.length === 0 || last === undefined) {
            return top;
        }

        items[0] = last;
        let index = 0;
        for (;;) {
            const left = 2 * index + 1;
            const right = left + 1;
            let smallest = index;
            if (left < items.length && this.#compare(items[left], items[smallest]) < 0) {
                smallest = left;
            }
            if (right < items.length && this.#compare(items[right], items[smallest]) < 0) {
                smallest = right;
            }
            if (smallest === index) {
                break;
            }
            [items[index], items[smallest]] = [items[smallest], items[index]];
            index = smallest;
        }
        return top;
    }
}
