import { Coord } from '../../schema/base-schemas.js';
import { coordKey } from './geometry.js';

export interface ItemView {
    id: string;
    kind: string;
    /** Hidden items (buried treasure, traps) are never drawn */
    hidden: boolean;
}

/**
 * Ground items stacked per cell, bottom first. Only the stack order matters
 * to the scanner; item contents belong to the inventory system.
 */
export class ItemPiles {
    private piles: Map<string, ItemView[]> = new Map();

    place(coord: Coord, item: ItemView): void {
        const key = coordKey(coord);
        const pile = this.piles.get(key) ?? [];
        pile.push({ ...item });
        this.piles.set(key, pile);
    }

    /**
     * Remove and return the top item of a cell's pile.
     */
    takeTop(coord: Coord): ItemView | undefined {
        const key = coordKey(coord);
        const pile = this.piles.get(key);
        if (!pile) return undefined;

        const item = pile.pop();
        if (pile.length === 0) {
            this.piles.delete(key);
        }
        return item;
    }

    countAt(coord: Coord): number {
        return this.piles.get(coordKey(coord))?.length ?? 0;
    }

    itemsAt(coord: Coord): readonly ItemView[] {
        return this.piles.get(coordKey(coord)) ?? [];
    }
}

/**
 * The highest item in a pile that is not hidden.
 */
export function topVisibleItem(pile: readonly ItemView[]): ItemView | undefined {
    for (let i = pile.length - 1; i >= 0; i--) {
        if (!pile[i].hidden) return pile[i];
    }
    return undefined;
}
