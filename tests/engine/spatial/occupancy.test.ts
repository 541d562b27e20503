import { ItemPiles, topVisibleItem } from '../../../src/engine/spatial/items.js';
import { NO_OCCUPANTS, OccupancyIndex } from '../../../src/engine/spatial/occupancy.js';
import { OccupancyError } from '../../../src/utils/errors.js';

describe('OccupancyIndex', () => {
    let occupancy: OccupancyIndex;

    beforeEach(() => {
        occupancy = new OccupancyIndex();
    });

    it('claims a single cell for a creature', () => {
        occupancy.addCreature('boar-1', 'boar', { row: 2, col: 3 });

        expect(occupancy.isCellFree({ row: 2, col: 3 })).toBe(false);
        expect(occupancy.isCellFree({ row: 2, col: 4 })).toBe(true);
        expect(occupancy.creatureAt({ row: 2, col: 3 })).toEqual({ id: 'boar-1', kind: 'boar' });
    });

    it('claims all three cells of a vessel', () => {
        occupancy.addVessel('ship-1', 'sloop', { row: 5, col: 5 }, 0);

        expect(occupancy.footprintOf('ship-1')).toEqual([
            { row: 5, col: 5 }, { row: 4, col: 5 }, { row: 6, col: 5 },
        ]);
        expect(occupancy.isCellFree({ row: 4, col: 5 })).toBe(false);
        expect(occupancy.isCellFree({ row: 6, col: 5 })).toBe(false);
    });

    it('describes vessel parts with section and heading', () => {
        occupancy.addVessel('ship-1', 'sloop', { row: 5, col: 5 }, 4);

        expect(occupancy.vesselPartAt({ row: 5, col: 6 })).toEqual({
            vesselId: 'ship-1',
            kind: 'sloop',
            section: 'bow',
            heading: 'E',
        });
        expect(occupancy.creatureAt({ row: 5, col: 6 })).toBeUndefined();
    });

    it('refuses a duplicate id', () => {
        occupancy.addCreature('snake-1', 'snake', { row: 0, col: 0 });

        expect(() => occupancy.addVessel('snake-1', 'raft', { row: 3, col: 3 }, 0))
            .toThrow('Entity snake-1 is already tracked');
    });

    it('rejects a vessel with a non-integer bearing and tracks nothing', () => {
        for (const bearing of [Number.NaN, Number.POSITIVE_INFINITY, 2.5]) {
            expect(() => occupancy.addVessel('ship-1', 'sloop', { row: 1, col: 1 }, bearing)).toThrow(OccupancyError);
        }

        expect(occupancy.has('ship-1')).toBe(false);
        expect(occupancy.isCellFree({ row: 1, col: 1 })).toBe(true);
        expect(occupancy.remove('ship-1')).toBe(false);

        occupancy.addVessel('ship-1', 'sloop', { row: 1, col: 1 }, 0);
        expect(occupancy.footprintOf('ship-1')).toEqual([
            { row: 1, col: 1 }, { row: 0, col: 1 }, { row: 2, col: 1 },
        ]);
    });

    it('names the entity and the bad value', () => {
        let caught: unknown;
        try {
            occupancy.addVessel('ship-1', 'sloop', { row: 1, col: 1 }, Number.NaN);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(OccupancyError);
        expect(String(caught)).toBe('OccupancyError [ship-1]: Invalid bearing NaN');
    });

    it('rejects a fractional position', () => {
        expect(() => occupancy.addCreature('boar-1', 'boar', { row: 0.5, col: 1 })).toThrow(OccupancyError);
        expect(occupancy.has('boar-1')).toBe(false);
    });

    it('keeps the old orientation when a new bearing is rejected', () => {
        occupancy.addVessel('ship-1', 'sloop', { row: 5, col: 5 }, 4);

        expect(() => occupancy.setBearing('ship-1', Number.NEGATIVE_INFINITY)).toThrow('Invalid bearing -Infinity');
        expect(occupancy.footprintOf('ship-1')).toEqual([
            { row: 5, col: 5 }, { row: 5, col: 6 }, { row: 5, col: 4 },
        ]);
        expect(occupancy.remove('ship-1')).toBe(true);
    });

    it('keeps the first entity intact when a duplicate is refused', () => {
        occupancy.addCreature('boar-1', 'boar', { row: 0, col: 0 });

        expect(() => occupancy.addCreature('boar-1', 'boar', { row: 3, col: 3 })).toThrow(OccupancyError);
        expect(occupancy.isCellFree({ row: 3, col: 3 })).toBe(true);
        expect(occupancy.entitiesAt({ row: 0, col: 0 })).toEqual(['boar-1']);
    });

    it('moves claims with the entity', () => {
        occupancy.addVessel('ship-1', 'sloop', { row: 5, col: 5 }, 4);

        expect(occupancy.move('ship-1', { row: 5, col: 6 })).toBe(true);
        expect(occupancy.isCellFree({ row: 5, col: 4 })).toBe(true);
        expect(occupancy.footprintOf('ship-1')).toEqual([
            { row: 5, col: 6 }, { row: 5, col: 7 }, { row: 5, col: 5 },
        ]);
    });

    it('re-orients vessels only', () => {
        occupancy.addVessel('ship-1', 'sloop', { row: 5, col: 5 }, 0);
        occupancy.addCreature('shark-1', 'shark', { row: 0, col: 0 });

        expect(occupancy.setBearing('ship-1', 8)).toBe(true);
        expect(occupancy.vesselPartAt({ row: 6, col: 5 })?.section).toBe('bow');
        expect(occupancy.setBearing('shark-1', 8)).toBe(false);
        expect(occupancy.setBearing('ghost', 8)).toBe(false);
    });

    it('releases cells on removal', () => {
        occupancy.addCreature('boar-1', 'boar', { row: 1, col: 1 });

        expect(occupancy.remove('boar-1')).toBe(true);
        expect(occupancy.has('boar-1')).toBe(false);
        expect(occupancy.isCellFree({ row: 1, col: 1 })).toBe(true);
        expect(occupancy.remove('boar-1')).toBe(false);
    });

    it('keeps overlapping claims until each is released', () => {
        occupancy.addVessel('ship-1', 'sloop', { row: 5, col: 5 }, 0);
        occupancy.addCreature('player', 'player', { row: 5, col: 5 });

        expect(occupancy.entitiesAt({ row: 5, col: 5 })).toEqual(['ship-1', 'player']);
        occupancy.move('player', { row: 4, col: 5 });
        expect(occupancy.entitiesAt({ row: 5, col: 5 })).toEqual(['ship-1']);
    });

    it('builds a view that ignores the querent', () => {
        occupancy.addVessel('ship-1', 'sloop', { row: 5, col: 5 }, 0);
        occupancy.addCreature('boar-1', 'boar', { row: 0, col: 0 });
        const view = occupancy.view('ship-1');

        expect(view.isCellFree({ row: 4, col: 5 })).toBe(true);
        expect(view.isCellFree({ row: 0, col: 0 })).toBe(false);
        expect(occupancy.view().isCellFree({ row: 4, col: 5 })).toBe(false);
    });

    it('has an empty stand-in', () => {
        expect(NO_OCCUPANTS.isCellFree({ row: 9, col: 9 })).toBe(true);
    });
});

describe('ItemPiles', () => {
    it('stacks items bottom first and takes from the top', () => {
        const piles = new ItemPiles();
        const cell = { row: 2, col: 2 };
        piles.place(cell, { id: 'i1', kind: 'coin', hidden: false });
        piles.place(cell, { id: 'i2', kind: 'rope', hidden: false });

        expect(piles.itemsAt(cell).map(item => item.id)).toEqual(['i1', 'i2']);
        expect(piles.takeTop(cell)?.id).toBe('i2');
        expect(piles.countAt(cell)).toBe(1);
        expect(piles.takeTop(cell)?.id).toBe('i1');
        expect(piles.takeTop(cell)).toBeUndefined();
        expect(piles.itemsAt(cell)).toEqual([]);
    });

    it('skips hidden items when picking what to show', () => {
        expect(topVisibleItem([
            { id: 'i1', kind: 'coin', hidden: false },
            { id: 'i2', kind: 'chest', hidden: false },
            { id: 'i3', kind: 'trap', hidden: true },
        ])?.id).toBe('i2');
        expect(topVisibleItem([{ id: 'i3', kind: 'trap', hidden: true }])).toBeUndefined();
        expect(topVisibleItem([])).toBeUndefined();
    });
});
