import { Coord } from '../../schema/base-schemas.js';
import { ItemPiles, ItemView } from '../spatial/items.js';
import { CreatureView, OccupancyIndex, VesselPartView } from '../spatial/occupancy.js';

/**
 * What stands on a cell, as far as drawing it is concerned. Read only.
 */
export interface SceneView {
    creatureAt(coord: Coord): CreatureView | undefined;
    vesselPartAt(coord: Coord): VesselPartView | undefined;
    /** Ground items on the cell, bottom of the pile first */
    itemsAt(coord: Coord): readonly ItemView[];
}

export const EMPTY_SCENE: SceneView = {
    creatureAt: () => undefined,
    vesselPartAt: () => undefined,
    itemsAt: () => [],
};

/**
 * Scene over the host's occupancy index and item piles.
 */
export function createSceneView(occupancy: OccupancyIndex, items?: ItemPiles): SceneView {
    return {
        creatureAt: coord => occupancy.creatureAt(coord),
        vesselPartAt: coord => occupancy.vesselPartAt(coord),
        itemsAt: coord => items?.itemsAt(coord) ?? [],
    };
}
