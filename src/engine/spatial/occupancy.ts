/**
 * Occupancy - which cells are held by tracked entities right now.
 *
 * The engines only ever see the OccupancyOracle predicate. OccupancyIndex is
 * the host-side index behind it: a single arena of creatures and vessels plus
 * a cell index over their footprints, replacing per-kind tables keyed by
 * position. A vessel blocks all three cells of its footprint.
 *
 * @module spatial/occupancy
 */

import { BearingSchema, Coord, CoordSchema } from '../../schema/base-schemas.js';
import { OccupancyError } from '../../utils/errors.js';
import { coordKey } from './geometry.js';
import { footprintCells, Heading, VesselSection, vesselFootprint } from './vessel.js';

export interface OccupancyOracle {
    /** False when any tracked entity's footprint covers the cell */
    isCellFree(coord: Coord): boolean;
}

/**
 * Occupancy view for callers with nothing to track.
 */
export const NO_OCCUPANTS: OccupancyOracle = {
    isCellFree: () => true,
};

export interface CreatureView {
    id: string;
    kind: string;
}

export interface VesselPartView {
    vesselId: string;
    kind: string;
    section: VesselSection;
    heading: Heading;
}

type TrackedEntity =
    | { type: 'creature'; id: string; kind: string; position: Coord }
    | { type: 'vessel'; id: string; kind: string; position: Coord; bearing: number };

interface CellClaim {
    entityId: string;
    section?: VesselSection;
}

export class OccupancyIndex implements OccupancyOracle {
    private entities: Map<string, TrackedEntity> = new Map();
    private cells: Map<string, CellClaim[]> = new Map();

    /**
     * @throws OccupancyError if the id is already tracked or the position is not an integer cell
     */
    addCreature(id: string, kind: string, position: Coord): void {
        this.track({ type: 'creature', id, kind, position: validPosition(id, position) });
    }

    /**
     * Track a vessel whose deck (centre) is at `deck`, pointed along `bearing` (0-15).
     *
     * @throws OccupancyError if the id is already tracked, or the deck or bearing is invalid
     */
    addVessel(id: string, kind: string, deck: Coord, bearing: number): void {
        this.track({ type: 'vessel', id, kind, position: validPosition(id, deck), bearing: validBearing(id, bearing) });
    }

    /**
     * Move an entity (a vessel moves by its deck). Returns false for unknown ids.
     *
     * @throws OccupancyError if the position is not an integer cell
     */
    move(id: string, position: Coord): boolean {
        const entity = this.entities.get(id);
        if (!entity) return false;

        const next = validPosition(id, position);
        this.release(entity);
        entity.position = next;
        this.claim(entity);
        return true;
    }

    /**
     * Re-orient a vessel. Returns false for unknown ids and for creatures.
     *
     * @throws OccupancyError if the bearing is not an integer
     */
    setBearing(id: string, bearing: number): boolean {
        const entity = this.entities.get(id);
        if (!entity || entity.type !== 'vessel') return false;

        const next = validBearing(id, bearing);
        this.release(entity);
        entity.bearing = next;
        this.claim(entity);
        return true;
    }

    remove(id: string): boolean {
        const entity = this.entities.get(id);
        if (!entity) return false;

        this.release(entity);
        this.entities.delete(id);
        return true;
    }

    has(id: string): boolean {
        return this.entities.has(id);
    }

    /**
     * Cells covered by an entity, deck first for vessels. Empty for unknown ids.
     */
    footprintOf(id: string): Coord[] {
        const entity = this.entities.get(id);
        if (!entity) return [];
        return this.cellsOf(entity).map(cell => cell.coord);
    }

    /**
     * Ids of every entity covering a cell, in the order they claimed it.
     */
    entitiesAt(coord: Coord): string[] {
        return (this.cells.get(coordKey(coord)) ?? []).map(claim => claim.entityId);
    }

    isCellFree(coord: Coord): boolean {
        return !this.cells.has(coordKey(coord));
    }

    /**
     * Read-only occupancy that ignores one entity, so a querent's own
     * footprint does not block its path.
     */
    view(excludeEntityId?: string): OccupancyOracle {
        return {
            isCellFree: (coord: Coord): boolean => {
                const claims = this.cells.get(coordKey(coord));
                if (!claims) return true;
                return claims.every(claim => claim.entityId === excludeEntityId);
            }
        };
    }

    creatureAt(coord: Coord): CreatureView | undefined {
        for (const claim of this.cells.get(coordKey(coord)) ?? []) {
            const entity = this.entities.get(claim.entityId);
            if (entity?.type === 'creature') {
                return { id: entity.id, kind: entity.kind };
            }
        }
        return undefined;
    }

    vesselPartAt(coord: Coord): VesselPartView | undefined {
        for (const claim of this.cells.get(coordKey(coord)) ?? []) {
            const entity = this.entities.get(claim.entityId);
            if (entity?.type === 'vessel' && claim.section) {
                return {
                    vesselId: entity.id,
                    kind: entity.kind,
                    section: claim.section,
                    heading: vesselFootprint(entity.position, entity.bearing).heading,
                };
            }
        }
        return undefined;
    }

    private track(entity: TrackedEntity): void {
        if (this.entities.has(entity.id)) {
            throw new OccupancyError(`Entity ${entity.id} is already tracked`, entity.id);
        }
        this.claim(entity);
        this.entities.set(entity.id, entity);
    }

    private cellsOf(entity: TrackedEntity): Array<{ coord: Coord; section?: VesselSection }> {
        if (entity.type === 'creature') {
            return [{ coord: entity.position }];
        }
        return footprintCells(vesselFootprint(entity.position, entity.bearing));
    }

    private claim(entity: TrackedEntity): void {
        for (const { coord, section } of this.cellsOf(entity)) {
            const key = coordKey(coord);
            const claims = this.cells.get(key) ?? [];
            claims.push({ entityId: entity.id, section });
            this.cells.set(key, claims);
        }
    }

    private release(entity: TrackedEntity): void {
        for (const { coord } of this.cellsOf(entity)) {
            const key = coordKey(coord);
            const remaining = (this.cells.get(key) ?? []).filter(claim => claim.entityId !== entity.id);
            if (remaining.length === 0) {
                this.cells.delete(key);
            } else {
                this.cells.set(key, remaining);
            }
        }
    }
}

function validPosition(id: string, position: Coord): Coord {
    const parsed = CoordSchema.safeParse(position);
    if (!parsed.success) {
        throw new OccupancyError(`Invalid position ${JSON.stringify(position)}`, id);
    }
    return parsed.data;
}

function validBearing(id: string, bearing: number): number {
    const parsed = BearingSchema.safeParse(bearing);
    if (!parsed.success) {
        throw new OccupancyError(`Invalid bearing ${String(bearing)}`, id);
    }
    return parsed.data;
}
