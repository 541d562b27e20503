/**
 * Vessel geometry: a ship covers three cells in a line (aft, deck, bow)
 * oriented by its bearing on a 16-point compass (0 = north, clockwise).
 *
 * @module spatial/vessel
 */

import { Coord, Offset } from '../../schema/base-schemas.js';
import { offsetCoord } from './geometry.js';

export type Heading = 'N' | 'NE' | 'E' | 'SE' | 'S' | 'SW' | 'W' | 'NW';
export type VesselSection = 'deck' | 'bow' | 'aft';

export interface VesselFootprint {
    heading: Heading;
    deck: Coord;
    bow: Coord;
    aft: Coord;
}

const BOW_OFFSETS: Record<Heading, Offset> = {
    N: { dr: -1, dc: 0 },
    NE: { dr: -1, dc: 1 },
    E: { dr: 0, dc: 1 },
    SE: { dr: 1, dc: 1 },
    S: { dr: 1, dc: 0 },
    SW: { dr: 1, dc: -1 },
    W: { dr: 0, dc: -1 },
    NW: { dr: -1, dc: -1 },
};

/**
 * Bearings 0-15 snap to eight headings. Cardinal headings take three compass
 * points each; the diagonals only their exact point.
 *
 * | bearing    | heading |
 * |------------|---------|
 * | 15, 0, 1   | N       |
 * | 2          | NE      |
 * | 3, 4, 5    | E       |
 * | 6          | SE      |
 * | 7, 8, 9    | S       |
 * | 10         | SW      |
 * | 11, 12, 13 | W       |
 * | 14         | NW      |
 */
const HEADING_BY_BEARING: readonly Heading[] = [
    'N', 'N', 'NE', 'E', 'E', 'E', 'SE', 'S',
    'S', 'S', 'SW', 'W', 'W', 'W', 'NW', 'N',
];

export function headingForBearing(bearing: number): Heading {
    const normalized = ((Math.trunc(bearing) % 16) + 16) % 16;
    return HEADING_BY_BEARING[normalized];
}

/**
 * The three cells a vessel centred on `deck` covers. The aft sits opposite
 * the bow.
 */
export function vesselFootprint(deck: Coord, bearing: number): VesselFootprint {
    const heading = headingForBearing(bearing);
    const bow = BOW_OFFSETS[heading];
    return {
        heading,
        deck: { row: deck.row, col: deck.col },
        bow: offsetCoord(deck, bow),
        aft: offsetCoord(deck, { dr: -bow.dr, dc: -bow.dc }),
    };
}

export function footprintCells(footprint: VesselFootprint): Array<{ section: VesselSection; coord: Coord }> {
    return [
        { section: 'deck', coord: footprint.deck },
        { section: 'bow', coord: footprint.bow },
        { section: 'aft', coord: footprint.aft },
    ];
}
