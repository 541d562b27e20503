import { z } from 'zod';

/**
 * Time-of-day and light state owned by the game's turn system. The scanner
 * only reads it to choose a radius profile and a no-fog halo.
 */
export const ClockStateSchema = z.object({
    hour: z.number().int().min(0).max(23)
        .describe('Hour of the in-game day, 0-23'),
    lightSourceActive: z.boolean().default(false)
        .describe('Whether the viewer carries a lit torch or lantern'),
});
export type ClockState = z.infer<typeof ClockStateSchema>;
export type ClockStateInput = z.input<typeof ClockStateSchema>;

export const DayPhaseSchema = z.enum(['day', 'dusk', 'night']);
export type DayPhase = z.infer<typeof DayPhaseSchema>;
