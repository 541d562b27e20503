import { z } from 'zod';

/**
 * A fog bank centred on a cell. Each ring out to `radius` is sampled and a
 * ring point becomes fog with probability `intensity`.
 */
export const WeatherSystemSchema = z.object({
    row: z.number().int().min(0),
    col: z.number().int().min(0),
    radius: z.number().int().min(1).max(64),
    intensity: z.number().min(0).max(1),
});
export type WeatherSystem = z.infer<typeof WeatherSystemSchema>;
