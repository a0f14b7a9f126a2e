import { z } from 'zod';

export const ENTITY_CATEGORIES = [
  'Person',
  'Organization',
  'Object',
  'Location',
  'Event',
  'Date',
  'Concept',
  'Trait',
  'Role',
  'Animal',
  'Technology',
  'Product',
] as const;

export const EntitySchema = z.object({
  label: z.string().min(1),
  category: z.string().min(1),
});

export const ObservationSchema = z.object({
  observation: z.string(),
  relationship: z.string(),
  entities: z.array(EntitySchema),
});

export type Entity = z.infer<typeof EntitySchema>;
export type Observation = z.infer<typeof ObservationSchema>;

/**
 * Parse the model's JSON output into observations.
 * Anything that is not a JSON array of observations yields an empty list.
 */
export function parseObservations(content: string): Observation[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return [];
  }

  const parsed = z.array(ObservationSchema).safeParse(raw);
  return parsed.success ? parsed.data : [];
}

/**
 * Count observations and distinct entity labels across chunk outputs
 */
export function summarizeObservations(contents: string[]): {
  observationsCount: number;
  entitiesCount: number;
} {
  const labels = new Set<string>();
  let observationsCount = 0;

  for (const content of contents) {
    const observations = parseObservations(content);
    observationsCount += observations.length;
    for (const obs of observations) {
      for (const entity of obs.entities) {
        labels.add(entity.label);
      }
    }
  }

  return { observationsCount, entitiesCount: labels.size };
}
