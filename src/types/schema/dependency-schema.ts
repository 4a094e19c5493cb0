/**
 * Dependency edge schemas.
 *
 * @module dependency-schema
 */
import { z } from 'zod'

/**
 * Kinds of dependency edge. Every kind takes part in cycle detection and in
 * ready/blocked derivation, not only `blocks`.
 *
 * @category Dependencies
 * @group Dependency
 */
export const DepTypeSchema = z.enum([
  'blocks',
  'related',
  'parent-child',
  'discovered-from',
])

/** @category Dependencies */
export type DepType = z.infer<typeof DepTypeSchema>

/**
 * A directed edge `from_id → to_id`: `from_id` is blocked by `to_id`.
 *
 * At most one edge exists per `(from_id, to_id)` pair. Edges are never edited
 * in place; remove and re-add to change `dep_type`.
 *
 * @category Dependencies
 * @group Dependency
 */
export const DependencySchema = z.object({
  from_id: z.string().min(1),
  to_id: z.string().min(1),
  dep_type: DepTypeSchema,
  created_at: z.string().datetime(),
})

/**
 * A validated dependency edge. Derived from {@link DependencySchema}.
 *
 * @category Dependencies
 * @group Dependency
 */
export type Dependency = z.infer<typeof DependencySchema>
