/**
 * Normalizer for CandidateItem records arriving from upstream catalogs.
 *
 * normalizeCandidate() — parse-and-throw boundary: trims text, stringifies
 *   scalar tag values and drops empty tags, so the engine always receives the
 *   exact CandidateItem shape.
 * validateCandidate() — soft quality check: emits console.warn when the
 *   display metadata is too thin for the model to reason about.
 */
import { z } from 'zod';
import type { CandidateItem } from '../types';

// ── Zod schema ────────────────────────────────────────────────────────────────

const tagValueSchema = z.union([z.string(), z.number().finite(), z.boolean()]).transform((v) => String(v).trim());

export const rawCandidateSchema = z.object({
  id: z.union([z.string(), z.number().int()]).transform((v) => String(v).trim()).pipe(z.string().min(1)),
  name: z.string().trim().min(1),
  description: z.string().trim().default(''),
  tags: z
    .record(tagValueSchema)
    .default({})
    .transform((tags) => Object.fromEntries(Object.entries(tags).filter(([, v]) => v.length > 0))),
  priorScore: z.number().finite().optional(),
});

// Compile-time assertion: the schema's output type must satisfy CandidateItem.
// If this line produces a type error, the schema has drifted from CandidateItem.
type _InferredCandidate = z.output<typeof rawCandidateSchema>;
const _satisfiesCheck: _InferredCandidate extends CandidateItem ? true : never = true;
void _satisfiesCheck;

// ── Exported helpers ──────────────────────────────────────────────────────────

/**
 * Parse raw (unknown) input through the Zod schema.
 * Throws a ZodError on any validation failure — call at catalog boundaries so
 * callers can handle the exception and skip bad records.
 */
export function normalizeCandidate(raw: unknown): CandidateItem {
  const { priorScore, ...rest } = rawCandidateSchema.parse(raw);
  return priorScore === undefined ? rest : { ...rest, priorScore };
}

/** Minimum description length (characters) before a candidate counts as thin. */
const MIN_DESCRIPTION_LENGTH = 10;

/**
 * Soft quality check — emits a console.warn when a candidate has neither a
 * usable description nor any tags. Does NOT throw; returns whether it warned.
 */
export function validateCandidate(item: CandidateItem): boolean {
  const thinDescription = item.description.length < MIN_DESCRIPTION_LENGTH;
  const noTags = Object.keys(item.tags).length === 0;

  if (thinDescription && noTags) {
    console.warn(
      `[validateCandidate] "${item.name}" (${item.id}) has no tags and a ` +
        `${item.description.length}-character description. ` +
        `The model will have little to rank it on.`,
    );
    return true;
  }
  return false;
}
