/**
 * Turns raw model text into a validated RankedList.
 *
 * The parser is the only source of truth for ordering: any rank the model
 * states is checked for shape and then discarded. A single reference to an item
 * outside the candidate set rejects the whole response.
 */
import { z } from 'zod';
import type { CandidateItem, RankedList, RankedRecommendation, RecommendationConfig } from '../types';
import { ResponseParseError } from './errors';

const modelRecommendationSchema = z
  .object({
    id: z.string().min(1),
    score: z.number().finite(),
    rationale: z.string().optional(),
    rank: z.number().int().positive().optional(),   // advisory only
  })
  .strict();

export const modelResponseSchema = z
  .object({
    recommendations: z.array(modelRecommendationSchema).min(1),
  })
  .strict();

type ModelResponse = z.infer<typeof modelResponseSchema>;

// ── Extraction ───────────────────────────────────────────────────────────────

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pull the JSON text out of a model reply. Prefers a fenced ```json block;
 * otherwise takes the span from the first `{` to the last `}`.
 * Returns `undefined` when neither is present.
 */
export function extractJsonBlock(rawText: string): string | undefined {
  const fenced = rawText.match(FENCED_JSON);
  if (fenced && fenced[1].trim().length > 0) return fenced[1].trim();

  const start = rawText.indexOf('{');
  const end = rawText.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  return rawText.slice(start, end + 1);
}

function decode(rawText: string): ModelResponse {
  const block = extractJsonBlock(rawText);
  if (block === undefined) {
    throw new ResponseParseError('MalformedOutput', 'No JSON object found in model response.');
  }

  let json: unknown;
  try {
    json = JSON.parse(block);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ResponseParseError('MalformedOutput', `Model response is not valid JSON: ${msg}`, { cause: err });
  }

  const result = modelResponseSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ResponseParseError('MalformedOutput', `Model response failed validation${where}: ${issue.message}`, {
      cause: result.error,
    });
  }
  return result.data;
}

// ── Main export ──────────────────────────────────────────────────────────────

/**
 * Parse, ground and rank a model reply.
 *
 * Throws ResponseParseError:
 *   - `MalformedOutput`        — no JSON block, invalid JSON, or schema mismatch
 *   - `UnknownItemReference`   — an id that is not in `candidates`
 *   - `DuplicateItemReference` — the same id listed twice
 */
export function parseRecommendations(
  rawText: string,
  candidates: readonly CandidateItem[],
  config: Pick<RecommendationConfig, 'maxResults' | 'rationale'>,
): RankedList {
  const { recommendations } = decode(rawText);

  const candidateOrder = new Map<string, number>();
  candidates.forEach((c, i) => candidateOrder.set(c.id, i));

  const seen = new Set<string>();
  const grounded = recommendations.map((rec) => {
    const order = candidateOrder.get(rec.id);
    if (order === undefined) {
      throw new ResponseParseError('UnknownItemReference', `Model referenced unknown item "${rec.id}".`);
    }
    if (seen.has(rec.id)) {
      throw new ResponseParseError('DuplicateItemReference', `Model referenced item "${rec.id}" more than once.`);
    }
    seen.add(rec.id);
    return { rec, order };
  });

  grounded.sort((a, b) => b.rec.score - a.rec.score || a.order - b.order);

  return grounded.slice(0, config.maxResults).map(({ rec }, index): RankedRecommendation => {
    const ranked: RankedRecommendation = { itemId: rec.id, rank: index + 1, score: rec.score };
    const rationale = rec.rationale?.trim();
    if (config.rationale && rationale) ranked.rationale = rationale;
    return ranked;
  });
}
