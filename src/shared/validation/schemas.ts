import { z } from 'zod';
import { HypergraphState } from '../engine/HypergraphState';
import { EngineErrorCode, PositionParseError } from '../engine/errors';
import type { TakeAwayMove } from '../types/hypergraph';

export const VertexSchema = z.union([z.string().min(1), z.number().finite()]);

// Arity and vertex-existence rules are enforced by HypergraphState itself so
// that hand-built and parsed positions fail the same way.
export const PositionSchema = z.object({
  vertices: z.array(VertexSchema),
  edges: z.array(z.array(VertexSchema)).default([]),
  faces: z.array(z.array(VertexSchema)).default([]),
});

export type PositionInput = z.infer<typeof PositionSchema>;

export const MoveSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('remove_vertex'), vertex: VertexSchema }),
  z.object({ type: z.literal('remove_hyperedge'), vertices: z.array(VertexSchema).min(1) }),
]);

export type MoveInput = z.infer<typeof MoveSchema>;

function describeIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Build a position from an untrusted description (parsed JSON, a fixture,
 * a request body). Throws PositionParseError on a shape mismatch and
 * ValidationError when the shape is fine but the hypergraph is not.
 */
export function parsePosition(input: unknown): HypergraphState {
  const result = PositionSchema.safeParse(input);
  if (!result.success) {
    throw new PositionParseError('Invalid position description', {
      issues: describeIssues(result.error),
    });
  }
  return HypergraphState.fromSnapshot(result.data);
}

export function parseMove(input: unknown): TakeAwayMove {
  const result = MoveSchema.safeParse(input);
  if (!result.success) {
    throw new PositionParseError(
      'Invalid move payload',
      { issues: describeIssues(result.error) },
      EngineErrorCode.INPUT_INVALID_MOVE
    );
  }
  return result.data;
}
