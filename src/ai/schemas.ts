import { z } from 'zod';

export const ROUTES = ['STRUCTURED', 'DOCUMENT', 'BOTH'] as const;

export const RouteSchema = z.enum(ROUTES);

export type Route = z.infer<typeof RouteSchema>;

// What the routing model must return
export const RoutingDecisionSchema = z.object({
  route: RouteSchema,
  reasoning: z.string().min(1),
  confidence: z.number().min(0).max(1),
});

export type RoutingDecision = z.infer<typeof RoutingDecisionSchema>;

export const QueryRequestSchema = z.object({
  question: z.string(),
  k: z.number().int().min(1).max(50).optional(),
});

export const ClassifyRequestSchema = QueryRequestSchema.pick({ question: true });
