/**
 * Zod schemas for SPARQL JSON results and the concept tree.
 */
import { z } from "zod";

const UriTermSchema = z.object({
  type: z.literal("uri"),
  value: z.string().min(1),
});

export const ConceptBindingSchema = z.object({
  concept: UriTermSchema,
  prefLabel: z
    .object({
      value: z.string(),
      "xml:lang": z.string().optional(),
    })
    .optional(),
  broader: UriTermSchema.optional(),
});

export type ConceptBinding = z.infer<typeof ConceptBindingSchema>;

export interface ConceptNode {
  iri: string;
  label: string | null;
  children: ConceptNode[];
}

export const ConceptNodeSchema: z.ZodType<ConceptNode> = z.lazy(() =>
  z.object({
    iri: z.string(),
    label: z.string().nullable(),
    children: z.array(ConceptNodeSchema),
  }),
);

export const ConceptTreeSchema = z.array(ConceptNodeSchema);
