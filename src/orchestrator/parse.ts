import { z } from "zod";
import type { DraftPlan } from "../types/contracts.js";
import { PlanValidationError, errorMessage } from "../errors.js";

const idSchema = z.union([z.string(), z.number().int()]).transform(v => String(v));

const stepSchema = z.object({
  id: idSchema,
  agent: z.string().default(""),
  need: z.array(idSchema).default([]),
  task: z.string().default("")
});

export const planDocumentSchema = z.object({
  plan: z.array(stepSchema)
});

export type PlanDocument = z.infer<typeof planDocumentSchema>;

/** Shape-check a `{ plan: [...] }` document; semantics are left to validatePlan. */
export function parsePlanDocument(input: unknown): DraftPlan {
  const parsed = planDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(i => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join(", ");
    throw new PlanValidationError([{ code: "malformed", message: `malformed plan document (${detail})`, step_ids: [] }]);
  }
  return {
    steps: parsed.data.plan.map(s => ({ id: s.id, agent: s.agent, need: s.need, task: s.task }))
  };
}

export function parsePlanJson(text: string): DraftPlan {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e) {
    throw new PlanValidationError([{ code: "malformed", message: `plan is not valid JSON: ${errorMessage(e)}`, step_ids: [] }]);
  }
  return parsePlanDocument(doc);
}
