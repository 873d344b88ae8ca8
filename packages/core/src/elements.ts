import type { z } from "zod";

import { StructuralParseError } from "./errors";
import {
  blocksElementSchema,
  countElementSchema,
  elementProbeSchema,
  fixedScaleQuestionElementSchema,
  flowElementSchema,
  keyedQuestionElementSchema,
  type BlockDescriptor,
  type FixedScaleQuestionPayload,
  type FlowNode,
  type KeyedQuestionPayload,
} from "./schemas";

export type QuestionPayload =
  | { shape: "keyed"; payload: KeyedQuestionPayload }
  | { shape: "fixed_scale"; payload: FixedScaleQuestionPayload };

export type SurveyElement =
  | { kind: "block"; blocks: BlockDescriptor[] }
  | { kind: "flow"; flow: FlowNode[] }
  | { kind: "question"; question: QuestionPayload }
  | { kind: "count"; count: string | number | null }
  | { kind: "unknown"; tag: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

function decodeWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, index: number, tag: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new StructuralParseError("MalformedElement", `${tag} payload does not match any known shape: ${describeIssues(result.error)}`, {
      elementIndex: index,
      elementTag: tag,
      cause: result.error,
    });
  }
  return result.data;
}

function hasPositionalChoices(raw: unknown): boolean {
  if (typeof raw !== "object" || raw === null || !("Payload" in raw)) return false;
  const payload = raw.Payload;
  if (typeof payload !== "object" || payload === null || !("Choices" in payload)) return false;
  const choices = payload.Choices;
  return Array.isArray(choices) && choices.length > 0 && choices.every((c) => typeof c === "object" && c !== null);
}

/**
 * Decode one SurveyElements entry: probe the discriminator, then decode the
 * whole entry with the schema for that discriminator's payload shape.
 */
export function decodeElement(raw: unknown, index: number): SurveyElement {
  const probe = elementProbeSchema.safeParse(raw);
  if (!probe.success) {
    throw new StructuralParseError("MalformedElement", "survey element has no Element tag", {
      elementIndex: index,
      cause: probe.error,
    });
  }

  const tag = probe.data.Element;
  switch (tag) {
    case "BL": {
      const element = decodeWith(blocksElementSchema, raw, index, tag);
      const blocks = Array.isArray(element.Payload) ? element.Payload : Object.values(element.Payload);
      return { kind: "block", blocks };
    }
    case "FL": {
      const element = decodeWith(flowElementSchema, raw, index, tag);
      return { kind: "flow", flow: element.Payload.Flow };
    }
    case "QC": {
      const element = decodeWith(countElementSchema, raw, index, tag);
      return { kind: "count", count: element.SecondaryAttribute ?? null };
    }
    case "SQ": {
      if (hasPositionalChoices(raw)) {
        const element = decodeWith(fixedScaleQuestionElementSchema, raw, index, tag);
        return { kind: "question", question: { shape: "fixed_scale", payload: element.Payload } };
      }
      const element = decodeWith(keyedQuestionElementSchema, raw, index, tag);
      return { kind: "question", question: { shape: "keyed", payload: element.Payload } };
    }
    default:
      return { kind: "unknown", tag };
  }
}
