import type { Logger } from "./logger";
import type { Question } from "./types";

const INHERITED_KINDS = new Set(["DisplayedChoices", "SelectedChoices"]);

/**
 * Backfill questions whose choices are carried over from another question.
 * Returns a new map; the input is left untouched. A source that is itself
 * dynamic is resolved first, so chains resolve in any order; a cycle is
 * logged and left unresolved.
 */
export function resolveDynamicChoices(
  questions: ReadonlyMap<string, Question>,
  order: readonly string[],
  logger: Logger
): Map<string, Question> {
  const resolved = new Map(questions);
  const done = new Set<string>();
  const visiting = new Set<string>();

  const resolve = (id: string): Question | undefined => {
    const question = resolved.get(id);
    const ref = question?.dynamicChoices;
    if (!question || !ref || done.has(id)) return question;

    if (visiting.has(id)) {
      logger.warn("dynamic choices left unresolved: circular source", { question: id });
      return question;
    }
    visiting.add(id);

    try {
      if (!INHERITED_KINDS.has(ref.kind)) {
        logger.warn("dynamic choices left unresolved: unsupported kind", { question: id, kind: ref.kind });
        return question;
      }

      const source = questions.has(ref.source) ? resolve(ref.source) : undefined;
      if (!source) {
        logger.warn("dynamic choices left unresolved: source question not found", { question: id, source: ref.source });
        return question;
      }

      const inheritChoices = question.choices.length === 0;
      const inheritSubQuestions = question.subQuestions.length === 0;
      const next: Question = {
        ...question,
        choices: inheritChoices ? source.choices.map((choice) => ({ ...choice })) : question.choices,
        orderedChoices: inheritChoices ? source.orderedChoices : question.orderedChoices,
        subQuestions: inheritSubQuestions ? source.subQuestions.map((choice) => ({ ...choice })) : question.subQuestions,
      };
      resolved.set(id, next);
      return next;
    } finally {
      visiting.delete(id);
      done.add(id);
    }
  };

  for (const id of order) resolve(id);
  return resolved;
}
