import type { Choice } from "./types";
import type { DisplayChoice, KeyedQuestionPayload } from "./schemas";

export class ChoiceKeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChoiceKeyError";
  }
}

function toKeyedMap(source: Record<string, DisplayChoice> | unknown[] | undefined, field: string): Map<number, DisplayChoice> {
  const map = new Map<number, DisplayChoice>();
  if (!source || Array.isArray(source)) return map;
  for (const [rawKey, choice] of Object.entries(source)) {
    const key = Number(rawKey.trim());
    if (rawKey.trim() === "" || !Number.isInteger(key)) {
      throw new ChoiceKeyError(`${field} key '${rawKey}' is not an integer`);
    }
    map.set(key, choice);
  }
  return map;
}

function toNameMap(source: Record<string, string> | undefined, field: string): Map<number, string> {
  const map = new Map<number, string>();
  if (!source) return map;
  for (const [rawKey, name] of Object.entries(source)) {
    const key = Number(rawKey.trim());
    if (rawKey.trim() === "" || !Number.isInteger(key)) {
      throw new ChoiceKeyError(`${field} key '${rawKey}' is not an integer`);
    }
    map.set(key, name);
  }
  return map;
}

function parseTextEntry(value: string | boolean | undefined, key: number): boolean {
  if (value === undefined || value === "") return false;
  if (typeof value === "boolean") return value;
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "on":
      return true;
    case "false":
    case "0":
    case "off":
      return false;
    default:
      throw new ChoiceKeyError(`TextEntry '${value}' for choice ${key} is not a boolean`);
  }
}

export function makeChoice(id: string, label: string, varName?: string, hasText = false): Choice {
  if (varName && varName.length > 0) {
    return { id, label, varName, exportName: varName, hasText };
  }
  return { id, label, varName: label, hasText };
}

// Column suffix for a choice: the definition's variable name, else its ID.
export function choiceSuffix(choice: Choice): string {
  return choice.exportName ?? choice.id;
}

/**
 * Choices in ChoiceOrder order.
 *
 * With `choicesAreQuestions` (matrix rows), ChoiceDataExportTags names the
 * variables when the definition provides them; otherwise VariableNaming does.
 */
export function orderedChoices(payload: KeyedQuestionPayload, choicesAreQuestions: boolean): Choice[] {
  const choices = toKeyedMap(payload.Choices, "Choices");
  const naming = toNameMap(payload.VariableNaming, "VariableNaming");
  const exportTags =
    typeof payload.ChoiceDataExportTags === "object"
      ? toNameMap(payload.ChoiceDataExportTags, "ChoiceDataExportTags")
      : null;

  return payload.ChoiceOrder.map((key) => {
    const choice = choices.get(key);
    const varName = choicesAreQuestions && exportTags ? exportTags.get(key) : naming.get(key);
    return makeChoice(String(key), choice?.Display ?? "", varName, parseTextEntry(choice?.TextEntry, key));
  });
}

/**
 * Matrix scale points in AnswerOrder order.
 */
export function orderedAnswers(payload: KeyedQuestionPayload): Choice[] {
  const answers = toKeyedMap(payload.Answers, "Answers");
  const naming = toNameMap(payload.VariableNaming, "VariableNaming");

  return payload.AnswerOrder.map((key) => {
    const answer = answers.get(key);
    return makeChoice(String(key), answer?.Display ?? "", naming.get(key), parseTextEntry(answer?.TextEntry, key));
  });
}

export function choiceLabels(choices: readonly Choice[]): string[] {
  return choices.map((choice) => choice.label);
}
