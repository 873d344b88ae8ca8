import { choiceSuffix, makeChoice, orderedAnswers, orderedChoices } from "./choices";
import {
  NO_RESPONSE_LABEL,
  NOT_GROUPED_LABEL,
  NPS_GROUP_LABELS,
  NPS_MAX,
  NPS_MIN,
  isNoResponseCode,
  NO_RESPONSE_CODE,
} from "./config";
import type { Response } from "./response";
import type { EmbeddedField, FixedScaleQuestionPayload, KeyedQuestionPayload } from "./schemas";
import type { Choice, DynamicChoiceRef, ImportType, Question, QuestionColumn, QuestionType } from "./types";

const MULTI_SELECTORS = new Set(["MAVR", "MAHR", "MACOL", "MSB"]);
const ORDERED_MATRIX_SELECTORS = new Set(["Likert", "Bipolar"]);
const DYNAMIC_LOCATOR = /^q:\/\/(QID\d+)\//;

export function classifyQuestion(questionType: string, selector: string): QuestionType {
  switch (questionType) {
    case "MC":
      if (selector === "NPS") return "fixed_scale";
      return MULTI_SELECTORS.has(selector) ? "multi_select" : "single_choice";
    case "Matrix":
      return "matrix";
    case "RO":
      return "rank_order";
    case "PGR":
      return "pick_group_rank";
    case "TE":
      return "text_entry";
    case "CS":
      return "constant_sum";
    case "Timing":
      return "timing";
    case "DB":
      return "descriptive";
    default:
      return "unsupported";
  }
}

export function parseDynamicChoices(payload: KeyedQuestionPayload): DynamicChoiceRef | undefined {
  const dynamic = payload.DynamicChoices;
  if (!dynamic) return undefined;
  const match = DYNAMIC_LOCATOR.exec(dynamic.Locator);
  // Locators look like q://QID4/ChoiceGroup/SelectedChoices.
  const kind = dynamic.Type ?? dynamic.Locator.split("/").pop() ?? "";
  return { source: match ? match[1] : "", kind };
}

export function questionFromPayload(payload: KeyedQuestionPayload): Question {
  const type = classifyQuestion(payload.QuestionType, payload.Selector);
  const isMatrix = type === "matrix";
  const base = {
    id: payload.QuestionID,
    exportTag: payload.DataExportTag || payload.QuestionID,
    text: payload.QuestionText,
    type,
    selector: payload.Selector,
    subSelector: payload.SubSelector,
    groups: payload.Groups,
    dynamicChoices: parseDynamicChoices(payload),
  };

  if (isMatrix) {
    // Matrix rows arrive as Choices, scale points as Answers.
    return {
      ...base,
      choices: orderedAnswers(payload),
      orderedChoices: ORDERED_MATRIX_SELECTORS.has(payload.Selector),
      subQuestions: orderedChoices(payload, true),
    };
  }

  return {
    ...base,
    choices: orderedChoices(payload, false),
    orderedChoices: false,
    subQuestions: [],
  };
}

export function questionFromFixedScale(payload: FixedScaleQuestionPayload): Question {
  return {
    id: payload.QuestionID,
    exportTag: payload.DataExportTag || payload.QuestionID,
    text: payload.QuestionText,
    type: "fixed_scale",
    selector: payload.Selector,
    subSelector: payload.SubSelector,
    choices: [],
    orderedChoices: true,
    subQuestions: [],
    groups: [],
  };
}

export function questionFromEmbeddedData(field: EmbeddedField): Question {
  return {
    id: field.Field,
    exportTag: field.Field,
    text: field.Description ?? field.Field,
    type: "embedded_data",
    selector: field.Type ?? "",
    subSelector: "",
    choices: [],
    orderedChoices: false,
    subQuestions: [],
    groups: [],
    variableType: field.VariableType,
  };
}

function textColumns(tag: string, id: string, choices: readonly Choice[]): QuestionColumn[] {
  return choices
    .filter((choice) => choice.hasText)
    .map((choice) => ({ name: `${tag}_${choiceSuffix(choice)}_text`, key: `${id}_${choice.id}_TEXT`, role: "text" as const }));
}

function isMultiAnswerMatrix(question: Question): boolean {
  return question.type === "matrix" && question.subSelector === "MultipleAnswer";
}

/**
 * CSV columns for a question, in output order.
 */
export function questionColumns(question: Question): QuestionColumn[] {
  const { exportTag: tag, id } = question;

  switch (question.type) {
    case "single_choice":
      return [{ name: tag, key: id, role: "choice" }, ...textColumns(tag, id, question.choices)];
    case "multi_select":
      return [
        ...question.choices.map((c) => ({ name: `${tag}_${choiceSuffix(c)}`, key: `${id}_${c.id}`, role: "flag" as const })),
        ...textColumns(tag, id, question.choices),
      ];
    case "matrix": {
      const cells = isMultiAnswerMatrix(question)
        ? question.subQuestions.flatMap((s) =>
            question.choices.map((c) => ({ name: `${tag}_${choiceSuffix(s)}_${choiceSuffix(c)}`, key: `${id}_${s.id}_${c.id}`, role: "flag" as const }))
          )
        : question.subQuestions.map((s) => ({ name: `${tag}_${choiceSuffix(s)}`, key: `${id}_${s.id}`, role: "choice" as const }));
      return [...cells, ...textColumns(tag, id, question.subQuestions)];
    }
    case "rank_order":
      return [
        ...question.choices.map((c) => ({ name: `${tag}_${choiceSuffix(c)}`, key: `${id}_${c.id}`, role: "rank" as const })),
        ...textColumns(tag, id, question.choices),
      ];
    case "pick_group_rank":
      return [
        ...question.choices.flatMap((c) => [
          { name: `${tag}_${choiceSuffix(c)}_GROUP`, key: `${id}_${c.id}_GROUP`, role: "group" as const },
          { name: `${tag}_${choiceSuffix(c)}_RANK`, key: `${id}_${c.id}_RANK`, role: "rank" as const },
        ]),
        ...textColumns(tag, id, question.choices),
      ];
    case "fixed_scale":
      return [
        { name: tag, key: id, role: "score" },
        { name: `${tag}_group`, key: `${id}_NPS_GROUP`, role: "nps_group" },
      ];
    case "text_entry":
      if (question.selector === "FORM") {
        return question.choices.map((c) => ({ name: `${tag}_${choiceSuffix(c)}`, key: `${id}_${c.id}`, role: "text" as const }));
      }
      return [{ name: `${tag}_text`, key: `${id}_TEXT`, role: "text" }];
    case "constant_sum":
      return question.choices.map((c) => ({ name: `${tag}_${choiceSuffix(c)}`, key: `${id}_${c.id}`, role: "number" as const }));
    case "timing":
      return [
        { name: `${tag}_first_click`, key: `${id}_FIRST_CLICK`, role: "timer_seconds" },
        { name: `${tag}_last_click`, key: `${id}_LAST_CLICK`, role: "timer_seconds" },
        { name: `${tag}_page_submit`, key: `${id}_PAGE_SUBMIT`, role: "timer_seconds" },
        { name: `${tag}_click_count`, key: `${id}_CLICK_COUNT`, role: "timer_count" },
      ];
    case "embedded_data":
      return [{ name: tag, key: id, role: "raw" }];
    case "descriptive":
      return [];
    case "unsupported":
      return [{ name: tag, key: id, role: "raw" }];
  }
}

function renderChoice(value: string, choices: readonly Choice[]): string {
  if (value === NO_RESPONSE_CODE) return NO_RESPONSE_LABEL;
  const choice = choices.find((c) => c.id === value);
  return choice ? choice.varName : value;
}

function renderGroup(value: string, groups: readonly string[]): string {
  if (value === NO_RESPONSE_CODE) return NO_RESPONSE_LABEL;
  if (/^\d+$/.test(value)) {
    const group = groups[Number(value)];
    if (group !== undefined) return group;
  }
  return value;
}

function renderNpsGroup(value: string): string {
  const index = Number(value) - 1;
  return /^[1-3]$/.test(value) ? NPS_GROUP_LABELS[index] : value;
}

/**
 * One value per column of questionColumns(question). Missing answers render
 * as empty cells, so the row is always full width.
 */
export function renderQuestion(question: Question, response: Response): string[] {
  return questionColumns(question).map((column) => {
    const value = response.answer(column.key);
    if (value === undefined || value === "") return "";

    switch (column.role) {
      case "flag":
        return isNoResponseCode(value) ? "" : "TRUE";
      case "choice":
        return renderChoice(value, question.choices);
      case "group":
        return renderGroup(value, question.groups);
      case "nps_group":
        return renderNpsGroup(value);
      case "rank":
      case "score":
        return value === NO_RESPONSE_CODE ? NO_RESPONSE_LABEL : value;
      default:
        return value;
    }
  });
}

/**
 * readr column type for one of a question's columns.
 */
export function columnImportType(question: Question, column: QuestionColumn): ImportType {
  switch (column.role) {
    case "choice":
    case "rank":
    case "group":
    case "score":
    case "nps_group":
      return "factor";
    case "flag":
      return "logical";
    case "number":
    case "timer_seconds":
      return "double";
    case "timer_count":
      return "integer";
    case "text":
      return "character";
    case "raw":
      return question.type === "embedded_data" && question.variableType === "Scale" ? "double" : "character";
  }
}

export type FactorLevels = {
  levels: Choice[];
  ordered: boolean;
};

function withSentinel(levels: Choice[], label: string): Choice[] {
  return levels.some((level) => level.label === label) ? levels : [...levels, makeChoice(label, label)];
}

/**
 * Level set for a factor column, sentinels included. Empty levels mean the
 * column is declared without a scale.
 */
export function factorLevels(question: Question, column: QuestionColumn): FactorLevels {
  let levels: Choice[];
  let ordered: boolean;

  switch (column.role) {
    case "rank": {
      const count = question.choices.length;
      levels = Array.from({ length: count }, (_, i) => makeChoice(String(i + 1), String(i + 1)));
      ordered = true;
      break;
    }
    case "group":
      levels = question.groups.length > 0 ? withSentinel(question.groups.map((g) => makeChoice(g, g)), NOT_GROUPED_LABEL) : [];
      ordered = false;
      break;
    case "score":
      levels = Array.from({ length: NPS_MAX - NPS_MIN + 1 }, (_, i) => makeChoice(String(NPS_MIN + i), String(NPS_MIN + i)));
      ordered = true;
      break;
    case "nps_group":
      levels = NPS_GROUP_LABELS.map((label) => makeChoice(label, label));
      ordered = true;
      break;
    default:
      levels = [...question.choices];
      ordered = question.orderedChoices;
  }

  return { levels: levels.length > 0 ? withSentinel(levels, NO_RESPONSE_LABEL) : [], ordered };
}
