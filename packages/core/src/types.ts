import type { Response } from "./response";

export type Choice = {
  readonly id: string;
  readonly label: string;
  // Falls back to the label when the definition names no variable.
  readonly varName: string;
  // Only set when the definition names the variable; used as the column suffix.
  readonly exportName?: string;
  readonly hasText: boolean;
};

// Keep this union closed: every variant needs a column contract in question.ts.
export type QuestionType =
  | "single_choice"
  | "multi_select"
  | "matrix"
  | "rank_order"
  | "pick_group_rank"
  | "fixed_scale"
  | "text_entry"
  | "constant_sum"
  | "timing"
  | "descriptive"
  | "embedded_data"
  | "unsupported";

export type DynamicChoiceKind = "DisplayedChoices" | "SelectedChoices" | (string & {});

export type DynamicChoiceRef = {
  source: string;
  kind: DynamicChoiceKind;
};

export type Question = {
  readonly id: string;
  readonly exportTag: string;
  readonly text: string;
  readonly type: QuestionType;
  readonly selector: string;
  readonly subSelector: string;
  readonly choices: readonly Choice[];
  readonly orderedChoices: boolean;
  readonly subQuestions: readonly Choice[];
  readonly groups: readonly string[];
  readonly dynamicChoices?: DynamicChoiceRef;
  // Only set for embedded data: the platform's VariableType.
  readonly variableType?: string;
};

export type ColumnRole =
  | "choice"
  | "flag"
  | "text"
  | "rank"
  | "group"
  | "score"
  | "nps_group"
  | "number"
  | "timer_seconds"
  | "timer_count"
  | "raw";

export type QuestionColumn = {
  name: string;
  // Normalized response key the value is read from.
  key: string;
  role: ColumnRole;
};

export type ImportType = "factor" | "logical" | "integer" | "double" | "character";

export type Survey = {
  title: string;
  description: string;
  status: string;
  createdOn: Date | null;
  launchedOn: Date | null;
  modifiedOn: Date | null;
  questionOrder: readonly string[];
  questions: ReadonlyMap<string, Question>;
  responses: readonly Response[];
};
